export { DashboardApi } from './DashboardApi';
export type { DashboardApiDeps, GraphView } from './DashboardApi';
export type { ApiError, ApiResult, DashboardStats } from './types';
