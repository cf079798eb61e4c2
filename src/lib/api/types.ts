import type { DashboardErrorCode, ErrorDetails } from '@/lib/errors';

export interface ApiError {
  code: DashboardErrorCode;
  message: string;
  details?: ErrorDetails;
}

export type ApiResult<T> = { success: true; data: T } | { success: false; error: ApiError };

export interface DashboardStats {
  accounts: number;
  contacts: number;
  relationships: number;
  deletedRelationships: number;
}
