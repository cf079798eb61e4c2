export { MutationCoordinator } from './mutation-coordinator';
export type { ConnectResult, EntityDeletion, MutationContext } from './mutation-coordinator';
export { diffRelationships, meaningfulChanges } from './delta-calculator';
