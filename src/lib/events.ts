import type { Entity } from '@/lib/entities/types';
import type { LogAction, Relationship, RelationshipLogEntry } from '@/lib/relationships/types';

export interface EntityChangedEvent {
  action: 'create' | 'update' | 'delete';
  entity: Entity;
  actor: string;
}

export interface RelationshipChangedEvent {
  action: LogAction;
  relationship: Relationship;
  logEntry: RelationshipLogEntry;
}

/** Emitted after the owning transaction has committed */
export interface DashboardEvents {
  'entity:changed': EntityChangedEvent;
  'relationship:changed': RelationshipChangedEvent;
}
