import { z } from 'zod';
import type { Entity } from '@/lib/entities/types';
import type { Relationship } from '@/lib/relationships/types';

export interface GraphEdge extends Relationship {
  /**
   * Employment link drawn from a contact's accountId where no active
   * works_for relationship records it. It has no row and no history.
   */
  derived?: true;
}

export interface SubgraphResult {
  nodes: Entity[];
  edges: GraphEdge[];
  nodeCount: number;
  edgeCount: number;
  /** True when reachable nodes were left out by the node limit */
  truncated: boolean;
}

/** One row of an entity's relationship panel */
export interface EntityRelationship {
  relationship: Relationship;
  /** outgoing when the entity is the source */
  direction: 'outgoing' | 'incoming';
  other: Pick<Entity, 'id' | 'kind' | 'name'>;
}

export function emptySubgraph(): SubgraphResult {
  return { nodes: [], edges: [], nodeCount: 0, edgeCount: 0, truncated: false };
}

export const subgraphSeedSchema = z
  .object({
    query: z.string().optional(),
    entityIds: z.array(z.string().trim().min(1)).max(1000).optional(),
  })
  .strict()
  .refine((seed) => (seed.query === undefined) !== (seed.entityIds === undefined), {
    message: 'Provide either a query or entityIds',
  });

export const subgraphRequestSchema = z
  .object({
    depth: z.number().int().min(0).max(6).optional(),
    includeDeleted: z.boolean().optional(),
    limit: z.number().int().min(1).max(1000).optional(),
  })
  .strict();

export type SubgraphSeed = z.input<typeof subgraphSeedSchema>;
export type SubgraphOptions = z.input<typeof subgraphRequestSchema>;
