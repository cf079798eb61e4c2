/**
 * DashboardApi - the transport-facing surface. Every call resolves to an
 * ApiResult; nothing rejects.
 */

import type { ElementDefinition } from 'cytoscape';
import type {
  CreateEntityInput,
  DeleteEntityOptions,
  UpdateEntityInput,
} from '@/lib/entities/schemas';
import { ENTITY_KINDS, type Entity, type EntityKind } from '@/lib/entities/types';
import { NotFoundError, isDashboardError, toDashboardError } from '@/lib/errors';
import type { GraphAssembler } from '@/lib/graph/GraphAssembler';
import { toGraphElements } from '@/lib/graph/graphStyles';
import type { EntityRelationship, SubgraphOptions, SubgraphResult, SubgraphSeed } from '@/lib/graph/types';
import type {
  ConnectResult,
  EntityDeletion,
  MutationContext,
  MutationCoordinator,
} from '@/lib/mutations';
import type {
  ConnectEntitiesInput,
  CreateRelationshipInput,
  DeletedFilterInput,
  HistoryOptions,
  RelationshipActionOptions,
  UpdateRelationshipInput,
} from '@/lib/relationships/schemas';
import type { HistoryPage, Relationship } from '@/lib/relationships/types';
import type { StorageService } from '@/lib/storage/interfaces';
import type { RelationshipHistory, RelationshipSnapshot } from '@/lib/temporal/relationship-history';
import { createLogger } from '@/lib/utils/logger';
import { parseInput } from '@/lib/validation';
import { z } from 'zod';
import type { ApiError, ApiResult, DashboardStats } from './types';

const log = createLogger('DashboardApi');

const INTERNAL_MESSAGE = 'An internal error occurred';

const entityKindSchema = z.enum(ENTITY_KINDS);
const externalIdSchema = z.string().trim().min(1);

export interface DashboardApiDeps {
  storage: StorageService;
  mutations: MutationCoordinator;
  history: RelationshipHistory;
  graph: GraphAssembler;
}

export interface GraphView {
  elements: ElementDefinition[];
  nodeCount: number;
  edgeCount: number;
  truncated: boolean;
}

export class DashboardApi {
  private storage: StorageService;
  private mutations: MutationCoordinator;
  private temporal: RelationshipHistory;
  private graph: GraphAssembler;

  constructor(deps: DashboardApiDeps) {
    this.storage = deps.storage;
    this.mutations = deps.mutations;
    this.temporal = deps.history;
    this.graph = deps.graph;
  }

  // ==================== MUTATIONS ====================

  createEntity(input: CreateEntityInput, ctx?: MutationContext): Promise<ApiResult<Entity>> {
    return this.run('createEntity', () => this.mutations.createEntity(input, ctx));
  }

  updateEntity(id: string, input: UpdateEntityInput, ctx?: MutationContext): Promise<ApiResult<Entity>> {
    return this.run('updateEntity', () => this.mutations.updateEntity(id, input, ctx));
  }

  deleteEntity(id: string, options?: DeleteEntityOptions, ctx?: MutationContext): Promise<ApiResult<EntityDeletion>> {
    return this.run('deleteEntity', () => this.mutations.deleteEntity(id, options, ctx));
  }

  createRelationship(input: CreateRelationshipInput, ctx?: MutationContext): Promise<ApiResult<Relationship>> {
    return this.run('createRelationship', () => this.mutations.createRelationship(input, ctx));
  }

  updateRelationship(
    id: string,
    input: UpdateRelationshipInput,
    ctx?: MutationContext
  ): Promise<ApiResult<Relationship>> {
    return this.run('updateRelationship', () => this.mutations.updateRelationship(id, input, ctx));
  }

  deleteRelationship(
    id: string,
    options?: RelationshipActionOptions,
    ctx?: MutationContext
  ): Promise<ApiResult<Relationship>> {
    return this.run('deleteRelationship', () => this.mutations.deleteRelationship(id, options, ctx));
  }

  restoreRelationship(
    id: string,
    options?: RelationshipActionOptions,
    ctx?: MutationContext
  ): Promise<ApiResult<Relationship>> {
    return this.run('restoreRelationship', () => this.mutations.restoreRelationship(id, options, ctx));
  }

  connectEntities(input: ConnectEntitiesInput, ctx?: MutationContext): Promise<ApiResult<ConnectResult>> {
    return this.run('connectEntities', () => this.mutations.connectEntities(input, ctx));
  }

  // ==================== QUERIES ====================

  searchEntities(text: string): Promise<ApiResult<Entity[]>> {
    return this.run('searchEntities', () => this.graph.search(text));
  }

  getSubgraph(
    seed: SubgraphSeed,
    depth?: number,
    options: Omit<SubgraphOptions, 'depth'> = {}
  ): Promise<ApiResult<SubgraphResult>> {
    return this.run('getSubgraph', () => this.graph.subgraph(seed, { ...options, depth }));
  }

  getTopConnected(limit?: number): Promise<ApiResult<SubgraphResult>> {
    return this.run('getTopConnected', () => this.graph.topConnected(limit));
  }

  getGraphElements(
    seed: SubgraphSeed,
    depth?: number,
    options: Omit<SubgraphOptions, 'depth'> = {}
  ): Promise<ApiResult<GraphView>> {
    return this.run('getGraphElements', () => {
      const subgraph = this.graph.subgraph(seed, { ...options, depth });
      return {
        elements: toGraphElements(subgraph),
        nodeCount: subgraph.nodeCount,
        edgeCount: subgraph.edgeCount,
        truncated: subgraph.truncated,
      };
    });
  }

  getEntity(id: string): Promise<ApiResult<Entity>> {
    return this.run('getEntity', () => {
      const entity = this.storage.entities.getById(id);
      if (!entity || entity.deletedAt !== null) {
        throw new NotFoundError(`Entity ${id} not found`, { id });
      }
      return entity;
    });
  }

  /** The entity's active relationships, highest score first, unscored last */
  getEntityRelationships(entityId: string): Promise<ApiResult<EntityRelationship[]>> {
    return this.run('getEntityRelationships', () => this.graph.entityRelationships(entityId));
  }

  findEntityByExternalId(kind: EntityKind, externalId: string): Promise<ApiResult<Entity | null>> {
    return this.run('findEntityByExternalId', () =>
      this.storage.entities.findActiveByExternalId(
        parseInput(entityKindSchema, kind, 'entity kind'),
        parseInput(externalIdSchema, externalId, 'external id')
      )
    );
  }

  /** Soft-deleted relationships are returned as well */
  getRelationship(id: string): Promise<ApiResult<Relationship>> {
    return this.run('getRelationship', () => {
      const rel = this.storage.relationships.getById(id);
      if (!rel) {
        throw new NotFoundError(`Relationship ${id} not found`, { id });
      }
      return rel;
    });
  }

  getHistory(relationshipId: string, options?: HistoryOptions): Promise<ApiResult<HistoryPage>> {
    return this.run('getHistory', () => this.temporal.history(relationshipId, options));
  }

  listDeleted(filter?: DeletedFilterInput): Promise<ApiResult<Relationship[]>> {
    return this.run('listDeleted', () => this.temporal.listDeleted(filter));
  }

  getRelationshipStateAt(relationshipId: string, timestamp: number): Promise<ApiResult<Relationship | null>> {
    return this.run('getRelationshipStateAt', () => this.temporal.stateAt(relationshipId, timestamp));
  }

  reconstructAt(timestamp: number): Promise<ApiResult<RelationshipSnapshot>> {
    return this.run('reconstructAt', () => this.temporal.reconstructAt(timestamp));
  }

  getStats(): Promise<ApiResult<DashboardStats>> {
    return this.run('getStats', () => ({
      accounts: this.storage.entities.countActive('account'),
      contacts: this.storage.entities.countActive('contact'),
      relationships: this.storage.relationships.count(false),
      deletedRelationships: this.storage.relationships.count(true),
    }));
  }

  // ==================== INTERNALS ====================

  private async run<T>(operation: string, fn: () => T): Promise<ApiResult<T>> {
    try {
      return { success: true, data: fn() };
    } catch (err) {
      return { success: false, error: this.toApiError(operation, err) };
    }
  }

  private toApiError(operation: string, err: unknown): ApiError {
    const error = toDashboardError(err, operation);

    if (error.code === 'INTERNAL') {
      // The coordinator has already logged its own rollbacks
      if (!isDashboardError(err)) {
        log.error(`${operation} failed:`, err);
      }
      return { code: error.code, message: INTERNAL_MESSAGE };
    }

    return error.details === undefined
      ? { code: error.code, message: error.message }
      : { code: error.code, message: error.message, details: error.details };
  }
}
