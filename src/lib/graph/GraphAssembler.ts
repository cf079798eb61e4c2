/**
 * GraphAssembler - builds renderable subgraphs from a search query or a set
 * of seed entities.
 *
 * Traversal follows active relationships only, plus the employment links
 * implied by contacts' accountId. `includeDeleted` adds the soft-deleted
 * relationships between nodes already in the result as edges, it never
 * pulls in extra nodes.
 */

import type { Contact, Entity } from '@/lib/entities/types';
import { NotFoundError } from '@/lib/errors';
import { employmentKey, employmentLink } from '@/lib/relationships/employment';
import { TERM_CONFIG } from '@/lib/relationships/term-config';
import type { Relationship } from '@/lib/relationships/types';
import type { AppSettings } from '@/lib/settings/types';
import type { StorageService } from '@/lib/storage/interfaces';
import { compareById, compareIds } from '@/lib/utils/compare';
import { createLogger } from '@/lib/utils/logger';
import { parseInput } from '@/lib/validation';
import { z } from 'zod';
import { TraversalQueries } from './queries/TraversalQueries';
import {
  emptySubgraph,
  subgraphRequestSchema,
  subgraphSeedSchema,
  type EntityRelationship,
  type GraphEdge,
  type SubgraphOptions,
  type SubgraphResult,
  type SubgraphSeed,
} from './types';

const log = createLogger('GraphAssembler');

const topLimitSchema = z.number().int().min(1).max(1000).optional();

function employmentEdge(contact: Contact, accountId: string): GraphEdge {
  const config = TERM_CONFIG.works_for;
  return {
    id: `employment-${contact.id}-${accountId}`,
    sourceId: contact.id,
    sourceKind: 'contact',
    targetId: accountId,
    targetKind: 'account',
    term: 'works_for',
    category: config.category,
    directed: config.directed,
    score: null,
    version: 0,
    createdAt: contact.updatedAt,
    updatedAt: contact.updatedAt,
    deleted: false,
    deletedAt: null,
    lastModifiedBy: contact.lastModifiedBy,
    derived: true,
  };
}

/** Higher scores first; unscored relationships after all scored ones */
function compareByScore(a: EntityRelationship, b: EntityRelationship): number {
  const left = a.relationship.score;
  const right = b.relationship.score;
  if (left !== right) {
    if (left === null) return 1;
    if (right === null) return -1;
    return right - left;
  }
  return compareIds(a.relationship.id, b.relationship.id);
}

export class GraphAssembler {
  constructor(
    private storage: StorageService,
    private settings: Pick<AppSettings, 'nodeLimit' | 'defaultDepth'>
  ) {}

  /** Blank text matches nothing */
  search(text: string): Entity[] {
    const trimmed = text.trim();
    if (!trimmed) return [];
    return this.storage.entities.search(trimmed);
  }

  subgraph(seed: SubgraphSeed, options: SubgraphOptions = {}): SubgraphResult {
    const parsedSeed = parseInput(subgraphSeedSchema, seed, 'subgraph seed');
    const {
      depth = this.settings.defaultDepth,
      includeDeleted = false,
      limit = this.settings.nodeLimit,
    } = parseInput(subgraphRequestSchema, options, 'subgraph options');

    const seedIds =
      parsedSeed.query !== undefined
        ? this.search(parsedSeed.query).map((entity) => entity.id)
        : this.storage.entities.getActiveByIds(parsedSeed.entityIds ?? []).map((entity) => entity.id);

    if (seedIds.length === 0) return emptySubgraph();

    const relationships = this.storage.relationships.getAll(false);
    const implied = this.impliedEmployment(relationships);
    const traversal = new TraversalQueries([...relationships, ...implied]);
    const { order, truncated } = traversal.bfs(seedIds, { maxDepth: depth, limit });

    const result = this.induced(order, includeDeleted, truncated, implied);
    log.debug(
      `Subgraph from ${seedIds.length} seed(s), depth ${depth}: ${result.nodeCount} nodes, ${result.edgeCount} edges` +
        (truncated ? ' (truncated)' : '')
    );
    return result;
  }

  /**
   * The `limit` entities with the most distinct active neighbors (ties by id)
   * and the edges among them.
   */
  topConnected(limit?: number): SubgraphResult {
    const max = parseInput(topLimitSchema, limit, 'limit') ?? this.settings.nodeLimit;
    const relationships = this.storage.relationships.getAll(false);
    const implied = this.impliedEmployment(relationships);
    const traversal = new TraversalQueries([...relationships, ...implied]);

    const ranked = traversal
      .nodeIds()
      .sort((a, b) => traversal.degree(b) - traversal.degree(a) || compareIds(a, b));
    const top = ranked.slice(0, max);

    return this.induced(top, false, ranked.length > max, implied);
  }

  /**
   * Active relationships of one entity with the entity on the other end,
   * highest score first.
   */
  entityRelationships(entityId: string): EntityRelationship[] {
    const entity = this.storage.entities.getById(entityId);
    if (!entity || entity.deletedAt !== null) {
      throw new NotFoundError(`Entity ${entityId} not found`, { id: entityId });
    }

    const relationships = this.storage.relationships.getActiveByEntity(entityId);
    const others = new Map(
      this.storage.entities
        .getActiveByIds(relationships.map((rel) => (rel.sourceId === entityId ? rel.targetId : rel.sourceId)))
        .map((other) => [other.id, other])
    );

    const rows: EntityRelationship[] = [];
    for (const relationship of relationships) {
      const outgoing = relationship.sourceId === entityId;
      const other = others.get(outgoing ? relationship.targetId : relationship.sourceId);
      if (!other) continue;
      rows.push({
        relationship,
        direction: outgoing ? 'outgoing' : 'incoming',
        other: { id: other.id, kind: other.kind, name: other.name },
      });
    }

    return rows.sort(compareByScore);
  }

  /** Employment links from accountId that no active works_for records */
  private impliedEmployment(active: Relationship[]): GraphEdge[] {
    const recorded = new Set<string>();
    for (const rel of active) {
      const link = employmentLink(rel);
      if (link) recorded.add(employmentKey(link));
    }

    const edges: GraphEdge[] = [];
    for (const contact of this.storage.entities.getEmployedContacts()) {
      if (contact.accountId === null) continue;
      if (recorded.has(employmentKey({ contactId: contact.id, accountId: contact.accountId }))) continue;
      edges.push(employmentEdge(contact, contact.accountId));
    }
    return edges;
  }

  private induced(
    nodeIds: string[],
    includeDeleted: boolean,
    truncated: boolean,
    implied: GraphEdge[]
  ): SubgraphResult {
    const nodes = this.storage.entities.getActiveByIds(nodeIds).sort(compareById);
    const included = new Set(nodes.map((node) => node.id));
    const edges: GraphEdge[] = [
      ...this.storage.relationships.getAmong([...included], includeDeleted),
      ...implied.filter((edge) => included.has(edge.sourceId) && included.has(edge.targetId)),
    ].sort(compareById);

    return {
      nodes,
      edges,
      nodeCount: nodes.length,
      edgeCount: edges.length,
      truncated,
    };
  }
}
