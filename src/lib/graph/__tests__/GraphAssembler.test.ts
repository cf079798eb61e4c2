import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NotFoundError, ValidationError } from '@/lib/errors';
import type { Relationship } from '@/lib/relationships/types';
import { addAccount, addContact, createTestContext, type TestContext } from '@/test/helpers';
import type { SubgraphResult } from '../types';

const pairs = (result: SubgraphResult) =>
  result.edges.map((edge) => `${edge.sourceId}->${edge.targetId}`).sort();

const nodeIds = (result: SubgraphResult) => result.nodes.map((node) => node.id);

describe('GraphAssembler', () => {
  let ctx: TestContext;
  let friendship: Relationship;
  let rivalry: Relationship;

  // a-acme ── a-globex ── c-carol ── c-dave
  //   │  \
  // c-alice ── c-bob
  beforeEach(() => {
    ctx = createTestContext();
    addAccount(ctx, 'Acme Corp', 'a-acme');
    addAccount(ctx, 'Globex', 'a-globex');
    addContact(ctx, 'Alice Reyes', 'c-alice');
    addContact(ctx, 'Bob Tanaka', 'c-bob');
    addContact(ctx, 'Carol Ng', 'c-carol');
    addContact(ctx, 'Dave Osei', 'c-dave');

    ctx.mutations.createRelationship({ sourceId: 'c-alice', targetId: 'a-acme', term: 'works_for' });
    ctx.mutations.createRelationship({ sourceId: 'c-bob', targetId: 'a-acme', term: 'works_for' });
    friendship = ctx.mutations.createRelationship({ sourceId: 'c-alice', targetId: 'c-bob', term: 'friend' });
    ctx.mutations.createRelationship({ sourceId: 'c-carol', targetId: 'a-globex', term: 'works_for' });
    rivalry = ctx.mutations.createRelationship({ sourceId: 'a-acme', targetId: 'a-globex', term: 'competitor' });
    ctx.mutations.createRelationship({ sourceId: 'c-dave', targetId: 'c-carol', term: 'friend' });
  });

  afterEach(() => {
    ctx.close();
  });

  describe('search', () => {
    it('should return matches ordered by name and nothing for blank text', () => {
      expect(ctx.graph.search('a').map((entity) => entity.name)).toEqual([
        'Acme Corp',
        'Alice Reyes',
        'Bob Tanaka',
        'Carol Ng',
        'Dave Osei',
      ]);
      expect(ctx.graph.search('   ')).toEqual([]);
    });
  });

  describe('subgraph', () => {
    it('should return only the seed at depth 0', () => {
      const result = ctx.graph.subgraph({ query: 'acme' }, { depth: 0 });

      expect(nodeIds(result)).toEqual(['a-acme']);
      expect(result.edges).toEqual([]);
      expect(result.truncated).toBe(false);
    });

    it('should expand one hop and include every edge among the nodes', () => {
      const result = ctx.graph.subgraph({ query: 'Acme' }, { depth: 1 });

      expect(nodeIds(result)).toEqual(['a-acme', 'a-globex', 'c-alice', 'c-bob']);
      expect(pairs(result)).toEqual(['a-acme->a-globex', 'c-alice->a-acme', 'c-alice->c-bob', 'c-bob->a-acme']);
      expect(result.nodeCount).toBe(4);
      expect(result.edgeCount).toBe(4);
    });

    it('should default to two hops', () => {
      const result = ctx.graph.subgraph({ entityIds: ['a-acme'] });

      expect(nodeIds(result)).toEqual(['a-acme', 'a-globex', 'c-alice', 'c-bob', 'c-carol']);
      expect(result.edgeCount).toBe(5);
    });

    it('should cap the node set in BFS order and flag truncation', () => {
      const result = ctx.graph.subgraph({ entityIds: ['a-acme'] }, { depth: 2, limit: 3 });

      expect(nodeIds(result)).toEqual(['a-acme', 'a-globex', 'c-alice']);
      expect(pairs(result)).toEqual(['a-acme->a-globex', 'c-alice->a-acme']);
      expect(result.truncated).toBe(true);
    });

    it('should give identical output for identical state and query', () => {
      const first = ctx.graph.subgraph({ query: 'o' }, { depth: 1 });
      const second = ctx.graph.subgraph({ query: 'o' }, { depth: 1 });

      expect(second).toEqual(first);
      expect(nodeIds(first)).toEqual([...nodeIds(first)].sort());
      expect(first.edges.map((edge) => edge.id)).toEqual(first.edges.map((edge) => edge.id).sort());
    });

    it('should leave soft-deleted relationships out unless asked', () => {
      ctx.mutations.deleteRelationship(friendship.id);

      const active = ctx.graph.subgraph({ query: 'Acme' }, { depth: 1 });
      expect(pairs(active)).toEqual(['a-acme->a-globex', 'c-alice->a-acme', 'c-bob->a-acme']);

      const historic = ctx.graph.subgraph({ query: 'Acme' }, { depth: 1, includeDeleted: true });
      expect(pairs(historic)).toEqual(['a-acme->a-globex', 'c-alice->a-acme', 'c-alice->c-bob', 'c-bob->a-acme']);
      expect(historic.edges.find((edge) => edge.id === friendship.id)?.deleted).toBe(true);
    });

    it('should not traverse soft-deleted relationships', () => {
      ctx.mutations.deleteRelationship(rivalry.id);

      const result = ctx.graph.subgraph({ entityIds: ['a-acme'] }, { depth: 3, includeDeleted: true });
      expect(nodeIds(result)).toEqual(['a-acme', 'c-alice', 'c-bob']);
    });

    it('should return an empty result when nothing matches', () => {
      expect(ctx.graph.subgraph({ query: 'zzz' })).toEqual({
        nodes: [],
        edges: [],
        nodeCount: 0,
        edgeCount: 0,
        truncated: false,
      });
      expect(ctx.graph.subgraph({ entityIds: ['no-such-entity'] }).nodeCount).toBe(0);
      expect(ctx.graph.subgraph({ query: '' }).nodeCount).toBe(0);
    });

    it('should skip deleted entities given as seeds', () => {
      ctx.mutations.deleteEntity('c-dave', { cascade: true });

      expect(nodeIds(ctx.graph.subgraph({ entityIds: ['c-dave'] }))).toEqual([]);
    });

    it('should require exactly one kind of seed', () => {
      expect(() => ctx.graph.subgraph({})).toThrow(ValidationError);
      expect(() => ctx.graph.subgraph({ query: 'acme', entityIds: ['a-acme'] })).toThrow(
        'Invalid subgraph seed: Provide either a query or entityIds'
      );
    });
  });

  describe('topConnected', () => {
    it('should rank by relationship count with ties broken by id', () => {
      const result = ctx.graph.topConnected(2);

      expect(nodeIds(result)).toEqual(['a-acme', 'a-globex']);
      expect(pairs(result)).toEqual(['a-acme->a-globex']);
      expect(result.truncated).toBe(true);
    });

    it('should use the configured node limit by default', () => {
      const result = ctx.graph.topConnected();

      expect(result.nodeCount).toBe(6);
      expect(result.edgeCount).toBe(6);
      expect(result.truncated).toBe(false);
    });
  });

  describe('employment edges', () => {
    it("should draw an edge from a contact's accountId", () => {
      addContact(ctx, 'Erin Fox', 'c-erin', 'a-globex');

      const result = ctx.graph.subgraph({ entityIds: ['c-erin'] }, { depth: 1 });

      expect(nodeIds(result)).toEqual(['a-globex', 'c-erin']);
      expect(result.edges).toHaveLength(1);
      expect(result.edges[0]).toMatchObject({
        id: 'employment-c-erin-a-globex',
        sourceId: 'c-erin',
        targetId: 'a-globex',
        term: 'works_for',
        score: null,
        deleted: false,
        derived: true,
      });
    });

    it('should not duplicate an employer recorded by a works_for relationship', () => {
      const result = ctx.graph.subgraph({ entityIds: ['c-carol'] }, { depth: 1 });

      expect(pairs(result)).toEqual(['c-carol->a-globex', 'c-dave->c-carol']);
      expect(result.edges.filter((edge) => edge.derived)).toEqual([]);
    });

    it('should follow the contact to a new employer', () => {
      addContact(ctx, 'Erin Fox', 'c-erin', 'a-acme');
      ctx.mutations.createRelationship({ sourceId: 'c-erin', targetId: 'a-acme', term: 'works_for' });

      ctx.mutations.updateEntity('c-erin', { accountId: 'a-globex' });

      expect(ctx.storage.relationships.getActiveByEntity('c-erin')).toEqual([]);
      const result = ctx.graph.subgraph({ entityIds: ['c-erin'] }, { depth: 1 });
      expect(nodeIds(result)).toEqual(['a-globex', 'c-erin']);
      expect(result.edges.map((edge) => edge.id)).toEqual(['employment-c-erin-a-globex']);
    });

    it('should count implied employment when ranking', () => {
      addContact(ctx, 'Erin Fox', 'c-erin', 'a-globex');
      addContact(ctx, 'Finn Moss', 'c-finn', 'a-globex');

      // a-globex: a-acme, c-carol, c-erin, c-finn; a-acme: a-globex, c-alice, c-bob
      expect(nodeIds(ctx.graph.topConnected(1))).toEqual(['a-globex']);
    });
  });

  describe('entityRelationships', () => {
    it('should list the other side of each relationship, highest score first', () => {
      const rows = ctx.graph.entityRelationships('c-alice');

      expect(rows.map((row) => [row.relationship.term, row.direction, row.other])).toEqual([
        ['friend', 'outgoing', { id: 'c-bob', kind: 'contact', name: 'Bob Tanaka' }],
        ['works_for', 'outgoing', { id: 'a-acme', kind: 'account', name: 'Acme Corp' }],
      ]);
      expect(rows[0]?.relationship).toEqual(friendship);
    });

    it('should put unscored relationships after negative ones', () => {
      const rows = ctx.graph.entityRelationships('a-acme');

      expect(rows.map((row) => row.relationship.term)).toEqual(['competitor', 'works_for', 'works_for']);
      expect(rows.map((row) => row.direction)).toEqual(['outgoing', 'incoming', 'incoming']);
      expect(rows[0]?.relationship).toEqual(rivalry);
      const unscored = rows.slice(1).map((row) => row.relationship.id);
      expect(unscored).toEqual([...unscored].sort());
    });

    it('should leave out deleted relationships and implied employment', () => {
      ctx.mutations.deleteRelationship(friendship.id);
      addContact(ctx, 'Erin Fox', 'c-erin', 'a-globex');

      expect(ctx.graph.entityRelationships('c-bob').map((row) => row.other.id)).toEqual(['a-acme']);
      expect(ctx.graph.entityRelationships('c-erin')).toEqual([]);
    });

    it('should answer NotFound for unknown or deleted entities', () => {
      ctx.mutations.deleteEntity('c-dave', { cascade: true });

      expect(() => ctx.graph.entityRelationships('no-such-entity')).toThrow(NotFoundError);
      expect(() => ctx.graph.entityRelationships('c-dave')).toThrow(NotFoundError);
    });
  });
});
