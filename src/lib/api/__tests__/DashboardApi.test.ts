import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { addAccount, addContact, createTestContext, type TestContext } from '@/test/helpers';

describe('DashboardApi', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.close();
  });

  it('should wrap successful mutations', async () => {
    const result = await ctx.api.createEntity({ kind: 'account', name: 'Acme Corp', ticker: 'ACM' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toMatchObject({ kind: 'account', name: 'Acme Corp', ticker: 'ACM', lastModifiedBy: 'Test User' });
    }
  });

  it('should report validation issues', async () => {
    const result = await ctx.api.createEntity({ kind: 'account', name: '' });

    expect(result).toEqual({
      success: false,
      error: {
        code: 'VALIDATION',
        message: 'Invalid entity: Name is required (name)',
        details: { issues: [{ path: 'name', message: 'Name is required' }] },
      },
    });
  });

  it('should report missing records as NOT_FOUND', async () => {
    const entity = await ctx.api.getEntity('no-such-entity');
    const rel = await ctx.api.getRelationship('no-such-rel');

    expect(entity).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Entity no-such-entity not found', details: { id: 'no-such-entity' } },
    });
    expect(rel.success).toBe(false);
    if (!rel.success) expect(rel.error.code).toBe('NOT_FOUND');
  });

  it('should report conflicts with their details', async () => {
    const alice = addContact(ctx, 'Alice Reyes');
    const bob = addContact(ctx, 'Bob Tanaka');
    const first = await ctx.api.createRelationship({ sourceId: alice.id, targetId: bob.id, term: 'friend' });
    const second = await ctx.api.createRelationship({ sourceId: bob.id, targetId: alice.id, term: 'friend' });

    expect(first.success).toBe(true);
    expect(second.success).toBe(false);
    if (!second.success && first.success) {
      expect(second.error).toEqual({
        code: 'CONFLICT',
        message: 'An active relationship already connects these entities',
        details: { relationshipId: first.data.id },
      });
    }
  });

  it('should hide the cause of internal errors', async () => {
    vi.spyOn(ctx.storage.relationships, 'getById').mockImplementation(() => {
      throw new Error('database disk image is malformed');
    });

    expect(await ctx.api.getRelationship('any-id')).toEqual({
      success: false,
      error: { code: 'INTERNAL', message: 'An internal error occurred' },
    });
  });

  it('should serve history, deleted listing and point-in-time reads', async () => {
    const alice = addContact(ctx, 'Alice Reyes');
    const acme = addAccount(ctx, 'Acme Corp');
    const created = await ctx.api.createRelationship({ sourceId: alice.id, targetId: acme.id, term: 'works_for' });
    if (!created.success) throw new Error('create failed');
    await ctx.api.deleteRelationship(created.data.id);

    const history = await ctx.api.getHistory(created.data.id);
    const deleted = await ctx.api.listDeleted({ entityId: acme.id });
    const snapshot = await ctx.api.reconstructAt(Date.now());

    expect(history.success && history.data.entries.map((entry) => entry.action)).toEqual(['create', 'delete']);
    expect(deleted.success && deleted.data.map((rel) => rel.id)).toEqual([created.data.id]);
    expect(snapshot.success && snapshot.data.relationshipCount).toBe(0);
  });

  it("should list an entity's relationships for its panel", async () => {
    const acme = addAccount(ctx, 'Acme Corp');
    const alice = addContact(ctx, 'Alice Reyes');
    const bob = addContact(ctx, 'Bob Tanaka');
    await ctx.api.createRelationship({ sourceId: alice.id, targetId: acme.id, term: 'works_for' });
    await ctx.api.createRelationship({ sourceId: bob.id, targetId: alice.id, term: 'enemy', score: -30 });

    const panel = await ctx.api.getEntityRelationships(alice.id);
    const missing = await ctx.api.getEntityRelationships('no-such-entity');

    expect(panel.success && panel.data.map((row) => [row.other.name, row.direction, row.relationship.score])).toEqual([
      ['Bob Tanaka', 'incoming', -30],
      ['Acme Corp', 'outgoing', null],
    ]);
    expect(missing.success).toBe(false);
    if (!missing.success) expect(missing.error.code).toBe('NOT_FOUND');
  });

  it('should render graph elements and count the store', async () => {
    const acme = addAccount(ctx, 'Acme Corp');
    const alice = addContact(ctx, 'Alice Reyes', undefined, acme.id);
    await ctx.api.connectEntities({ sourceId: alice.id, targetId: acme.id });

    const view = await ctx.api.getGraphElements({ query: 'alice' }, 1);
    const stats = await ctx.api.getStats();
    const byExternalId = await ctx.api.findEntityByExternalId('account', 'crm-404');

    expect(view.success && view.data.elements.length).toBe(3);
    expect(view.success && view.data.truncated).toBe(false);
    expect(stats).toEqual({
      success: true,
      data: { accounts: 1, contacts: 1, relationships: 1, deletedRelationships: 0 },
    });
    expect(byExternalId).toEqual({ success: true, data: null });
  });
});
