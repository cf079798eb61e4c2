import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { addAccount, countRows, createTestContext, type TestContext } from '@/test/helpers';
import { loadSeedGraph, seedDatabase } from '../seedDatabase';

describe('seedDatabase', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.close();
  });

  it('should populate an empty store through the audited write path', async () => {
    const graph = loadSeedGraph();
    const result = await seedDatabase(ctx.api, graph);

    expect(result).toEqual({
      skipped: false,
      accounts: graph.accounts.length,
      contacts: graph.contacts.length,
      relationships: graph.relationships.length,
    });
    expect(ctx.storage.entities.countActive('account')).toBe(graph.accounts.length);
    expect(ctx.storage.relationships.count(false)).toBe(graph.relationships.length);
    expect(countRows(ctx.db, 'relationship_log')).toBe(graph.relationships.length);
  });

  it('should link contacts to their accounts', async () => {
    await seedDatabase(ctx.api, {
      accounts: [{ key: 'acme', name: 'Acme Corp', ticker: null, externalId: 'crm-1' }],
      contacts: [{ key: 'alice', name: 'Alice Reyes', jobTitle: 'CTO', account: 'acme' }],
      relationships: [{ source: 'alice', target: 'acme', term: 'works_for' }],
    });

    const [alice] = ctx.graph.search('alice');
    const acme = ctx.storage.entities.findActiveByExternalId('account', 'crm-1');
    expect(alice).toMatchObject({ kind: 'contact', accountId: acme?.id });
  });

  it('should leave a populated store alone', async () => {
    addAccount(ctx, 'Existing Co');

    expect(await seedDatabase(ctx.api)).toEqual({ skipped: true, accounts: 0, contacts: 0, relationships: 0 });
    expect(ctx.storage.entities.countActive('account')).toBe(1);
  });

  it('should fail on a seed graph that references unknown keys', async () => {
    await expect(
      seedDatabase(ctx.api, {
        accounts: [],
        contacts: [{ key: 'alice', name: 'Alice Reyes', jobTitle: null, account: 'missing' }],
        relationships: [],
      })
    ).rejects.toThrow('Seed graph references unknown key "missing"');
  });
});
