import seedGraphJson from '@/data/seed-graph.json';
import type { DashboardApi } from '@/lib/api/DashboardApi';
import type { ApiResult } from '@/lib/api/types';
import { InternalError } from '@/lib/errors';
import { RELATIONSHIP_TERMS } from '@/lib/relationships/types';
import { createLogger } from '@/lib/utils/logger';
import { z } from 'zod';

const log = createLogger('Seeder');

const seedGraphSchema = z.object({
  accounts: z.array(
    z.object({
      key: z.string(),
      name: z.string(),
      ticker: z.string().nullable(),
      externalId: z.string().nullable(),
    })
  ),
  contacts: z.array(
    z.object({
      key: z.string(),
      name: z.string(),
      jobTitle: z.string().nullable(),
      account: z.string().nullable(),
    })
  ),
  relationships: z.array(
    z.object({
      source: z.string(),
      target: z.string(),
      term: z.enum(RELATIONSHIP_TERMS),
      score: z.number().int().optional(),
    })
  ),
});

export type SeedGraph = z.infer<typeof seedGraphSchema>;

export interface SeedResult {
  skipped: boolean;
  accounts: number;
  contacts: number;
  relationships: number;
}

function unwrap<T>(result: ApiResult<T>, what: string): T {
  if (result.success) return result.data;
  throw new InternalError(`Seeding ${what} failed: ${result.error.message}`, {
    code: result.error.code,
    ...result.error.details,
  });
}

export function loadSeedGraph(raw: unknown = seedGraphJson): SeedGraph {
  return seedGraphSchema.parse(raw);
}

/**
 * Populates an empty store through the API so every seeded relationship has
 * its create entry in the audit log. A store with any entity is left alone.
 */
export async function seedDatabase(api: DashboardApi, graph: SeedGraph = loadSeedGraph()): Promise<SeedResult> {
  const stats = unwrap(await api.getStats(), 'stats');
  if (stats.accounts + stats.contacts > 0) {
    log.debug('Store already populated, skipping seed');
    return { skipped: true, accounts: 0, contacts: 0, relationships: 0 };
  }

  const ids = new Map<string, string>();
  const resolve = (key: string): string => {
    const id = ids.get(key);
    if (!id) throw new InternalError(`Seed graph references unknown key "${key}"`, { key });
    return id;
  };

  for (const account of graph.accounts) {
    const created = unwrap(
      await api.createEntity({
        kind: 'account',
        name: account.name,
        ticker: account.ticker,
        externalId: account.externalId,
      }),
      `account ${account.key}`
    );
    ids.set(account.key, created.id);
  }

  for (const contact of graph.contacts) {
    const created = unwrap(
      await api.createEntity({
        kind: 'contact',
        name: contact.name,
        jobTitle: contact.jobTitle,
        accountId: contact.account === null ? null : resolve(contact.account),
      }),
      `contact ${contact.key}`
    );
    ids.set(contact.key, created.id);
  }

  for (const rel of graph.relationships) {
    unwrap(
      await api.createRelationship({
        sourceId: resolve(rel.source),
        targetId: resolve(rel.target),
        term: rel.term,
        score: rel.score,
      }),
      `relationship ${rel.source} -> ${rel.target}`
    );
  }

  const result = {
    skipped: false,
    accounts: graph.accounts.length,
    contacts: graph.contacts.length,
    relationships: graph.relationships.length,
  };
  log.info(`Seeded ${result.accounts} accounts, ${result.contacts} contacts, ${result.relationships} relationships`);
  return result;
}
