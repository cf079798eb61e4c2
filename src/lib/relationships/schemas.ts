import { z } from 'zod';
import { ENTITY_KINDS } from '@/lib/entities/types';
import { RELATIONSHIP_TERMS } from './types';
import { SCORE_MAX, SCORE_MIN } from './term-config';

export const relationshipTermSchema = z.enum(RELATIONSHIP_TERMS, {
  errorMap: () => ({ message: `Term must be one of: ${RELATIONSHIP_TERMS.join(', ')}` }),
});

export const scoreSchema = z
  .number({ invalid_type_error: 'Score must be a number' })
  .int('Score must be an integer')
  .min(SCORE_MIN, `Score must be at least ${SCORE_MIN}`)
  .max(SCORE_MAX, `Score must be at most ${SCORE_MAX}`);

const entityRefSchema = z.string().trim().min(1, 'Entity id is required');
const noteSchema = z.string().trim().max(500).optional();

export const createRelationshipSchema = z
  .object({
    sourceId: entityRefSchema,
    targetId: entityRefSchema,
    term: relationshipTermSchema,
    score: scoreSchema.nullish(),
    note: noteSchema,
  })
  .strict();

export const updateRelationshipSchema = z
  .object({
    term: relationshipTermSchema.optional(),
    score: scoreSchema.nullish(),
    expectedVersion: z.number().int().positive().optional(),
    note: noteSchema,
  })
  .strict();

export const connectEntitiesSchema = z
  .object({
    sourceId: entityRefSchema,
    targetId: entityRefSchema,
    note: noteSchema,
  })
  .strict();

/** Options for delete and restore */
export const relationshipActionSchema = z
  .object({
    note: noteSchema,
  })
  .strict();

export const deletedFilterSchema = z
  .object({
    entityId: z.string().trim().min(1).optional(),
    term: relationshipTermSchema.optional(),
    deletedAfter: z.number().int().nonnegative().optional(),
    deletedBefore: z.number().int().nonnegative().optional(),
  })
  .strict();

export const historyOptionsSchema = z
  .object({
    after: z.number().int().nonnegative().optional(),
    limit: z.number().int().min(1).max(500).optional(),
  })
  .strict();

export type CreateRelationshipInput = z.input<typeof createRelationshipSchema>;
export type UpdateRelationshipInput = z.input<typeof updateRelationshipSchema>;
export type ConnectEntitiesInput = z.input<typeof connectEntitiesSchema>;
export type RelationshipActionOptions = z.input<typeof relationshipActionSchema>;
export type DeletedFilterInput = z.input<typeof deletedFilterSchema>;
export type HistoryOptions = z.input<typeof historyOptionsSchema>;

// ============================================
// Stored records (rows and log snapshots)
// ============================================

const entityKindSchema = z.enum(ENTITY_KINDS);

export const relationshipRecordSchema = z.object({
  id: z.string(),
  sourceId: z.string(),
  sourceKind: entityKindSchema,
  targetId: z.string(),
  targetKind: entityKindSchema,
  term: relationshipTermSchema,
  category: z.enum(['employment', 'business', 'social']),
  directed: z.boolean(),
  score: z.number().int().nullable(),
  version: z.number().int(),
  createdAt: z.number(),
  updatedAt: z.number(),
  deleted: z.boolean(),
  deletedAt: z.number().nullable(),
  lastModifiedBy: z.string(),
});

export const fieldChangesSchema = z.array(
  z
    .object({
      field: relationshipRecordSchema.keyof(),
      previous: z.unknown(),
      next: z.unknown(),
    })
    .transform((change) => ({ field: change.field, previous: change.previous, next: change.next }))
);
