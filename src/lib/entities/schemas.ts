import { z } from 'zod';

const nameSchema = z
  .string({ required_error: 'Name is required', invalid_type_error: 'Name must be a string' })
  .trim()
  .min(1, 'Name is required')
  .max(200);

/** Blank strings are stored as null */
const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .transform((value) => (value === '' ? null : value))
    .nullish();

const idSchema = z.string().trim().min(1).max(64);

export const createAccountSchema = z
  .object({
    kind: z.literal('account'),
    id: idSchema.optional(),
    name: nameSchema,
    ticker: optionalText(16),
    externalId: optionalText(128),
  })
  .strict();

export const createContactSchema = z
  .object({
    kind: z.literal('contact'),
    id: idSchema.optional(),
    name: nameSchema,
    jobTitle: optionalText(200),
    accountId: idSchema.nullish(),
    externalId: optionalText(128),
  })
  .strict();

export const createEntitySchema = z.discriminatedUnion('kind', [
  createAccountSchema,
  createContactSchema,
]);

export const updateAccountSchema = z
  .object({
    name: nameSchema.optional(),
    ticker: optionalText(16),
    externalId: optionalText(128),
  })
  .strict();

export const updateContactSchema = z
  .object({
    name: nameSchema.optional(),
    jobTitle: optionalText(200),
    accountId: idSchema.nullish(),
    externalId: optionalText(128),
  })
  .strict();

export const deleteEntityOptionsSchema = z
  .object({
    cascade: z.boolean().default(false),
  })
  .strict();

export type CreateEntityInput = z.input<typeof createEntitySchema>;
export type CreateAccountInput = z.input<typeof createAccountSchema>;
export type CreateContactInput = z.input<typeof createContactSchema>;
export type UpdateAccountInput = z.input<typeof updateAccountSchema>;
export type UpdateContactInput = z.input<typeof updateContactSchema>;
export type UpdateEntityInput = UpdateAccountInput | UpdateContactInput;
export type DeleteEntityOptions = z.input<typeof deleteEntityOptionsSchema>;
