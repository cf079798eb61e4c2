/**
 * Graph nodes: Accounts (companies) and Contacts (people).
 */

export const ENTITY_KINDS = ['account', 'contact'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

interface EntityBase {
  id: string;
  name: string;
  /** Id of the matching record in the external CRM, if linked */
  externalId: string | null;
  createdAt: number;
  updatedAt: number;
  lastModifiedBy: string;
  /** Set when the entity is soft-deleted */
  deletedAt: number | null;
}

export interface Account extends EntityBase {
  kind: 'account';
  ticker: string | null;
}

export interface Contact extends EntityBase {
  kind: 'contact';
  jobTitle: string | null;
  /** Employer account (the usual target of a works_for relationship) */
  accountId: string | null;
}

export type Entity = Account | Contact;

