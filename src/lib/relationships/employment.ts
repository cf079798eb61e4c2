import type { Relationship } from './types';

export interface EmploymentLink {
  contactId: string;
  accountId: string;
}

type LinkFields = Pick<Relationship, 'term' | 'sourceId' | 'sourceKind' | 'targetId' | 'targetKind'>;

/**
 * The contact and account joined by a works_for relationship, whichever way
 * it points. Null for other terms and for works_for between two entities of
 * the same kind.
 */
export function employmentLink(rel: LinkFields): EmploymentLink | null {
  if (rel.term !== 'works_for') return null;
  if (rel.sourceKind === 'contact' && rel.targetKind === 'account') {
    return { contactId: rel.sourceId, accountId: rel.targetId };
  }
  if (rel.sourceKind === 'account' && rel.targetKind === 'contact') {
    return { contactId: rel.targetId, accountId: rel.sourceId };
  }
  return null;
}

export function employmentKey(link: EmploymentLink): string {
  return `${link.contactId}:${link.accountId}`;
}
