import { ValidationError } from '@/lib/errors';
import type { EntityKind } from '@/lib/entities/types';
import type { RelationshipCategory, RelationshipTerm } from './types';

export const SCORE_MIN = -100;
export const SCORE_MAX = 100;

export interface TermConfig {
  label: string;
  /** works_for is structural and never carries a score */
  scored: boolean;
  defaultScore: number | null;
  directed: boolean;
  category: RelationshipCategory;
}

/**
 * Per-term behavior. Adding a term means adding a row here and to
 * RELATIONSHIP_TERMS.
 */
export const TERM_CONFIG: Record<RelationshipTerm, TermConfig> = {
  works_for: { label: 'Works for', scored: false, defaultScore: null, directed: true, category: 'employment' },
  invested_in: { label: 'Invested in', scored: true, defaultScore: 50, directed: true, category: 'business' },
  competitor: { label: 'Competitor', scored: true, defaultScore: -50, directed: false, category: 'business' },
  colleague: { label: 'Colleague', scored: true, defaultScore: 20, directed: false, category: 'business' },
  friend: { label: 'Friend', scored: true, defaultScore: 80, directed: false, category: 'social' },
  enemy: { label: 'Enemy', scored: true, defaultScore: -100, directed: false, category: 'social' },
};

/**
 * Returns the score to store for `term`: the term default when none is
 * given, null for unscored terms.
 */
export function resolveScore(term: RelationshipTerm, score: number | null | undefined): number | null {
  const config = TERM_CONFIG[term];

  if (!config.scored) {
    if (score !== undefined && score !== null) {
      throw new ValidationError(`Term "${term}" does not carry a score`, { field: 'score', term });
    }
    return null;
  }

  if (score === undefined || score === null) {
    return config.defaultScore;
  }

  if (!Number.isInteger(score) || score < SCORE_MIN || score > SCORE_MAX) {
    throw new ValidationError(`Score must be an integer between ${SCORE_MIN} and ${SCORE_MAX}`, {
      field: 'score',
      score,
    });
  }

  return score;
}

/**
 * Term used when two nodes are connected without naming one.
 */
export function inferTerm(sourceKind: EntityKind, targetKind: EntityKind): RelationshipTerm {
  if (sourceKind === 'account' && targetKind === 'account') return 'competitor';
  if (sourceKind === 'contact' && targetKind === 'contact') return 'friend';
  return 'works_for';
}
