export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Stable ordering by string id; used wherever output must be deterministic */
export function compareById(a: { id: string }, b: { id: string }): number {
  return compareIds(a.id, b.id);
}
