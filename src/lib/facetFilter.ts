/** Pillar and kind narrowing for search hits; an empty or missing list keeps every hit. */
export type FacetSelections = {
  pillars?: readonly string[];
  kinds?: readonly string[];
};

type RankedRow = {
  id: string;
  score: number;
  pillar?: string;
  kind: string;
};

function selects(selection: readonly string[] | undefined, value: string | undefined): boolean {
  if (!selection || selection.length === 0) return true;
  return value !== undefined && selection.includes(value);
}

function byRank(a: RankedRow, b: RankedRow): number {
  return b.score - a.score || a.id.localeCompare(b.id);
}

export function applyFacetFilters<T extends RankedRow>(rows: readonly T[], sel: FacetSelections): T[] {
  return rows.filter((r) => selects(sel.pillars, r.pillar) && selects(sel.kinds, r.kind)).sort(byRank);
}
