/**
 * Parse a comma-separated list of workout ids ("12, 34,56")
 * Duplicates are dropped; order is kept. Throws on anything that is not a positive integer.
 */
export function parseIdList(input: string): number[] {
  const ids: number[] = [];
  const seen = new Set<number>();

  for (const raw of input.split(",")) {
    const token = raw.trim();
    if (token === "") continue;

    if (!/^\d+$/.test(token) || Number(token) === 0) {
      throw new Error(`Invalid workout id: "${token}"`);
    }

    const id = Number(token);
    if (!seen.has(id)) {
      seen.add(id);
      ids.push(id);
    }
  }

  return ids;
}
