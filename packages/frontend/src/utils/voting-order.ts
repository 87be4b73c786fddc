/**
 * 32-bit FNV-1a hash of a string.
 */
export function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Shuffle scenarios into an order that is fixed for one voter.
 *
 * Each scenario is ranked by a hash of (voter, id), so the order survives
 * reloads and a newly submitted scenario slots in without reshuffling the
 * ones already on screen. Different voters see different orders, which keeps
 * the first scenarios from collecting the most votes.
 */
export function orderForVoter<T extends { id: number }>(items: readonly T[], voterToken: string): T[] {
  return items
    .map((item) => ({ item, rank: fnv1a(`${voterToken}:${item.id}`) }))
    .sort((a, b) => a.rank - b.rank || a.item.id - b.item.id)
    .map(({ item }) => item);
}
