/**
 * Upper-bound search over a non-decreasing cumulative table.
 *
 * Returns the smallest index whose bound is strictly greater than `roll`, so a
 * roll sitting exactly on a boundary belongs to the next bucket and leading
 * zero-probability buckets are skipped.
 *
 * @throws RangeError when no bound exceeds `roll`. With a table ending in 1
 * and a roll in [0, 1) this cannot happen.
 */
export function locate(cumulative: readonly number[], roll: number): number {
  let low = 0;
  let high = cumulative.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (cumulative[mid] <= roll) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  if (low >= cumulative.length) {
    throw new RangeError(
      `locate: roll ${roll} falls outside a cumulative table of ${cumulative.length} entries`
    );
  }
  return low;
}
