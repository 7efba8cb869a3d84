/**
 * Grow a number[] to hold at least `min_capacity` elements.
 * Doubles from the current length until sufficient, fills new slots
 * with `fill`, and copies existing data into the new buffer.
 */
export function grow_number_array(
  arr: number[],
  min_capacity: number,
  fill: number,
): number[] {
  let cap = Math.max(arr.length, 1);
  while (cap < min_capacity) cap *= 2;
  if (cap === arr.length) return arr;
  const next = new Array(cap).fill(fill);
  for (let i = 0; i < arr.length; i++) next[i] = arr[i];
  return next;
}

/**
 * Remove the first element matching `predicate` by swapping the last
 * element into its slot. Order is not preserved. Returns true if removed.
 */
export function swap_remove<T>(
  arr: T[],
  predicate: (value: T) => boolean,
): boolean {
  for (let i = 0; i < arr.length; i++) {
    if (!predicate(arr[i])) continue;
    const last = arr.length - 1;
    if (i !== last) arr[i] = arr[last];
    arr.pop();
    return true;
  }
  return false;
}
