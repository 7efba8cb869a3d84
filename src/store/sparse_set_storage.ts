/***
 *
 * SparseSetStorage — packed per-type component storage keyed by entity id
 *
 * Three parallel arrays:
 *   dense[0..count)       entity ids in packed order
 *   components[0..count)  component values, aligned with dense
 *   sparse[entity_id]     index into dense/components, or ABSENT
 *
 * has(e) ⇔ sparse[e] ∈ [0, count) ∧ dense[sparse[e]] === e
 *
 * Removal swaps the last packed entry into the vacated row and pops, so
 * iteration order changes but the packed region never has gaps.
 *
 * Two bounds are fixed at construction: universe_size (ids must lie in
 * [0, universe_size)) and capacity (maximum packed count). The sparse
 * buffer grows by doubling up to universe_size; add() refuses rather
 * than corrupt state when either bound would be exceeded.
 *
 ***/

import { ABSENT, INITIAL_STORAGE_SIZE } from "../utils/constants";

export class SparseSetStorage<T> {
  public readonly capacity: number;
  public readonly universe_size: number;

  private _dense: number[] = [];
  private _components: T[] = [];
  private _sparse: Int32Array;

  constructor(capacity: number, universe_size: number = capacity) {
    this.capacity = capacity;
    this.universe_size = universe_size;
    this._sparse = new Int32Array(
      Math.min(INITIAL_STORAGE_SIZE, Math.max(universe_size, 1)),
    ).fill(ABSENT);
  }

  public get count(): number {
    return this._dense.length;
  }

  public get is_full(): boolean {
    return this._dense.length >= this.capacity;
  }

  /** Live view of packed entity ids. Valid indices: 0..count-1. Do not mutate. */
  public get packed_entities(): readonly number[] {
    return this._dense;
  }

  /** Live view of packed values, aligned index-for-index with packed_entities. */
  public get packed_components(): readonly T[] {
    return this._components;
  }

  public has(entity_id: number): boolean {
    if (entity_id < 0 || entity_id >= this._sparse.length) return false;
    const row = this._sparse[entity_id];
    return (
      row !== ABSENT &&
      row < this._dense.length &&
      this._dense[row] === entity_id
    );
  }

  /**
   * Insert a value. Returns false, leaving the storage untouched, if the
   * id is already present, outside the universe, or the storage is full.
   */
  public add(entity_id: number, value: T): boolean {
    if (
      !Number.isInteger(entity_id) ||
      entity_id < 0 ||
      entity_id >= this.universe_size ||
      this.is_full ||
      this.has(entity_id)
    ) {
      return false;
    }
    this._ensure(entity_id);
    this._sparse[entity_id] = this._dense.length;
    this._dense.push(entity_id);
    this._components.push(value);
    return true;
  }

  /**
   * Remove via swap-and-pop. O(1).
   * Returns true if the id was present, false if it was absent.
   */
  public remove(entity_id: number): boolean {
    if (!this.has(entity_id)) return false;
    const row = this._sparse[entity_id];
    const last = this._dense.length - 1;
    const last_id = this._dense[last];
    this._dense[row] = last_id;
    this._components[row] = this._components[last];
    this._sparse[last_id] = row;
    this._dense.pop();
    this._components.pop();
    this._sparse[entity_id] = ABSENT;
    return true;
  }

  /**
   * Unchecked read: callers gate with has(). An absent id reads
   * whatever occupies its stale row, or undefined.
   */
  public get(entity_id: number): T {
    return this._components[this._sparse[entity_id]];
  }

  public try_get(entity_id: number): T | undefined {
    if (!this.has(entity_id)) return undefined;
    return this._components[this._sparse[entity_id]];
  }

  /**
   * Upsert: overwrite in place when present, otherwise add().
   * Returns false only when the add path refuses the value.
   */
  public set(entity_id: number, value: T): boolean {
    if (this.has(entity_id)) {
      this._components[this._sparse[entity_id]] = value;
      return true;
    }
    return this.add(entity_id, value);
  }

  public clear(): void {
    for (let i = 0; i < this._dense.length; i++) {
      this._sparse[this._dense[i]] = ABSENT;
    }
    this._dense.length = 0;
    this._components.length = 0;
  }

  [Symbol.iterator](): Iterator<[number, T]> {
    let i = 0;
    const ids = this._dense;
    const values = this._components;
    return {
      next(): IteratorResult<[number, T]> {
        if (i < ids.length) {
          const row = i++;
          return { value: [ids[row], values[row]], done: false };
        }
        return { value: undefined, done: true };
      },
    };
  }

  //=========================================================
  // Internal
  //=========================================================

  private _ensure(entity_id: number): void {
    if (entity_id < this._sparse.length) return;
    let size = this._sparse.length;
    while (size <= entity_id) size *= 2;
    const next = new Int32Array(Math.min(size, this.universe_size)).fill(
      ABSENT,
    );
    next.set(this._sparse);
    this._sparse = next;
  }
}
