/***
 * RelationshipStorage — Edge store for one relationship type.
 *
 * Two indices give O(1) lookups both ways:
 *   forward: source id → (target key → { target, data })
 *   reverse: target id → [source, ...]
 *
 * Target keys carry the generation so a recycled id never aliases an
 * edge that pointed at its previous occupant, and each bucket remembers
 * the handle it was opened for so lookups through a stale handle miss.
 * Both maps change together on every mutation and a bucket that empties
 * is dropped.
 *
 * The storage knows a single direction per call; mirroring for
 * bidirectional types happens in the World.
 *
 ***/

import { entity_key, type Entity, type EntityKey } from "../entity/entity";
import { swap_remove } from "../utils/arrays";

interface Edge<T> {
  readonly target: Entity;
  data: T;
}

interface SourceBucket<T> {
  readonly source: Entity;
  readonly targets: Map<EntityKey, Edge<T>>;
}

interface TargetBucket {
  readonly target: Entity;
  readonly sources: Entity[];
}

const EMPTY: readonly Entity[] = Object.freeze([]);

export class RelationshipStorage<T> {
  private readonly forward = new Map<number, SourceBucket<T>>();
  private readonly reverse = new Map<number, TargetBucket>();
  private edge_count = 0;

  /** Total number of directed edges stored. */
  get count(): number {
    return this.edge_count;
  }

  /**
   * Insert or overwrite the edge source→target. The reverse index holds
   * each source at most once per target.
   */
  add(source: Entity, target: Entity, data: T): void {
    // Buckets left over from an earlier incarnation of either id go first
    const stale_source = this.forward.get(source.id);
    if (stale_source && stale_source.source.generation !== source.generation) {
      this.remove_all(source.id);
    }
    const stale_target = this.reverse.get(target.id);
    if (stale_target && stale_target.target.generation !== target.generation) {
      this.remove_all(target.id);
    }

    let bucket = this.forward.get(source.id);
    if (bucket === undefined) {
      bucket = { source, targets: new Map() };
      this.forward.set(source.id, bucket);
    }

    const key = entity_key(target);
    const existing = bucket.targets.get(key);
    if (existing !== undefined) {
      existing.data = data;
      return;
    }
    bucket.targets.set(key, { target, data });
    this.edge_count++;

    let incoming = this.reverse.get(target.id);
    if (incoming === undefined) {
      incoming = { target, sources: [] };
      this.reverse.set(target.id, incoming);
    }
    incoming.sources.push(source);
  }

  /** Delete source→target from both indices. Returns true if it existed. */
  remove(source: Entity, target: Entity): boolean {
    const bucket = this.source_bucket(source);
    if (bucket === undefined || !bucket.targets.delete(entity_key(target))) {
      return false;
    }
    this.edge_count--;
    if (bucket.targets.size === 0) this.forward.delete(source.id);

    const incoming = this.reverse.get(target.id);
    if (incoming !== undefined) {
      swap_remove(incoming.sources, (s) => s.id === source.id);
      if (incoming.sources.length === 0) this.reverse.delete(target.id);
    }
    return true;
  }

  has(source: Entity, target: Entity): boolean {
    return this.source_bucket(source)?.targets.has(entity_key(target)) ?? false;
  }

  try_get_data(source: Entity, target: Entity): T | undefined {
    return this.source_bucket(source)?.targets.get(entity_key(target))?.data;
  }

  get_targets(source: Entity): Entity[] {
    const bucket = this.source_bucket(source);
    if (bucket === undefined) return [];
    const result: Entity[] = [];
    for (const edge of bucket.targets.values()) result.push(edge.target);
    return result;
  }

  /** Live index bucket of sources pointing at `target`. Do not mutate. */
  get_sources(target: Entity): readonly Entity[] {
    const incoming = this.reverse.get(target.id);
    if (
      incoming === undefined ||
      incoming.target.generation !== target.generation
    ) {
      return EMPTY;
    }
    return incoming.sources;
  }

  /** True if `source` has at least one outgoing edge of this type. */
  has_any_target(source: Entity): boolean {
    return this.source_bucket(source) !== undefined;
  }

  /**
   * Drop every edge in which `entity_id` appears as source or target,
   * on both sides. Called while an entity is being destroyed.
   */
  remove_all(entity_id: number): void {
    const bucket = this.forward.get(entity_id);
    if (bucket !== undefined) {
      for (const edge of bucket.targets.values()) {
        const incoming = this.reverse.get(edge.target.id);
        if (incoming === undefined) continue;
        swap_remove(incoming.sources, (s) => s.id === entity_id);
        if (incoming.sources.length === 0) this.reverse.delete(edge.target.id);
      }
      this.edge_count -= bucket.targets.size;
      this.forward.delete(entity_id);
    }

    const incoming = this.reverse.get(entity_id);
    if (incoming !== undefined) {
      const key = entity_key(incoming.target);
      for (const source of incoming.sources) {
        const source_bucket = this.forward.get(source.id);
        if (source_bucket === undefined) continue;
        if (source_bucket.targets.delete(key)) this.edge_count--;
        if (source_bucket.targets.size === 0) this.forward.delete(source.id);
      }
      this.reverse.delete(entity_id);
    }
  }

  /** Every stored edge as [source, target, data]. */
  *edges(): IterableIterator<[Entity, Entity, T]> {
    for (const bucket of this.forward.values()) {
      for (const edge of bucket.targets.values()) {
        yield [bucket.source, edge.target, edge.data];
      }
    }
  }

  clear(): void {
    this.forward.clear();
    this.reverse.clear();
    this.edge_count = 0;
  }

  //=========================================================
  // Internal
  //=========================================================

  private source_bucket(source: Entity): SourceBucket<T> | undefined {
    const bucket = this.forward.get(source.id);
    if (bucket === undefined || bucket.source.generation !== source.generation) {
      return undefined;
    }
    return bucket;
  }
}
