/***
 *
 * EntityRegistry - Allocates and recycles generational entity handles.
 *
 * Slots are handed out from a LIFO free list first, then from a
 * high-water mark bounded by max_entities. Destroying a slot bumps its
 * generation; a slot whose generation is already at max_generation is
 * retired instead of recycled, so an exhausted counter can never make a
 * stale handle look alive again.
 *
 * The registry only tracks liveness. Purging components and
 * relationship edges is the World's job and happens before destroy().
 *
 ***/

import { create_entity, type Entity } from "./entity";
import { grow_number_array } from "../utils/arrays";
import {
  DEFAULT_MAX_ENTITIES,
  DEFAULT_MAX_GENERATION,
  INITIAL_GENERATION,
  INITIAL_STORAGE_SIZE,
  MAX_ENTITY_INDEX,
} from "../utils/constants";
import { ECS_ERROR, ECSError } from "../utils/error";

export interface EntityRegistryOptions {
  max_entities?: number;
  max_generation?: number;
}

/** Plain-data view of the registry used by snapshots. */
export interface EntityRegistryState {
  readonly next_entity_id: number;
  readonly generations: readonly number[];
  readonly free_ids: readonly number[];
  readonly retired_ids: readonly number[];
}

export class EntityRegistry {
  public readonly max_entities: number;
  public readonly max_generation: number;

  private generations: number[];
  // 1 while the slot holds a live entity, 0 while free or retired
  private live: number[];
  private high_water = 0;
  private free_ids: number[] = [];
  private retired: Set<number> = new Set();
  private alive_count = 0;

  constructor(options?: EntityRegistryOptions) {
    this.max_entities = options?.max_entities ?? DEFAULT_MAX_ENTITIES;
    this.max_generation = options?.max_generation ?? DEFAULT_MAX_GENERATION;

    if (
      !Number.isInteger(this.max_entities) ||
      this.max_entities < 1 ||
      this.max_entities > MAX_ENTITY_INDEX + 1
    ) {
      throw new ECSError(
        ECS_ERROR.INVALID_OPTIONS,
        `max_entities must be an integer in [1, ${MAX_ENTITY_INDEX + 1}]`,
        { max_entities: this.max_entities },
      );
    }
    if (
      !Number.isInteger(this.max_generation) ||
      this.max_generation < INITIAL_GENERATION ||
      this.max_generation > DEFAULT_MAX_GENERATION
    ) {
      throw new ECSError(
        ECS_ERROR.INVALID_OPTIONS,
        "max_generation must fit in an unsigned 32-bit integer",
        { max_generation: this.max_generation },
      );
    }

    const initial = Math.min(INITIAL_STORAGE_SIZE, this.max_entities);
    this.generations = new Array(initial).fill(INITIAL_GENERATION);
    this.live = new Array(initial).fill(0);
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of entities currently alive. */
  public get count(): number {
    return this.alive_count;
  }

  /** Next never-used id; every id below it has been issued at least once. */
  public get next_entity_id(): number {
    return this.high_water;
  }

  /** Slots permanently withdrawn after their generation saturated. */
  public get retired_count(): number {
    return this.retired.size;
  }

  /**
   * A handle is alive iff its id has been issued, the slot is not
   * sitting in the free list, and the generation matches.
   */
  public is_alive(entity: Entity): boolean {
    const id = entity.id;
    return (
      id >= 0 &&
      id < this.high_water &&
      this.generations[id] === entity.generation &&
      this.live[id] === 1
    );
  }

  /** Current live handle for a slot, or undefined if the slot is vacant. */
  public entity_at(id: number): Entity | undefined {
    if (!Number.isInteger(id) || id < 0 || id >= this.high_water) {
      return undefined;
    }
    if (this.live[id] !== 1) return undefined;
    return create_entity(id, this.generations[id]);
  }

  /** Current generation recorded for a slot (stale once destroyed). */
  public generation_of(id: number): number | undefined {
    if (id < 0 || id >= this.high_water) return undefined;
    return this.generations[id];
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Allocate an entity.
   *
   * Recycled slots come first (their generation was already bumped
   * during destroy). Otherwise a fresh slot starts at the initial
   * generation. Throws CAPACITY_EXCEEDED once every id up to
   * max_entities is live or retired.
   */
  public create_entity(): Entity {
    let id: number;

    const recycled = this.free_ids.pop();
    if (recycled !== undefined) {
      id = recycled;
    } else {
      if (this.high_water >= this.max_entities) {
        throw new ECSError(
          ECS_ERROR.CAPACITY_EXCEEDED,
          `Maximum number of entities (${this.max_entities}) reached`,
          { max_entities: this.max_entities },
        );
      }
      id = this.high_water++;
      if (id >= this.generations.length) this.grow(id + 1);
      this.generations[id] = INITIAL_GENERATION;
    }

    this.live[id] = 1;
    this.alive_count++;
    return create_entity(id, this.generations[id]);
  }

  /**
   * Destroy a living entity. No-op for a dead or foreign handle.
   *
   * Bumps the slot's generation so the handle goes stale, then returns
   * the id to the free list. At max_generation the slot is retired.
   */
  public destroy(entity: Entity): void {
    if (!this.is_alive(entity)) return;

    const id = entity.id;
    this.live[id] = 0;
    this.alive_count--;

    if (entity.generation >= this.max_generation) {
      this.retired.add(id);
      return;
    }

    this.generations[id] = entity.generation + 1;
    this.free_ids.push(id);
  }

  //=========================================================
  // Snapshot
  //=========================================================

  public export_state(): EntityRegistryState {
    return {
      next_entity_id: this.high_water,
      generations: this.generations.slice(0, this.high_water),
      free_ids: this.free_ids.slice(),
      retired_ids: [...this.retired],
    };
  }

  /**
   * Replace the registry contents with a previously exported state.
   * Every issued id that is neither free nor retired becomes alive.
   */
  public restore_state(state: EntityRegistryState): void {
    const next = state.next_entity_id;
    if (next > this.max_entities || state.generations.length !== next) {
      throw new ECSError(
        ECS_ERROR.INVALID_SNAPSHOT,
        "Entity state does not fit this registry",
        { next_entity_id: next, max_entities: this.max_entities },
      );
    }

    if (state.generations.some((g) => g > this.max_generation)) {
      throw new ECSError(
        ECS_ERROR.INVALID_SNAPSHOT,
        `Entity generation exceeds max_generation (${this.max_generation})`,
      );
    }

    const vacant = new Set<number>();
    for (const id of [...state.free_ids, ...state.retired_ids]) {
      if (id < 0 || id >= next || vacant.has(id)) {
        throw new ECSError(
          ECS_ERROR.INVALID_SNAPSHOT,
          `Vacant id ${id} is out of range or listed twice`,
        );
      }
      vacant.add(id);
    }

    const size = Math.min(
      Math.max(next, INITIAL_STORAGE_SIZE),
      this.max_entities,
    );
    this.generations = grow_number_array(
      state.generations.slice(),
      size,
      INITIAL_GENERATION,
    );
    this.live = new Array(this.generations.length).fill(0);
    for (let id = 0; id < next; id++) {
      if (!vacant.has(id)) this.live[id] = 1;
    }
    this.high_water = next;
    this.free_ids = state.free_ids.slice();
    this.retired = new Set(state.retired_ids);
    this.alive_count = next - vacant.size;
  }

  //=========================================================
  // Internal
  //=========================================================

  private grow(min_capacity: number): void {
    const target = Math.min(min_capacity, this.max_entities);
    this.generations = grow_number_array(
      this.generations,
      target,
      INITIAL_GENERATION,
    );
    this.live = grow_number_array(this.live, target, 0);
  }
}
