/***
 * Entity — Generational handle (id + generation).
 *
 * An Entity is a frozen plain value: `id` indexes into every per-type
 * storage, `generation` records which incarnation of that slot the
 * handle was issued for. When a slot is destroyed its generation is
 * bumped, so every handle still carrying the old generation reads as
 * dead. Handles hold no reference back to the World; all operations
 * take (world, entity) explicitly.
 *
 *   const e = world.create_entity();   // { id: 3, generation: 0 }
 *   world.destroy_entity(e);
 *   const f = world.create_entity();   // { id: 3, generation: 1 }
 *   world.is_alive(e);                 // false
 *
 ***/

import { GENERATION_SPAN } from "../utils/constants";

export interface Entity {
  readonly id: number;
  readonly generation: number;
}

/** Numeric key unique per (id, generation) pair. */
export type EntityKey = number;

export const create_entity = (id: number, generation: number): Entity =>
  Object.freeze({ id, generation });

export const entity_key = (entity: Entity): EntityKey =>
  entity.id * GENERATION_SPAN + entity.generation;

export const entities_equal = (a: Entity, b: Entity): boolean =>
  a.id === b.id && a.generation === b.generation;

export const format_entity = (entity: Entity): string =>
  `Entity(${entity.id}v${entity.generation})`;
