/***
 * Component — Typed definition tokens.
 *
 * A component type is declared once and referenced by its token
 * everywhere else:
 *
 *   interface Position { x: number; y: number }
 *   const Position = define_component<Position>("Position");
 *
 *   world.add_component(e, Position, { x: 0, y: 0 });
 *   world.get_component(e, Position).x += 1;
 *
 * At runtime a ComponentDef is a frozen { kind, id, name } record. The
 * value type T is erased but carried at compile-time through a phantom
 * property, so ComponentDef<Position> and ComponentDef<Velocity> are
 * distinct types even though both are plain records. Storages are
 * resolved by the integer id; the name only serves as the snapshot key.
 *
 ***/

import { type Brand, validate_and_cast, is_non_negative_integer } from "type_primitives";

export type ComponentID = Brand<number, "component_id">;
export const as_component_id = (value: number) =>
  validate_and_cast<number, ComponentID>(
    value,
    is_non_negative_integer,
    "ComponentID must be a non-negative integer",
  );

// Phantom symbol: never exists at runtime, only gives T a type-level slot.
declare const __value: unique symbol;

export interface ComponentDef<T = unknown> {
  readonly kind: "component";
  readonly id: ComponentID;
  readonly name: string;
  readonly [__value]?: T;
}

/** Value type carried by a component definition. */
export type ComponentValue<D> = D extends ComponentDef<infer T> ? T : never;

let next_component_id = 0;

export function define_component<T>(name: string): ComponentDef<T> {
  return Object.freeze({
    kind: "component",
    id: as_component_id(next_component_id++),
    name,
  });
}
