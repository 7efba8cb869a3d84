/***
 * Relationship — Typed edge definitions.
 *
 * A relationship type is either unidirectional (A→B only) or
 * bidirectional: adding A→B with data D also adds B→A, carrying D
 * unchanged or mirror(D) when the two sides see the edge differently.
 *
 *   const ChildOf = define_relationship("ChildOf");
 *   const MarriedTo = define_relationship("MarriedTo", { bidirectional: true });
 *   const Owes = define_relationship<{ amount: number }>("Owes", {
 *     bidirectional: true,
 *     mirror: (d) => ({ amount: -d.amount }),
 *   });
 *
 * Whether a token is a component or a relationship is fixed here by its
 * `kind`, never probed at runtime.
 *
 ***/

import { type Brand, validate_and_cast, is_non_negative_integer } from "type_primitives";

export type RelationshipID = Brand<number, "relationship_id">;
export const as_relationship_id = (value: number) =>
  validate_and_cast<number, RelationshipID>(
    value,
    is_non_negative_integer,
    "RelationshipID must be a non-negative integer",
  );

export interface RelationshipOptions<T> {
  /** Auto-maintain the inverse edge on add/remove. @default false */
  bidirectional?: boolean;
  /** Data stored on the inverse edge; identity when omitted. */
  mirror?: (data: T) => T;
}

export interface RelationshipDef<T = void> {
  readonly kind: "relationship";
  readonly id: RelationshipID;
  readonly name: string;
  readonly bidirectional: boolean;
  // Method syntax keeps RelationshipDef<T> assignable to RelationshipDef<unknown>
  mirror?(data: T): T;
}

let next_relationship_id = 0;

export function define_relationship<T = void>(
  name: string,
  options?: RelationshipOptions<T>,
): RelationshipDef<T> {
  return Object.freeze({
    kind: "relationship",
    id: as_relationship_id(next_relationship_id++),
    name,
    bidirectional: options?.bidirectional ?? false,
    mirror: options?.mirror,
  });
}

/** Data stored on the inverse edge of a bidirectional relationship. */
export function mirror_data<T>(def: RelationshipDef<T>, data: T): T {
  return def.mirror !== undefined ? def.mirror(data) : data;
}
