/***
 * Snapshot — Versioned plain-data image of a World.
 *
 * A snapshot records entity liveness (generations, free list, retired
 * slots), every component storage by type name, and every relationship
 * edge by type name. Definitions are not serializable, so restoring
 * takes the definitions back from the caller and matches them by name.
 *
 *   const json = serialize_world(world);
 *   const copy = deserialize_world(json, {
 *     components: [Position, Velocity],
 *     relationships: [ChildOf],
 *   });
 *
 * Handles taken from the source World stay valid in the restored one:
 * ids, generations and the free-list order are carried over.
 *
 ***/

import { z } from "zod";
import { create_entity, type Entity } from "../entity/entity";
import type { ComponentDef } from "../component/component";
import type { RelationshipDef } from "../relationship/relationship";
import { World } from "../world/world";
import {
  DEFAULT_MAX_GENERATION,
  MAX_ENTITY_INDEX,
  SNAPSHOT_VERSION,
} from "../utils/constants";
import { ECS_ERROR, ECSError } from "../utils/error";

const IndexSchema = z
  .number()
  .int()
  .min(0, { message: "Expected a non-negative integer" });

const EntitySchema = z.object({
  id: IndexSchema,
  generation: IndexSchema,
});

const ComponentSnapshotSchema = z.object({
  name: z.string().min(1, { message: "Component name cannot be empty" }),
  capacity: z.number().int().positive({ message: "Capacity must be positive" }),
  entries: z.array(z.object({ id: IndexSchema, value: z.unknown() })),
});

const RelationshipSnapshotSchema = z.object({
  name: z.string().min(1, { message: "Relationship name cannot be empty" }),
  bidirectional: z.boolean(),
  edges: z.array(
    z.object({
      source: EntitySchema,
      target: EntitySchema,
      data: z.unknown(),
    }),
  ),
});

export const WorldSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  max_entities: z.number().int().positive().max(MAX_ENTITY_INDEX + 1),
  max_generation: IndexSchema.max(DEFAULT_MAX_GENERATION),
  default_component_capacity: z
    .number()
    .int()
    .positive({ message: "Capacity must be positive" }),
  next_entity_id: IndexSchema,
  generations: z.array(IndexSchema),
  free_ids: z.array(IndexSchema),
  retired_ids: z.array(IndexSchema),
  components: z.array(ComponentSnapshotSchema),
  relationships: z.array(RelationshipSnapshotSchema),
});

export type WorldSnapshot = z.infer<typeof WorldSnapshotSchema>;
export type ComponentSnapshot = z.infer<typeof ComponentSnapshotSchema>;
export type RelationshipSnapshot = z.infer<typeof RelationshipSnapshotSchema>;

export interface RestoreOptions {
  /** Definitions for every component type named in the snapshot. */
  components?: readonly ComponentDef<unknown>[];
  /** Definitions for every relationship type named in the snapshot. */
  relationships?: readonly RelationshipDef<unknown>[];
  /** Skip types with no matching definition instead of throwing. */
  ignore_unknown?: boolean;
  /** Receives a line for each skipped type. @default console.warn */
  warn?: (message: string) => void;
}

//=========================================================
// Export
//=========================================================

export function create_snapshot(world: World): WorldSnapshot {
  const state = world._entity_state();

  const components: ComponentSnapshot[] = [];
  for (const { def, storage } of world.component_entries()) {
    const ids = storage.packed_entities;
    const values = storage.packed_components;
    components.push({
      name: def.name,
      capacity: storage.capacity,
      entries: ids.map((id, i) => ({
        id,
        value: clone_value(values[i], "component", def.name),
      })),
    });
  }

  const relationships: RelationshipSnapshot[] = [];
  for (const { name, bidirectional, storage } of world.relationship_entries()) {
    const edges: RelationshipSnapshot["edges"] = [];
    for (const [source, target, data] of storage.edges()) {
      edges.push({
        source: plain_entity(source),
        target: plain_entity(target),
        data: clone_value(data, "relationship", name),
      });
    }
    relationships.push({ name, bidirectional, edges });
  }

  return {
    version: SNAPSHOT_VERSION,
    max_entities: world.max_entities,
    max_generation: world.max_generation,
    default_component_capacity: world.default_component_capacity,
    next_entity_id: state.next_entity_id,
    generations: state.generations.slice(),
    free_ids: state.free_ids.slice(),
    retired_ids: state.retired_ids.slice(),
    components,
    relationships,
  };
}

export function serialize_world(world: World): string {
  return JSON.stringify(create_snapshot(world));
}

//=========================================================
// Import
//=========================================================

/**
 * Build a new World from a snapshot. Throws INVALID_SNAPSHOT when the
 * input is malformed or inconsistent, and UNKNOWN_SNAPSHOT_TYPE when a
 * type has no definition and `ignore_unknown` is not set.
 */
export function restore_snapshot(input: unknown, options: RestoreOptions = {}): World {
  const parsed = WorldSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
    );
    throw new ECSError(
      ECS_ERROR.INVALID_SNAPSHOT,
      `Invalid snapshot: ${issues.join("; ")}`,
      { issues },
    );
  }
  const snapshot = parsed.data;
  const warn = options.warn ?? console.warn;

  const world = new World({
    max_entities: snapshot.max_entities,
    max_generation: snapshot.max_generation,
    default_component_capacity: snapshot.default_component_capacity,
  });
  world._restore_entity_state({
    next_entity_id: snapshot.next_entity_id,
    generations: snapshot.generations,
    free_ids: snapshot.free_ids,
    retired_ids: snapshot.retired_ids,
  });

  const component_defs = by_name(options.components ?? []);
  for (const entry of snapshot.components) {
    const def = component_defs.get(entry.name);
    if (def === undefined) {
      skip_or_throw("component", entry.name, options.ignore_unknown, warn);
      continue;
    }
    const storage = world._ensure_component_storage(def, entry.capacity);
    for (const { id, value } of entry.entries) {
      if (world.entity_at(id) === undefined) {
        throw invalid(`Component "${entry.name}" is attached to dead entity ${id}`);
      }
      if (!storage.add(id, value)) {
        throw invalid(
          `Component "${entry.name}" cannot be restored for entity ${id} (duplicate or over capacity)`,
        );
      }
    }
  }

  const relationship_defs = by_name(options.relationships ?? []);
  for (const entry of snapshot.relationships) {
    const def = relationship_defs.get(entry.name);
    if (def === undefined) {
      skip_or_throw("relationship", entry.name, options.ignore_unknown, warn);
      continue;
    }
    if (def.bidirectional !== entry.bidirectional) {
      throw invalid(
        `Relationship "${entry.name}" is ${entry.bidirectional ? "" : "not "}bidirectional in the snapshot`,
      );
    }
    // Both directions of bidirectional edges are stored, so no mirroring here
    const storage = world._ensure_relationship_storage(def);
    for (const edge of entry.edges) {
      storage.add(
        live_entity(world, edge.source, entry.name),
        live_entity(world, edge.target, entry.name),
        edge.data,
      );
    }
  }

  return world;
}

export function deserialize_world(json: string, options?: RestoreOptions): World {
  let input: unknown;
  try {
    input = JSON.parse(json);
  } catch (error) {
    throw new ECSError(
      ECS_ERROR.INVALID_SNAPSHOT,
      `Snapshot is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return restore_snapshot(input, options);
}

//=========================================================
// Helpers
//=========================================================

function plain_entity(entity: Entity): { id: number; generation: number } {
  return { id: entity.id, generation: entity.generation };
}

function clone_value<T>(value: T, kind: string, name: string): T {
  try {
    return structuredClone(value);
  } catch (error) {
    throw new ECSError(
      ECS_ERROR.INVALID_SNAPSHOT,
      `Data of ${kind} "${name}" cannot be cloned`,
      { kind, name, cause: error },
    );
  }
}

function by_name<D extends { readonly name: string }>(defs: readonly D[]): Map<string, D> {
  const map = new Map<string, D>();
  for (const def of defs) map.set(def.name, def);
  return map;
}

function skip_or_throw(
  kind: string,
  name: string,
  ignore_unknown: boolean | undefined,
  warn: (message: string) => void,
): void {
  if (!ignore_unknown) {
    throw new ECSError(
      ECS_ERROR.UNKNOWN_SNAPSHOT_TYPE,
      `No definition given for ${kind} "${name}"`,
      { kind, name },
    );
  }
  warn(`Skipping ${kind} "${name}": no definition given`);
}

function live_entity(
  world: World,
  handle: { id: number; generation: number },
  relationship: string,
): Entity {
  const entity = create_entity(handle.id, handle.generation);
  if (!world.is_alive(entity)) {
    throw invalid(`Relationship "${relationship}" references dead entity ${handle.id}v${handle.generation}`);
  }
  return entity;
}

function invalid(message: string): ECSError {
  return new ECSError(ECS_ERROR.INVALID_SNAPSHOT, message);
}
