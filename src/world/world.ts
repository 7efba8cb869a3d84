/***
 * World — Public ECS facade.
 *
 * Owns the entity registry, one SparseSetStorage per component type and
 * one RelationshipStorage per relationship type, all keyed by the integer
 * id of their definition token. Storages are created on explicit
 * registration or lazily on first write, and live as long as the World.
 *
 *   const Position = define_component<{ x: number; y: number }>("Position");
 *   const Velocity = define_component<{ dx: number; dy: number }>("Velocity");
 *   const ChildOf = define_relationship("ChildOf");
 *
 *   const world = new World({ max_entities: 10_000 });
 *   const parent = world.create_entity();
 *   const e = world.create_entity();
 *   world.add_component(e, Position, { x: 0, y: 0 });
 *   world.add_component(e, Velocity, { dx: 1, dy: 0 });
 *   world.add_relationship(e, ChildOf, parent);
 *
 *   const moving = world.query().with(Position).with(Velocity).build();
 *   for (const row of moving) {
 *     const pos = row.get(Position);
 *     const vel = row.get(Velocity);
 *     pos.x += vel.dx;
 *     pos.y += vel.dy;
 *   }
 *
 * Hot-path operations fail silently: add/remove/set on a dead entity,
 * a duplicate add, or a missing component are no-ops. Only operations
 * with no sensible fallback throw an ECSError (reading a component from
 * a dead entity, overflowing a full storage, building an empty query).
 *
 * Single-owner and synchronous: nothing here is safe to share between
 * threads without external locking.
 *
 ***/

import { is_positive_integer, unsafe_cast } from "type_primitives";
import { type Entity, format_entity } from "../entity/entity";
import { EntityRegistry, type EntityRegistryState } from "../entity/entity_registry";
import type { ComponentDef, ComponentID } from "../component/component";
import {
  mirror_data,
  type RelationshipDef,
  type RelationshipID,
} from "../relationship/relationship";
import { RelationshipStorage } from "../relationship/relationship_storage";
import { SparseSetStorage } from "../store/sparse_set_storage";
import { QueryBuilder, type QueryResolver } from "../query/query";
import {
  as_system_id,
  type SystemConfig,
  type SystemDescriptor,
} from "../system/system";
import { ECS_ERROR, ECSError } from "../utils/error";

/** Named per-entity operation bound with World.register_function. */
export type EntityFunction = (
  entity: Entity,
  world: World,
  ...args: unknown[]
) => void;

export interface WorldOptions {
  /** Size of the entity id universe. @default 5000 */
  max_entities?: number;
  /** Packed capacity for storages registered without one. @default max_entities */
  default_component_capacity?: number;
  /** Generation ceiling; a slot reaching it is retired. @default 0xFFFFFFFF */
  max_generation?: number;
}

/** Registered component type with its storage. */
export interface ComponentEntry {
  readonly def: ComponentDef<unknown>;
  readonly storage: SparseSetStorage<unknown>;
}

/** Registered relationship type with its storage. */
export interface RelationshipEntry {
  readonly name: string;
  readonly bidirectional: boolean;
  readonly storage: RelationshipStorage<unknown>;
}

export class World implements QueryResolver {
  private readonly registry: EntityRegistry;
  private readonly default_capacity: number;

  private readonly components: Map<ComponentID, ComponentEntry> = new Map();
  private readonly relationships: Map<RelationshipID, RelationshipEntry> =
    new Map();
  // Names are snapshot keys, so each may be bound to one definition only
  private readonly component_names: Map<string, ComponentID> = new Map();
  private readonly relationship_names: Map<string, RelationshipID> = new Map();

  private readonly functions: Map<string, EntityFunction> = new Map();
  private readonly systems: SystemDescriptor[] = [];
  private next_system_id = 0;

  constructor(options?: WorldOptions) {
    this.registry = new EntityRegistry({
      max_entities: options?.max_entities,
      max_generation: options?.max_generation,
    });
    this.default_capacity =
      options?.default_component_capacity ?? this.registry.max_entities;
    this.check_capacity(this.default_capacity);
  }

  //=========================================================
  // Entities
  //=========================================================

  public get max_entities(): number {
    return this.registry.max_entities;
  }

  /** Packed capacity given to storages registered without one. */
  public get default_component_capacity(): number {
    return this.default_capacity;
  }

  public get max_generation(): number {
    return this.registry.max_generation;
  }

  /** Number of entities currently alive. */
  public get entity_count(): number {
    return this.registry.count;
  }

  public create_entity(): Entity {
    return this.registry.create_entity();
  }

  public is_alive(entity: Entity): boolean {
    return this.registry.is_alive(entity);
  }

  /** Live handle currently occupying `id`, if any. */
  public entity_at(id: number): Entity | undefined {
    return this.registry.entity_at(id);
  }

  /**
   * Destroy an entity: drop its components from every storage, drop
   * every relationship edge it takes part in, then recycle the id.
   * No-op for a dead handle.
   */
  public destroy_entity(entity: Entity): void {
    if (!this.registry.is_alive(entity)) return;

    for (const entry of this.components.values()) {
      entry.storage.remove(entity.id);
    }
    for (const entry of this.relationships.values()) {
      entry.storage.remove_all(entity.id);
    }
    this.registry.destroy(entity);
  }

  //=========================================================
  // Components
  //=========================================================

  /**
   * Create the backing storage for a component type. Idempotent; the
   * capacity of an already registered type is left unchanged.
   */
  public register_component<T>(def: ComponentDef<T>, capacity?: number): this {
    this._ensure_component_storage(def, capacity);
    return this;
  }

  public is_component_registered<T>(def: ComponentDef<T>): boolean {
    return this.components.has(def.id);
  }

  /**
   * Attach a component. No-op if the entity is dead or already has one
   * of this type; throws CAPACITY_EXCEEDED if the storage is full.
   */
  public add_component<T>(entity: Entity, def: ComponentDef<T>, value: T): this {
    if (!this.registry.is_alive(entity)) return this;
    const storage = this._ensure_component_storage(def);
    if (storage.has(entity.id)) return this;
    this.insert(storage, entity, def, value);
    return this;
  }

  /** Upsert: replace the existing value or attach a new one. */
  public set_component<T>(entity: Entity, def: ComponentDef<T>, value: T): this {
    if (!this.registry.is_alive(entity)) return this;
    const storage = this._ensure_component_storage(def);
    if (storage.has(entity.id)) {
      storage.set(entity.id, value);
      return this;
    }
    this.insert(storage, entity, def, value);
    return this;
  }

  public remove_component<T>(entity: Entity, def: ComponentDef<T>): this {
    if (!this.registry.is_alive(entity)) return this;
    this._component_storage(def)?.remove(entity.id);
    return this;
  }

  public has_component<T>(entity: Entity, def: ComponentDef<T>): boolean {
    if (!this.registry.is_alive(entity)) return false;
    return this._component_storage(def)?.has(entity.id) ?? false;
  }

  /**
   * Read a component. Throws ENTITY_NOT_ALIVE for a dead handle and
   * COMPONENT_NOT_FOUND when the entity lacks the component. Object
   * values are returned by reference, so field writes land in storage.
   */
  public get_component<T>(entity: Entity, def: ComponentDef<T>): T {
    if (!this.registry.is_alive(entity)) {
      throw new ECSError(
        ECS_ERROR.ENTITY_NOT_ALIVE,
        `${format_entity(entity)} is not alive`,
        { id: entity.id, generation: entity.generation },
      );
    }
    const storage = this._component_storage(def);
    if (storage === undefined || !storage.has(entity.id)) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_FOUND,
        `${format_entity(entity)} has no "${def.name}" component`,
        { id: entity.id, component: def.name },
      );
    }
    return storage.get(entity.id);
  }

  public try_get_component<T>(entity: Entity, def: ComponentDef<T>): T | undefined {
    if (!this.registry.is_alive(entity)) return undefined;
    return this._component_storage(def)?.try_get(entity.id);
  }

  public get_or_default<T>(entity: Entity, def: ComponentDef<T>, fallback: T): T {
    const value = this.try_get_component(entity, def);
    return value === undefined ? fallback : value;
  }

  /**
   * Return the entity's component, attaching `initial` first if it has
   * none. Throws ENTITY_NOT_ALIVE for a dead handle.
   */
  public ensure_component<T>(entity: Entity, def: ComponentDef<T>, initial: T): T {
    if (!this.has_component(entity, def)) {
      this.add_component(entity, def, initial);
    }
    return this.get_component(entity, def);
  }

  /**
   * Replace the component value with `fn(current)`. Returns false,
   * changing nothing, if the entity is dead or lacks the component.
   */
  public transform_component<T>(
    entity: Entity,
    def: ComponentDef<T>,
    fn: (current: T) => T,
  ): boolean {
    if (!this.registry.is_alive(entity)) return false;
    const storage = this._component_storage(def);
    if (storage === undefined || !storage.has(entity.id)) return false;
    storage.set(entity.id, fn(storage.get(entity.id)));
    return true;
  }

  public has_all(entity: Entity, ...defs: ComponentDef<unknown>[]): boolean {
    return defs.every((def) => this.has_component(entity, def));
  }

  public has_any(entity: Entity, ...defs: ComponentDef<unknown>[]): boolean {
    return defs.some((def) => this.has_component(entity, def));
  }

  //=========================================================
  // Relationships
  //=========================================================

  /** Create the edge storage for a relationship type. Idempotent. */
  public register_relationship<T>(def: RelationshipDef<T>): this {
    this._ensure_relationship_storage(def);
    return this;
  }

  public is_relationship_registered<T>(def: RelationshipDef<T>): boolean {
    return this.relationships.has(def.id);
  }

  /**
   * Add source→target. For a bidirectional type the inverse edge is
   * added too, carrying def.mirror(data) or data itself. No-op if either
   * endpoint is dead; an existing edge has its data overwritten.
   */
  public add_relationship(
    source: Entity,
    def: RelationshipDef<void>,
    target: Entity,
  ): this;
  public add_relationship<T>(
    source: Entity,
    def: RelationshipDef<T>,
    target: Entity,
    data: T,
  ): this;
  public add_relationship<T>(
    source: Entity,
    def: RelationshipDef<T>,
    target: Entity,
    data?: T,
  ): this {
    if (!this.registry.is_alive(source) || !this.registry.is_alive(target)) {
      return this;
    }
    const storage = this._ensure_relationship_storage(def);
    // void relationships carry undefined as their data
    const value = unsafe_cast<T>(data);
    storage.add(source, target, value);
    if (def.bidirectional && source.id !== target.id) {
      storage.add(target, source, mirror_data(def, value));
    }
    return this;
  }

  /** Remove source→target, and target→source for bidirectional types. */
  public remove_relationship<T>(
    source: Entity,
    def: RelationshipDef<T>,
    target: Entity,
  ): this {
    const storage = this._relationship_storage(def);
    if (storage === undefined) return this;
    storage.remove(source, target);
    if (def.bidirectional) storage.remove(target, source);
    return this;
  }

  public has_relationship<T>(
    source: Entity,
    def: RelationshipDef<T>,
    target: Entity,
  ): boolean {
    return this._relationship_storage(def)?.has(source, target) ?? false;
  }

  public get_relationship_data<T>(
    source: Entity,
    def: RelationshipDef<T>,
    target: Entity,
  ): T | undefined {
    return this._relationship_storage(def)?.try_get_data(source, target);
  }

  /** Entities `source` points at through this relationship. */
  public get_relationship_targets<T>(
    source: Entity,
    def: RelationshipDef<T>,
  ): Entity[] {
    return this._relationship_storage(def)?.get_targets(source) ?? [];
  }

  /** Entities pointing at `target` through this relationship. */
  public get_relationship_sources<T>(
    target: Entity,
    def: RelationshipDef<T>,
  ): Entity[] {
    return this._relationship_storage(def)?.get_sources(target).slice() ?? [];
  }

  //=========================================================
  // Queries
  //=========================================================

  public query(): QueryBuilder {
    return new QueryBuilder(this);
  }

  /** QueryResolver: storage for a component type, if registered. */
  public _component_storage<T>(def: ComponentDef<T>): SparseSetStorage<T> | undefined {
    const entry = this.components.get(def.id);
    return entry === undefined
      ? undefined
      : unsafe_cast<SparseSetStorage<T>>(entry.storage);
  }

  /** QueryResolver: edge storage for a relationship type, if registered. */
  public _relationship_storage<T>(
    def: RelationshipDef<T>,
  ): RelationshipStorage<T> | undefined {
    const entry = this.relationships.get(def.id);
    return entry === undefined
      ? undefined
      : unsafe_cast<RelationshipStorage<T>>(entry.storage);
  }

  //=========================================================
  // Entity functions
  //=========================================================

  /** Bind `fn` to `name`, replacing any function already bound to it. */
  public register_function(name: string, fn: EntityFunction): this {
    this.functions.set(name, fn);
    return this;
  }

  public has_function(name: string): boolean {
    return this.functions.has(name);
  }

  public remove_function(name: string): boolean {
    return this.functions.delete(name);
  }

  /**
   * Call the function bound to `name` on an entity. Returns false,
   * calling nothing, if the entity is dead or no function is bound.
   * Errors thrown by the function propagate to the caller.
   */
  public invoke_function(
    entity: Entity,
    name: string,
    ...args: unknown[]
  ): boolean {
    if (!this.registry.is_alive(entity)) return false;
    const fn = this.functions.get(name);
    if (fn === undefined) return false;
    fn(entity, this, ...args);
    return true;
  }

  //=========================================================
  // Systems
  //=========================================================

  public register_system(config: SystemConfig): SystemDescriptor {
    const id = as_system_id(this.next_system_id++);
    const descriptor: SystemDescriptor = Object.freeze(
      Object.assign({ id }, config),
    );
    this.systems.push(descriptor);
    descriptor.on_added?.(this);
    return descriptor;
  }

  public remove_system(system: SystemDescriptor): void {
    const index = this.systems.findIndex((s) => s.id === system.id);
    if (index === -1) return;
    this.systems.splice(index, 1);
    system.on_removed?.();
  }

  public get system_count(): number {
    return this.systems.length;
  }

  /** Run every registered system once, in registration order. */
  public update(delta_time: number): void {
    // Copy so a system may remove itself or others mid-update
    for (const system of this.systems.slice()) {
      system.fn(this, delta_time);
    }
  }

  //=========================================================
  // Snapshot support
  //=========================================================

  public component_entries(): IterableIterator<ComponentEntry> {
    return this.components.values();
  }

  public relationship_entries(): IterableIterator<RelationshipEntry> {
    return this.relationships.values();
  }

  public _entity_state(): EntityRegistryState {
    return this.registry.export_state();
  }

  /** Replace entity liveness wholesale. Only valid on a World with no data. */
  public _restore_entity_state(state: EntityRegistryState): void {
    if (this.registry.next_entity_id !== 0) {
      throw new ECSError(
        ECS_ERROR.INVALID_SNAPSHOT,
        "Entity state can only be restored into an empty World",
      );
    }
    this.registry.restore_state(state);
  }

  //=========================================================
  // Internal
  //=========================================================

  private insert<T>(
    storage: SparseSetStorage<T>,
    entity: Entity,
    def: ComponentDef<T>,
    value: T,
  ): void {
    if (storage.add(entity.id, value)) return;
    if (storage.is_full) {
      throw new ECSError(
        ECS_ERROR.CAPACITY_EXCEEDED,
        `Storage for "${def.name}" is full (${storage.capacity})`,
        { component: def.name, capacity: storage.capacity },
      );
    }
  }

  /** Storage for a component type, registering it first if needed. */
  public _ensure_component_storage<T>(
    def: ComponentDef<T>,
    capacity?: number,
  ): SparseSetStorage<T> {
    const existing = this._component_storage(def);
    if (existing !== undefined) return existing;

    const cap = capacity ?? this.default_capacity;
    this.check_capacity(cap);
    this.claim_name(this.component_names, def.name, def.id, "component");

    const storage = new SparseSetStorage<T>(cap, this.registry.max_entities);
    this.components.set(def.id, {
      def,
      storage: unsafe_cast<SparseSetStorage<unknown>>(storage),
    });
    return storage;
  }

  public _ensure_relationship_storage<T>(
    def: RelationshipDef<T>,
  ): RelationshipStorage<T> {
    const existing = this._relationship_storage(def);
    if (existing !== undefined) return existing;

    this.claim_name(this.relationship_names, def.name, def.id, "relationship");
    const storage = new RelationshipStorage<T>();
    this.relationships.set(def.id, {
      name: def.name,
      bidirectional: def.bidirectional,
      storage: unsafe_cast<RelationshipStorage<unknown>>(storage),
    });
    return storage;
  }

  private claim_name<K>(
    names: Map<string, K>,
    name: string,
    id: K,
    kind: string,
  ): void {
    const owner = names.get(name);
    if (owner !== undefined && owner !== id) {
      throw new ECSError(
        ECS_ERROR.DUPLICATE_NAME,
        `Another ${kind} type is already registered as "${name}"`,
        { name },
      );
    }
    names.set(name, id);
  }

  private check_capacity(capacity: number): void {
    if (!is_positive_integer(capacity)) {
      throw new ECSError(
        ECS_ERROR.INVALID_OPTIONS,
        "Component capacity must be a positive integer",
        { capacity },
      );
    }
  }
}
