/***
 * QueryBuilder, Query, QueryRow — Declarative entity queries.
 *
 * A QueryBuilder accumulates clauses without touching the World; every
 * clause returns a new builder. build() validates the clause set and
 * returns an immutable Query:
 *
 *   const q = world
 *     .query()
 *     .with(Position)
 *     .optional(Velocity)
 *     .without(Frozen)
 *     .where(Health, (h) => h.hp > 0)
 *     .with_relationship(ChildOf, parent)
 *     .build();
 *
 *   for (const row of q) {
 *     const pos = row.get(Position);
 *     const vel = row.get_optional(Velocity);
 *     if (vel) { pos.x += vel.dx; pos.y += vel.dy; }
 *   }
 *
 * A Query is not a snapshot. Each iteration opens a fresh cursor that
 * picks its driver against the current World state:
 *
 *   1. the smallest storage among the `with` types (component driver)
 *   2. the smallest source list among targeted relationship clauses
 *   3. whichever of the two is smaller; ties go to the component driver
 *
 * Only the driver is scanned. Every other clause filters candidates in
 * this order, stopping at the first failure: liveness, other required
 * components, excluded components, relationship edges, predicates.
 *
 * Component values are read from storage when a row is accessed, so
 * in-place writes made earlier in a pass are visible later in it.
 * Adding/removing components or destroying entities mid-iteration is
 * not supported and gives unreliable results.
 *
 ***/

import { type Entity, format_entity } from "../entity/entity";
import type { ComponentDef } from "../component/component";
import type { RelationshipDef } from "../relationship/relationship";
import type { RelationshipStorage } from "../relationship/relationship_storage";
import type { SparseSetStorage } from "../store/sparse_set_storage";
import { ECS_ERROR, ECSError } from "../utils/error";

const EMPTY_IDS: readonly number[] = Object.freeze([]);

/** World-side lookups a query needs while planning and iterating. */
export interface QueryResolver {
  is_alive(entity: Entity): boolean;
  entity_at(id: number): Entity | undefined;
  _component_storage<T>(def: ComponentDef<T>): SparseSetStorage<T> | undefined;
  _relationship_storage<T>(
    def: RelationshipDef<T>,
  ): RelationshipStorage<T> | undefined;
}

//=========================================================
// Clauses
//=========================================================

interface PredicateClause {
  readonly def: ComponentDef<unknown>;
  /** Bind to the current storage; the returned test takes an entity id. */
  bind(resolver: QueryResolver): (id: number) => boolean;
}

interface RelationshipClause {
  readonly name: string;
  readonly target: Entity | undefined;
  is_registered(resolver: QueryResolver): boolean;
  /** Candidate sources for a targeted clause. */
  sources(resolver: QueryResolver): readonly Entity[];
  bind(resolver: QueryResolver): (entity: Entity) => boolean;
}

interface Clauses {
  readonly with: readonly ComponentDef<unknown>[];
  readonly without: readonly ComponentDef<unknown>[];
  readonly optional: readonly ComponentDef<unknown>[];
  readonly where: readonly PredicateClause[];
  readonly relationships: readonly RelationshipClause[];
}

const NO_CLAUSES: Clauses = {
  with: [],
  without: [],
  optional: [],
  where: [],
  relationships: [],
};

const append_def = (
  defs: readonly ComponentDef<unknown>[],
  def: ComponentDef<unknown>,
): readonly ComponentDef<unknown>[] =>
  defs.some((d) => d.id === def.id) ? defs : [...defs, def];

//=========================================================
// QueryBuilder
//=========================================================

export class QueryBuilder<
  R extends ComponentDef<unknown> = never,
  O extends ComponentDef<unknown> = never,
> {
  constructor(
    private readonly _resolver: QueryResolver,
    private readonly _clauses: Clauses = NO_CLAUSES,
  ) {}

  /** Require the component. */
  with<T>(def: ComponentDef<T>): QueryBuilder<R | ComponentDef<T>, O> {
    return this.extend<R | ComponentDef<T>, O>({
      with: append_def(this._clauses.with, def),
    });
  }

  /** Reject entities that carry the component. */
  without<T>(def: ComponentDef<T>): QueryBuilder<R, O> {
    return this.extend<R, O>({
      without: append_def(this._clauses.without, def),
    });
  }

  /** Expose the component on rows when present, without filtering on it. */
  optional<T>(def: ComponentDef<T>): QueryBuilder<R, O | ComponentDef<T>> {
    return this.extend<R, O | ComponentDef<T>>({
      optional: append_def(this._clauses.optional, def),
    });
  }

  /**
   * Keep entities whose component value passes `predicate`. The
   * component becomes required if it was not already.
   */
  where<T>(
    def: ComponentDef<T>,
    predicate: (value: T) => boolean,
  ): QueryBuilder<R | ComponentDef<T>, O> {
    const clause: PredicateClause = {
      def,
      bind(resolver) {
        const storage = resolver._component_storage(def);
        if (storage === undefined) return () => false;
        return (id) => storage.has(id) && predicate(storage.get(id));
      },
    };
    return this.extend<R | ComponentDef<T>, O>({
      with: append_def(this._clauses.with, def),
      where: [...this._clauses.where, clause],
    });
  }

  /**
   * Require an edge of this relationship type from the entity. With a
   * target, the edge must point at it and the clause may drive the scan;
   * without one, any outgoing edge of the type matches.
   */
  with_relationship<T>(
    def: RelationshipDef<T>,
    target?: Entity,
  ): QueryBuilder<R, O> {
    const clause: RelationshipClause = {
      name: def.name,
      target,
      is_registered: (resolver) =>
        resolver._relationship_storage(def) !== undefined,
      sources(resolver) {
        if (target === undefined) return [];
        return resolver._relationship_storage(def)?.get_sources(target) ?? [];
      },
      bind(resolver) {
        const storage = resolver._relationship_storage(def);
        if (storage === undefined) return () => false;
        if (target === undefined) return (e) => storage.has_any_target(e);
        return (e) => storage.has(e, target);
      },
    };
    return this.extend<R, O>({
      relationships: [...this._clauses.relationships, clause],
    });
  }

  /**
   * Validate and freeze the clause set.
   *
   * Throws EMPTY_QUERY when nothing could drive the scan and
   * RELATIONSHIP_NOT_REGISTERED for a relationship type the World has
   * never seen. Unregistered component types are legal and simply
   * match nothing (or never exclude anything).
   */
  build(): Query<R, O> {
    const clauses = this._clauses;
    const has_targeted = clauses.relationships.some(
      (r) => r.target !== undefined,
    );
    if (clauses.with.length === 0 && !has_targeted) {
      throw new ECSError(
        ECS_ERROR.EMPTY_QUERY,
        "A query needs at least one `with` component or targeted relationship",
      );
    }
    for (const rel of clauses.relationships) {
      if (!rel.is_registered(this._resolver)) {
        throw new ECSError(
          ECS_ERROR.RELATIONSHIP_NOT_REGISTERED,
          `Relationship "${rel.name}" is not registered`,
          { relationship: rel.name },
        );
      }
    }
    return new Query(this._resolver, clauses);
  }

  private extend<R2 extends ComponentDef<unknown>, O2 extends ComponentDef<unknown>>(
    patch: Partial<Clauses>,
  ): QueryBuilder<R2, O2> {
    return new QueryBuilder<R2, O2>(this._resolver, {
      ...this._clauses,
      ...patch,
    });
  }
}

//=========================================================
// Plan
//=========================================================

export type QueryDriver =
  | {
      readonly kind: "component";
      readonly name: string;
      readonly size: number;
    }
  | {
      readonly kind: "relationship";
      readonly name: string;
      readonly target: Entity;
      readonly size: number;
    };

interface ResolvedPlan {
  readonly driver: QueryDriver;
  // Exactly one of these is the candidate source
  readonly driver_ids: readonly number[];
  readonly driver_entities: readonly Entity[] | null;
  readonly driver_def: ComponentDef<unknown> | null;
  readonly driver_relationship: RelationshipClause | null;
}

function resolve_plan(resolver: QueryResolver, clauses: Clauses): ResolvedPlan {
  let component: { def: ComponentDef<unknown>; ids: readonly number[] } | null =
    null;
  for (const def of clauses.with) {
    const ids = resolver._component_storage(def)?.packed_entities ?? EMPTY_IDS;
    if (component === null || ids.length < component.ids.length) {
      component = { def, ids };
    }
  }

  let relationship: {
    clause: RelationshipClause;
    target: Entity;
    sources: readonly Entity[];
  } | null = null;
  for (const clause of clauses.relationships) {
    if (clause.target === undefined) continue;
    const sources = clause.sources(resolver);
    if (relationship === null || sources.length < relationship.sources.length) {
      relationship = { clause, target: clause.target, sources };
    }
  }

  if (
    component !== null &&
    (relationship === null || component.ids.length <= relationship.sources.length)
  ) {
    return {
      driver: {
        kind: "component",
        name: component.def.name,
        size: component.ids.length,
      },
      driver_ids: component.ids,
      driver_entities: null,
      driver_def: component.def,
      driver_relationship: null,
    };
  }

  if (relationship === null) {
    // build() guarantees at least one driving clause
    throw new ECSError(ECS_ERROR.EMPTY_QUERY);
  }
  return {
    driver: {
      kind: "relationship",
      name: relationship.clause.name,
      target: relationship.target,
      size: relationship.sources.length,
    },
    driver_ids: EMPTY_IDS,
    driver_entities: relationship.sources,
    driver_def: null,
    driver_relationship: relationship.clause,
  };
}

//=========================================================
// Query
//=========================================================

export class Query<
  R extends ComponentDef<unknown> = never,
  O extends ComponentDef<unknown> = never,
> implements Iterable<QueryRow<R, O>>
{
  constructor(
    private readonly _resolver: QueryResolver,
    private readonly _clauses: Clauses,
  ) {}

  /** Driver the next scan would use, given the current World state. */
  plan(): QueryDriver {
    return resolve_plan(this._resolver, this._clauses).driver;
  }

  [Symbol.iterator](): Iterator<QueryRow<R, O>> {
    return new QueryCursor<R, O>(this._resolver, this._clauses);
  }

  for_each(fn: (row: QueryRow<R, O>) => void): void {
    for (const row of this) fn(row);
  }

  to_array(): QueryRow<R, O>[] {
    return Array.from(this);
  }

  entities(): Entity[] {
    const result: Entity[] = [];
    for (const row of this) result.push(row.entity);
    return result;
  }

  first(): QueryRow<R, O> | undefined {
    const next = this[Symbol.iterator]().next();
    return next.done ? undefined : next.value;
  }

  count(): number {
    let n = 0;
    for (const _row of this) n++;
    return n;
  }
}

//=========================================================
// QueryRow
//=========================================================

/** One match: the entity plus on-demand access to its components. */
export class QueryRow<
  R extends ComponentDef<unknown> = never,
  O extends ComponentDef<unknown> = never,
> {
  constructor(
    public readonly entity: Entity,
    private readonly _resolver: QueryResolver,
  ) {}

  /** Current value of a required component. */
  get<T>(def: ComponentDef<T> & R): T {
    const storage = this._resolver._component_storage<T>(def);
    if (storage === undefined || !storage.has(this.entity.id)) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_FOUND,
        `${format_entity(this.entity)} no longer has "${def.name}"`,
      );
    }
    return storage.get(this.entity.id);
  }

  /** Current value of an optional (or required) component, if present. */
  get_optional<T>(def: ComponentDef<T> & (R | O)): T | undefined {
    return this._resolver._component_storage<T>(def)?.try_get(this.entity.id);
  }

  has<T>(def: ComponentDef<T> & (R | O)): boolean {
    return this._resolver._component_storage<T>(def)?.has(this.entity.id) ?? false;
  }
}

//=========================================================
// QueryCursor
//=========================================================

/**
 * Per-iteration cursor. Each Query iterator owns its own index, so
 * independent passes over one Query never interfere.
 */
class QueryCursor<R extends ComponentDef<unknown>, O extends ComponentDef<unknown>>
  implements Iterator<QueryRow<R, O>>
{
  private readonly plan: ResolvedPlan;
  private readonly other_required: SparseSetStorage<unknown>[] = [];
  private readonly missing_required: boolean;
  private readonly excluded: SparseSetStorage<unknown>[] = [];
  private readonly relationship_tests: ((entity: Entity) => boolean)[] = [];
  private readonly predicate_tests: ((id: number) => boolean)[] = [];
  private index = 0;

  constructor(
    private readonly resolver: QueryResolver,
    clauses: Clauses,
  ) {
    this.plan = resolve_plan(resolver, clauses);

    let missing = false;
    for (const def of clauses.with) {
      if (def.id === this.plan.driver_def?.id) continue;
      const storage = resolver._component_storage(def);
      if (storage === undefined) missing = true;
      else this.other_required.push(storage);
    }
    this.missing_required = missing;

    for (const def of clauses.without) {
      const storage = resolver._component_storage(def);
      if (storage !== undefined) this.excluded.push(storage);
    }
    for (const rel of clauses.relationships) {
      if (rel === this.plan.driver_relationship) continue;
      this.relationship_tests.push(rel.bind(resolver));
    }
    for (const clause of clauses.where) {
      this.predicate_tests.push(clause.bind(resolver));
    }
  }

  next(): IteratorResult<QueryRow<R, O>> {
    if (this.missing_required) return { value: undefined, done: true };

    const entities = this.plan.driver_entities;
    const ids = this.plan.driver_ids;
    const size = entities !== null ? entities.length : ids.length;

    while (this.index < size) {
      const i = this.index++;
      const entity =
        entities !== null
          ? this.live_or_undefined(entities[i])
          : this.resolver.entity_at(ids[i]);
      if (entity === undefined) continue;
      if (this.matches(entity)) {
        return { value: new QueryRow<R, O>(entity, this.resolver), done: false };
      }
    }
    return { value: undefined, done: true };
  }

  [Symbol.iterator](): Iterator<QueryRow<R, O>> {
    return this;
  }

  private live_or_undefined(entity: Entity): Entity | undefined {
    return this.resolver.is_alive(entity) ? entity : undefined;
  }

  private matches(entity: Entity): boolean {
    const id = entity.id;
    for (const storage of this.other_required) {
      if (!storage.has(id)) return false;
    }
    for (const storage of this.excluded) {
      if (storage.has(id)) return false;
    }
    for (const test of this.relationship_tests) {
      if (!test(entity)) return false;
    }
    for (const test of this.predicate_tests) {
      if (!test(id)) return false;
    }
    return true;
  }
}

