import { describe, expect, it } from "vitest";
import { World } from "../../world/world";
import { define_component } from "../../component/component";
import { define_relationship } from "../../relationship/relationship";
import { ECSError, ECS_ERROR } from "../../utils/error";

interface Position {
  x: number;
  y: number;
}
interface Velocity {
  dx: number;
  dy: number;
}
interface Health {
  hp: number;
}

const Position = define_component<Position>("Position");
const Velocity = define_component<Velocity>("Velocity");
const Health = define_component<Health>("Health");
const Tag = define_component<string>("Tag");
const Frozen = define_component<true>("Frozen");
const ChildOf = define_relationship("ChildOf");

function scene() {
  const world = new World();
  const e0 = world.create_entity();
  world.add_component(e0, Position, { x: 10, y: 10 });
  world.add_component(e0, Velocity, { dx: 1, dy: 0 });
  world.add_component(e0, Health, { hp: 100 });

  const e1 = world.create_entity();
  world.add_component(e1, Position, { x: 20, y: 20 });
  world.add_component(e1, Health, { hp: 80 });

  const e2 = world.create_entity();
  world.add_component(e2, Position, { x: 30, y: 30 });
  world.add_component(e2, Velocity, { dx: 0, dy: -1 });
  world.add_component(e2, Health, { hp: 120 });
  world.add_component(e2, Tag, "player");

  return { world, e0, e1, e2 };
}

describe("Query", () => {
  //=========================================================
  // with / without / optional
  //=========================================================

  it("matches required components and skips excluded ones", () => {
    const { world, e0, e1 } = scene();
    const q = world.query().with(Position).with(Health).without(Tag).build();
    expect(q.entities()).toEqual([e0, e1]);
  });

  it("optional components are present or undefined per row", () => {
    const { world, e0, e1, e2 } = scene();
    const rows = world.query().with(Position).optional(Velocity).build().to_array();
    expect(rows.map((r) => r.entity)).toEqual([e0, e1, e2]);
    expect(rows[0].get_optional(Velocity)).toEqual({ dx: 1, dy: 0 });
    expect(rows[1].get_optional(Velocity)).toBeUndefined();
    expect(rows[1].has(Velocity)).toBe(false);
    expect(rows[2].get(Position)).toEqual({ x: 30, y: 30 });
  });

  it("writes through row values land in storage", () => {
    const { world, e0, e2 } = scene();
    const q = world.query().with(Position).with(Velocity).build();
    for (const row of q) {
      const pos = row.get(Position);
      const vel = row.get(Velocity);
      pos.x += vel.dx;
      pos.y += vel.dy;
    }
    expect(world.get_component(e0, Position)).toEqual({ x: 11, y: 10 });
    expect(world.get_component(e2, Position)).toEqual({ x: 30, y: 29 });
  });

  it("an unregistered required type matches nothing", () => {
    const { world } = scene();
    const q = world.query().with(Position).with(Frozen).build();
    expect(q.count()).toBe(0);
    expect(world.is_component_registered(Frozen)).toBe(false);
  });

  it("an unregistered excluded type excludes nothing", () => {
    const { world } = scene();
    expect(world.query().with(Position).without(Frozen).build().count()).toBe(3);
  });

  it("skips destroyed entities", () => {
    const { world, e0, e1, e2 } = scene();
    world.destroy_entity(e0);
    // swap-remove moved e2 into e0's packed row
    expect(world.query().with(Health).build().entities()).toEqual([e2, e1]);
  });

  //=========================================================
  // where
  //=========================================================

  it("where filters on the component value", () => {
    const { world, e0, e2 } = scene();
    const q = world.query().where(Health, (h) => h.hp >= 100).build();
    expect(q.entities()).toEqual([e0, e2]);
  });

  it("where makes its component required", () => {
    const { world, e2 } = scene();
    const q = world.query().with(Position).where(Tag, (t) => t === "player").build();
    expect(q.entities()).toEqual([e2]);
    expect(q.first()?.get(Tag)).toBe("player");
  });

  it("predicates see updates made after build", () => {
    const { world, e1 } = scene();
    const q = world.query().where(Health, (h) => h.hp < 50).build();
    expect(q.count()).toBe(0);
    world.get_component(e1, Health).hp = 10;
    expect(q.entities()).toEqual([e1]);
  });

  //=========================================================
  // Relationships
  //=========================================================

  it("filters by a relationship target", () => {
    const { world, e0, e1, e2 } = scene();
    world.add_relationship(e0, ChildOf, e2);
    world.add_relationship(e1, ChildOf, e0);
    const q = world.query().with(Position).with_relationship(ChildOf, e2).build();
    expect(q.entities()).toEqual([e0]);
  });

  it("an untargeted relationship clause matches any outgoing edge", () => {
    const { world, e0, e1, e2 } = scene();
    world.add_relationship(e0, ChildOf, e2);
    world.add_relationship(e1, ChildOf, e0);
    const q = world.query().with(Health).with_relationship(ChildOf).build();
    expect(q.entities()).toEqual([e0, e1]);
  });

  it("a targeted relationship alone can drive a query", () => {
    const world = new World();
    const parent = world.create_entity();
    const a = world.create_entity();
    const b = world.create_entity();
    world.add_relationship(a, ChildOf, parent);
    world.add_relationship(b, ChildOf, parent);
    const q = world.query().with_relationship(ChildOf, parent).build();
    expect(q.plan()).toEqual({ kind: "relationship", name: "ChildOf", target: parent, size: 2 });
    expect(q.entities()).toEqual([a, b]);
    world.destroy_entity(a);
    expect(q.entities()).toEqual([b]);
  });

  it("throws RELATIONSHIP_NOT_REGISTERED for an unknown relationship type", () => {
    const world = new World();
    world.register_component(Position);
    const Unseen = define_relationship("Unseen");
    try {
      world.query().with(Position).with_relationship(Unseen).build();
      expect.unreachable();
    } catch (e) {
      expect((e as ECSError).category).toBe(ECS_ERROR.RELATIONSHIP_NOT_REGISTERED);
    }
    expect(world.is_relationship_registered(Unseen)).toBe(false);
  });

  it("registering the relationship type makes the query buildable", () => {
    const world = new World();
    const Seen = define_relationship("Seen");
    world.register_component(Position).register_relationship(Seen);
    expect(world.is_relationship_registered(Seen)).toBe(true);
    expect(world.query().with(Position).with_relationship(Seen).build().count()).toBe(0);
  });

  it("a lazily created edge registers its relationship type", () => {
    const world = new World();
    const Lazy = define_relationship("Lazy");
    const a = world.create_entity();
    const b = world.create_entity();
    expect(world.is_relationship_registered(Lazy)).toBe(false);
    world.add_relationship(a, Lazy, b);
    expect(world.is_relationship_registered(Lazy)).toBe(true);
  });

  //=========================================================
  // Driver selection
  //=========================================================

  it("drives from the smallest required storage", () => {
    const { world } = scene();
    const q = world.query().with(Position).with(Tag).with(Health).build();
    expect(q.plan()).toEqual({ kind: "component", name: "Tag", size: 1 });
    expect(q.count()).toBe(1);
  });

  it("prefers a smaller relationship source list over a component", () => {
    const { world, e0, e1 } = scene();
    world.add_relationship(e1, ChildOf, e0);
    const q = world.query().with(Position).with_relationship(ChildOf, e0).build();
    expect(q.plan()).toEqual({ kind: "relationship", name: "ChildOf", target: e0, size: 1 });
    expect(q.entities()).toEqual([e1]);
  });

  it("ties go to the component driver", () => {
    const { world, e0, e2 } = scene();
    world.add_relationship(e0, ChildOf, e2);
    const q = world.query().with(Tag).with_relationship(ChildOf, e2).build();
    expect(q.plan()).toEqual({ kind: "component", name: "Tag", size: 1 });
    expect(q.count()).toBe(0);
  });

  it("the driver is re-chosen on every iteration", () => {
    const world = new World();
    const a = world.create_entity();
    world.add_component(a, Position, { x: 0, y: 0 });
    world.add_component(a, Health, { hp: 1 });
    const q = world.query().with(Position).with(Health).build();
    expect(q.plan().name).toBe("Position");

    const b = world.create_entity();
    world.add_component(b, Position, { x: 1, y: 1 });
    expect(q.plan()).toEqual({ kind: "component", name: "Health", size: 1 });
    expect(q.entities()).toEqual([a]);
  });

  //=========================================================
  // Builder & iteration
  //=========================================================

  it("throws EMPTY_QUERY without a driving clause", () => {
    const world = new World();
    expect(() => world.query().without(Tag).build()).toThrow(ECSError);
    try {
      world.query().optional(Velocity).with_relationship(ChildOf).build();
      expect.unreachable();
    } catch (e) {
      expect((e as ECSError).category).toBe(ECS_ERROR.EMPTY_QUERY);
    }
  });

  it("builders are immutable", () => {
    const { world } = scene();
    const base = world.query().with(Position);
    const narrowed = base.with(Tag);
    expect(base.build().count()).toBe(3);
    expect(narrowed.build().count()).toBe(1);
  });

  it("independent iterators keep their own position", () => {
    const { world, e0, e1 } = scene();
    const q = world.query().with(Position).build();
    const first = q[Symbol.iterator]();
    const second = q[Symbol.iterator]();
    expect(first.next().value?.entity).toEqual(e0);
    expect(first.next().value?.entity).toEqual(e1);
    expect(second.next().value?.entity).toEqual(e0);
  });

  it("for_each visits every row and first returns undefined when empty", () => {
    const { world } = scene();
    let total = 0;
    world.query().with(Health).build().for_each((row) => {
      total += row.get(Health).hp;
    });
    expect(total).toBe(300);
    expect(world.query().with(Health).with(Frozen).build().first()).toBeUndefined();
  });

  it("row.get throws COMPONENT_NOT_FOUND once the component is removed", () => {
    const { world, e0 } = scene();
    const row = world.query().with(Velocity).build().first();
    world.remove_component(e0, Velocity);
    expect(() => row?.get(Velocity)).toThrow(ECSError);
  });
});
