import { bench, describe } from "vitest";
import { World } from "../world/world";
import { define_component } from "../component/component";
import { define_relationship } from "../relationship/relationship";
import type { Entity } from "../entity/entity";

interface Position {
  x: number;
  y: number;
}
interface Velocity {
  dx: number;
  dy: number;
}

const Position = define_component<Position>("Position");
const Velocity = define_component<Velocity>("Velocity");
const Sleeping = define_component<true>("Sleeping");
const ChildOf = define_relationship("ChildOf");

function xorshift32(seed: number) {
  let state = seed;
  return () => {
    state ^= state << 13;
    state ^= state >> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

function populated(n: number): World {
  const rand = xorshift32(7);
  const w = new World({ max_entities: n });
  for (let i = 0; i < n; i++) {
    const e = w.create_entity();
    w.add_component(e, Position, { x: i, y: i });
    if (rand() < 0.5) w.add_component(e, Velocity, { dx: 1, dy: 1 });
    if (rand() < 0.1) w.add_component(e, Sleeping, true);
  }
  return w;
}

//=========================================================
// Entity lifecycle
//=========================================================

describe("entity lifecycle", () => {
  bench("entity_create_10k", () => {
    const w = new World({ max_entities: 10_000 });
    for (let i = 0; i < 10_000; i++) w.create_entity();
  });

  bench("entity_create_destroy_cycle", () => {
    const w = new World();
    for (let c = 0; c < 10; c++) {
      const ids: Entity[] = [];
      for (let i = 0; i < 1_000; i++) ids.push(w.create_entity());
      for (let i = 0; i < ids.length; i++) w.destroy_entity(ids[i]);
    }
  });
});

//=========================================================
// Components
//=========================================================

describe("components", () => {
  bench("add_remove_component_5k", () => {
    const w = new World();
    const ids: Entity[] = [];
    for (let i = 0; i < 5_000; i++) {
      const e = w.create_entity();
      w.add_component(e, Position, { x: 0, y: 0 });
      ids.push(e);
    }
    for (let i = 0; i < ids.length; i++) w.remove_component(ids[i], Position);
  });
});

//=========================================================
// Queries
//=========================================================

describe("queries", () => {
  const w = populated(50_000);
  const moving = w.query().with(Position).with(Velocity).without(Sleeping).build();

  bench("query_iterate_move_50k", () => {
    for (const row of moving) {
      const pos = row.get(Position);
      const vel = row.get(Velocity);
      pos.x += vel.dx;
      pos.y += vel.dy;
    }
  });

  const tree = new World({ max_entities: 20_000 });
  const root = tree.create_entity();
  for (let i = 0; i < 19_999; i++) {
    const e = tree.create_entity();
    tree.add_component(e, Position, { x: 0, y: 0 });
    if (i % 100 === 0) tree.add_relationship(e, ChildOf, root);
  }
  const children = tree.query().with(Position).with_relationship(ChildOf, root).build();

  bench("query_relationship_driver_20k", () => {
    children.count();
  });
});
