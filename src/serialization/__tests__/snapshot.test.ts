import { describe, expect, it, vi } from "vitest";
import { World } from "../../world/world";
import { define_component } from "../../component/component";
import { define_relationship } from "../../relationship/relationship";
import {
  create_snapshot,
  deserialize_world,
  restore_snapshot,
  serialize_world,
} from "../snapshot";
import { ECSError, ECS_ERROR } from "../../utils/error";

interface Position {
  x: number;
  y: number;
}

const Position = define_component<Position>("Position");
const Label = define_component<string>("Label");
const ChildOf = define_relationship("ChildOf");
const Knows = define_relationship<{ since: number }>("Knows", {
  bidirectional: true,
});

function category_of(fn: () => unknown): ECS_ERROR | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof ECSError) return e.category;
    throw e;
  }
  return undefined;
}

function build_world() {
  const world = new World({ max_entities: 16 });
  const a = world.create_entity();
  const b = world.create_entity();
  const gone = world.create_entity();
  world.add_component(a, Position, { x: 1, y: 2 });
  world.add_component(b, Position, { x: 3, y: 4 });
  world.add_component(b, Label, "b");
  world.add_relationship(b, ChildOf, a);
  world.add_relationship(a, Knows, b, { since: 7 });
  world.destroy_entity(gone);
  return { world, a, b, gone };
}

const all_types = {
  components: [Position, Label],
  relationships: [ChildOf, Knows],
};

describe("snapshot", () => {
  it("captures entity state, components and edges", () => {
    const { world } = build_world();
    const snapshot = create_snapshot(world);
    expect(snapshot.version).toBe(1);
    expect(snapshot.max_entities).toBe(16);
    expect(snapshot.next_entity_id).toBe(3);
    expect(snapshot.generations).toEqual([0, 0, 1]);
    expect(snapshot.free_ids).toEqual([2]);
    expect(snapshot.components).toEqual([
      {
        name: "Position",
        capacity: 16,
        entries: [
          { id: 0, value: { x: 1, y: 2 } },
          { id: 1, value: { x: 3, y: 4 } },
        ],
      },
      { name: "Label", capacity: 16, entries: [{ id: 1, value: "b" }] },
    ]);
    expect(snapshot.relationships[1]).toEqual({
      name: "Knows",
      bidirectional: true,
      edges: [
        { source: { id: 0, generation: 0 }, target: { id: 1, generation: 0 }, data: { since: 7 } },
        { source: { id: 1, generation: 0 }, target: { id: 0, generation: 0 }, data: { since: 7 } },
      ],
    });
  });

  it("deep-copies component values", () => {
    const { world, a } = build_world();
    const snapshot = create_snapshot(world);
    world.get_component(a, Position).x = 100;
    expect(snapshot.components[0].entries[0].value).toEqual({ x: 1, y: 2 });
  });

  it("round-trips through JSON", () => {
    const { world, a, b, gone } = build_world();
    const copy = deserialize_world(serialize_world(world), all_types);

    expect(copy.entity_count).toBe(2);
    expect(copy.is_alive(a)).toBe(true);
    expect(copy.is_alive(gone)).toBe(false);
    expect(copy.get_component(b, Position)).toEqual({ x: 3, y: 4 });
    expect(copy.get_component(b, Label)).toBe("b");
    expect(copy.has_relationship(b, ChildOf, a)).toBe(true);
    expect(copy.get_relationship_data(b, Knows, a)).toEqual({ since: 7 });
    expect(copy.query().with(Position).without(Label).build().entities()).toEqual([a]);
    // the free list carries over
    expect(copy.create_entity()).toEqual({ id: 2, generation: 1 });
  });

  it("carries default_component_capacity into the restored World", () => {
    const world = new World({ max_entities: 8, default_component_capacity: 2 });
    world.create_entity();
    const snapshot = create_snapshot(world);
    expect(snapshot.default_component_capacity).toBe(2);

    const copy = deserialize_world(JSON.stringify(snapshot));
    expect(copy.default_component_capacity).toBe(2);
    const Late = define_component<number>("Late");
    copy.add_component(copy.create_entity(), Late, 1);
    copy.add_component(copy.create_entity(), Late, 2);
    expect(category_of(() => copy.add_component(copy.create_entity(), Late, 3))).toBe(
      ECS_ERROR.CAPACITY_EXCEEDED,
    );
  });

  it("rejects malformed input with INVALID_SNAPSHOT", () => {
    expect(category_of(() => restore_snapshot({ version: 1 }))).toBe(
      ECS_ERROR.INVALID_SNAPSHOT,
    );
    expect(category_of(() => restore_snapshot(null))).toBe(
      ECS_ERROR.INVALID_SNAPSHOT,
    );
    expect(category_of(() => deserialize_world("{not json"))).toBe(
      ECS_ERROR.INVALID_SNAPSHOT,
    );
  });

  it("rejects an unsupported version", () => {
    const snapshot = { ...create_snapshot(build_world().world), version: 2 };
    expect(category_of(() => restore_snapshot(snapshot, all_types))).toBe(
      ECS_ERROR.INVALID_SNAPSHOT,
    );
  });

  it("rejects components attached to a vacant slot", () => {
    const snapshot = create_snapshot(build_world().world);
    snapshot.components[1].entries.push({ id: 2, value: "ghost" });
    try {
      restore_snapshot(snapshot, all_types);
      expect.unreachable();
    } catch (e) {
      expect((e as ECSError).category).toBe(ECS_ERROR.INVALID_SNAPSHOT);
      expect((e as ECSError).message).toBe(
        'Component "Label" is attached to dead entity 2',
      );
    }
  });

  it("requires a definition for every named type", () => {
    const json = serialize_world(build_world().world);
    expect(
      category_of(() => deserialize_world(json, { components: [Position] })),
    ).toBe(ECS_ERROR.UNKNOWN_SNAPSHOT_TYPE);
  });

  it("skips unknown types with a warning when asked to", () => {
    const { world, b } = build_world();
    const warn = vi.fn();
    const copy = deserialize_world(serialize_world(world), {
      components: [Position],
      relationships: [ChildOf],
      ignore_unknown: true,
      warn,
    });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith('Skipping component "Label": no definition given');
    expect(warn).toHaveBeenCalledWith('Skipping relationship "Knows": no definition given');
    expect(copy.has_component(b, Label)).toBe(false);
    expect(copy.has_component(b, Position)).toBe(true);
  });

  it("rejects a bidirectionality mismatch", () => {
    const json = serialize_world(build_world().world);
    const OneWayKnows = define_relationship<{ since: number }>("Knows");
    expect(
      category_of(() =>
        deserialize_world(json, {
          components: [Position, Label],
          relationships: [ChildOf, OneWayKnows],
        }),
      ),
    ).toBe(ECS_ERROR.INVALID_SNAPSHOT);
  });

  it("rejects values that cannot be cloned", () => {
    const world = new World();
    const Callback = define_component<() => void>("Callback");
    world.add_component(world.create_entity(), Callback, () => {});
    expect(category_of(() => create_snapshot(world))).toBe(ECS_ERROR.INVALID_SNAPSHOT);
  });
});
