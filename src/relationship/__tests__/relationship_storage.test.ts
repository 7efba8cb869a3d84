import { describe, expect, it } from "vitest";
import { RelationshipStorage } from "../relationship_storage";
import { define_relationship, mirror_data } from "../relationship";
import { create_entity } from "../../entity/entity";

const a = create_entity(0, 0);
const b = create_entity(1, 0);
const c = create_entity(2, 0);

describe("RelationshipStorage", () => {
  //=========================================================
  // add / has / data
  //=========================================================

  it("stores directed edges with data", () => {
    const storage = new RelationshipStorage<number>();
    storage.add(a, b, 5);
    expect(storage.has(a, b)).toBe(true);
    expect(storage.has(b, a)).toBe(false);
    expect(storage.try_get_data(a, b)).toBe(5);
    expect(storage.count).toBe(1);
  });

  it("overwrites data on a repeated add without a second edge", () => {
    const storage = new RelationshipStorage<number>();
    storage.add(a, b, 1);
    storage.add(a, b, 2);
    expect(storage.try_get_data(a, b)).toBe(2);
    expect(storage.count).toBe(1);
    expect(storage.get_sources(b)).toEqual([a]);
  });

  it("indexes targets and sources", () => {
    const storage = new RelationshipStorage<void>();
    storage.add(a, c, undefined);
    storage.add(b, c, undefined);
    storage.add(a, b, undefined);
    expect(storage.get_targets(a)).toEqual([c, b]);
    expect(storage.get_sources(c)).toEqual([a, b]);
    expect(storage.get_targets(c)).toEqual([]);
    expect(storage.has_any_target(a)).toBe(true);
    expect(storage.has_any_target(c)).toBe(false);
  });

  //=========================================================
  // remove
  //=========================================================

  it("remove keeps both indices in step", () => {
    const storage = new RelationshipStorage<void>();
    storage.add(a, c, undefined);
    storage.add(b, c, undefined);
    expect(storage.remove(a, c)).toBe(true);
    expect(storage.has(a, c)).toBe(false);
    expect(storage.get_sources(c)).toEqual([b]);
    expect(storage.has_any_target(a)).toBe(false);
    expect(storage.remove(a, c)).toBe(false);
    expect(storage.count).toBe(1);
  });

  it("remove_all drops incoming and outgoing edges", () => {
    const storage = new RelationshipStorage<void>();
    storage.add(a, b, undefined);
    storage.add(b, c, undefined);
    storage.add(c, b, undefined);
    storage.add(a, c, undefined);
    storage.remove_all(b.id);
    expect(storage.count).toBe(1);
    expect(storage.has(a, c)).toBe(true);
    expect(storage.get_targets(a)).toEqual([c]);
    expect(storage.get_sources(c)).toEqual([a]);
    expect(storage.get_sources(b)).toEqual([]);
    expect(storage.has_any_target(c)).toBe(false);
  });

  it("remove_all handles a self edge", () => {
    const storage = new RelationshipStorage<void>();
    storage.add(a, a, undefined);
    storage.remove_all(a.id);
    expect(storage.count).toBe(0);
    expect([...storage.edges()]).toEqual([]);
  });

  //=========================================================
  // Generations
  //=========================================================

  it("lookups through a stale handle miss", () => {
    const storage = new RelationshipStorage<void>();
    storage.add(a, b, undefined);
    const a_next = create_entity(0, 1);
    const b_next = create_entity(1, 1);
    expect(storage.has(a_next, b)).toBe(false);
    expect(storage.has(a, b_next)).toBe(false);
    expect(storage.get_sources(b_next)).toEqual([]);
  });

  it("a new incarnation replaces edges left by the previous one", () => {
    const storage = new RelationshipStorage<void>();
    storage.add(a, b, undefined);
    const a_next = create_entity(0, 1);
    storage.add(a_next, c, undefined);
    expect(storage.count).toBe(1);
    expect(storage.get_sources(b)).toEqual([]);
    expect(storage.get_targets(a_next)).toEqual([c]);
  });

  //=========================================================
  // Iteration
  //=========================================================

  it("edges yields every directed edge", () => {
    const storage = new RelationshipStorage<string>();
    storage.add(a, b, "ab");
    storage.add(b, a, "ba");
    expect([...storage.edges()]).toEqual([
      [a, b, "ab"],
      [b, a, "ba"],
    ]);
    storage.clear();
    expect(storage.count).toBe(0);
  });
});

describe("define_relationship", () => {
  it("defaults to unidirectional without a mirror", () => {
    const ChildOf = define_relationship("ChildOf");
    expect(ChildOf.kind).toBe("relationship");
    expect(ChildOf.bidirectional).toBe(false);
    expect(Object.isFrozen(ChildOf)).toBe(true);
  });

  it("gives each definition its own id", () => {
    const x = define_relationship("X");
    const y = define_relationship("X");
    expect(x.id).not.toBe(y.id);
  });

  it("mirror_data applies the mirror or passes data through", () => {
    const Owes = define_relationship<{ amount: number }>("Owes", {
      bidirectional: true,
      mirror: (d) => ({ amount: -d.amount }),
    });
    const Likes = define_relationship<number>("Likes", { bidirectional: true });
    expect(mirror_data(Owes, { amount: 3 })).toEqual({ amount: -3 });
    expect(mirror_data(Likes, 4)).toBe(4);
  });
});
