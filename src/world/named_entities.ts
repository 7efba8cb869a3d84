/***
 * NamedEntities — Name → Entity side-table bound to a World.
 *
 * Lets scripts and tools address well-known entities ("player",
 * "camera") by string. Entries are not cleaned up on destroy_entity;
 * a dead entry is pruned the next time it is looked up or iterated.
 *
 ***/

import { type Entity, format_entity } from "../entity/entity";
import { ECS_ERROR, ECSError } from "../utils/error";
import type { World } from "./world";

export class NamedEntities {
  private readonly by_name: Map<string, Entity> = new Map();

  constructor(private readonly world: World) {}

  /** Live entries only. */
  public get size(): number {
    this.prune();
    return this.by_name.size;
  }

  /** Bind `name` to `entity`, replacing any previous binding. */
  public set(name: string, entity: Entity): this {
    this.by_name.set(name, entity);
    return this;
  }

  public get(name: string): Entity | undefined {
    const entity = this.by_name.get(name);
    if (entity === undefined) return undefined;
    if (!this.world.is_alive(entity)) {
      this.by_name.delete(name);
      return undefined;
    }
    return entity;
  }

  /** Like get(), but throws ENTITY_NOT_ALIVE when nothing live is bound. */
  public require(name: string): Entity {
    const stale = this.by_name.get(name);
    const entity = this.get(name);
    if (entity === undefined) {
      throw new ECSError(
        ECS_ERROR.ENTITY_NOT_ALIVE,
        stale === undefined
          ? `No entity is named "${name}"`
          : `Entity named "${name}" (${format_entity(stale)}) is not alive`,
        { name },
      );
    }
    return entity;
  }

  /** Return the live entity bound to `name`, creating and binding one if needed. */
  public get_or_create(name: string): Entity {
    const existing = this.get(name);
    if (existing !== undefined) return existing;
    const entity = this.world.create_entity();
    this.by_name.set(name, entity);
    return entity;
  }

  public has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  public delete(name: string): boolean {
    return this.by_name.delete(name);
  }

  public names(): string[] {
    this.prune();
    return Array.from(this.by_name.keys());
  }

  public clear(): void {
    this.by_name.clear();
  }

  public *[Symbol.iterator](): IterableIterator<[string, Entity]> {
    this.prune();
    yield* this.by_name.entries();
  }

  private prune(): void {
    for (const [name, entity] of this.by_name) {
      if (!this.world.is_alive(entity)) this.by_name.delete(name);
    }
  }
}
