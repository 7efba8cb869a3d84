/***
 * System — Function-based system types.
 *
 * Systems are plain functions, not classes. World.register_system()
 * assigns a SystemID and returns a frozen SystemDescriptor, the handle
 * used to remove it again.
 *
 * Lifecycle:
 *   on_added(world)   — called once, at registration
 *   fn(world, dt)     — called by every world.update(dt), in
 *                       registration order
 *   on_removed()      — called when the system is unregistered
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import type { World } from "../world/world";

export type SystemID = Brand<number, "system_id">;

export const as_system_id = (value: number) =>
  validate_and_cast<number, SystemID>(
    value,
    is_non_negative_integer,
    "SystemID must be a non-negative integer",
  );

export type SystemFn = (world: World, delta_time: number) => void;

export interface SystemConfig {
  fn: SystemFn;
  name?: string;
  on_added?: (world: World) => void;
  on_removed?: () => void;
}

export interface SystemDescriptor extends Readonly<SystemConfig> {
  readonly id: SystemID;
}
