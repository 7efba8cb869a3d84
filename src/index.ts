// World
export {
  World,
  type WorldOptions,
  type EntityFunction,
  type ComponentEntry,
  type RelationshipEntry,
} from "./world/world";
export { NamedEntities } from "./world/named_entities";

// Entities
export {
  type Entity,
  type EntityKey,
  create_entity,
  entity_key,
  entities_equal,
  format_entity,
} from "./entity/entity";
export {
  EntityRegistry,
  type EntityRegistryOptions,
  type EntityRegistryState,
} from "./entity/entity_registry";

// Components
export {
  type ComponentDef,
  type ComponentID,
  type ComponentValue,
  define_component,
} from "./component/component";
export { SparseSetStorage } from "./store/sparse_set_storage";

// Relationships
export {
  type RelationshipDef,
  type RelationshipID,
  type RelationshipOptions,
  define_relationship,
} from "./relationship/relationship";
export { RelationshipStorage } from "./relationship/relationship_storage";

// Queries
export {
  Query,
  QueryBuilder,
  type QueryRow,
  type QueryDriver,
  type QueryResolver,
} from "./query/query";

// Systems
export type {
  SystemConfig,
  SystemDescriptor,
  SystemFn,
  SystemID,
} from "./system/system";

// Snapshots
export {
  create_snapshot,
  restore_snapshot,
  serialize_world,
  deserialize_world,
  WorldSnapshotSchema,
  type WorldSnapshot,
  type ComponentSnapshot,
  type RelationshipSnapshot,
  type RestoreOptions,
} from "./serialization/snapshot";

// Errors
export { ECSError, ECS_ERROR, is_ecs_error } from "./utils/error";
