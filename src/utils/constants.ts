export const ABSENT = -1;

// Entity slots
export const DEFAULT_MAX_ENTITIES = 5000;
export const INDEX_BITS = 20;
export const MAX_ENTITY_INDEX = (1 << INDEX_BITS) - 1; // 1,048,575
export const INITIAL_GENERATION = 0;
export const DEFAULT_MAX_GENERATION = 0xffffffff;

// Multiplier that packs (id, generation) into one safe integer key.
// id < 2^20 and generation < 2^32 keeps the product under 2^53.
export const GENERATION_SPAN = 0x100000000;

// Initial size of sparse/dense buffers before doubling growth
export const INITIAL_STORAGE_SIZE = 64;

export const SNAPSHOT_VERSION = 1;
