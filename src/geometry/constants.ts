// src/geometry/constants.ts

/** Units assumed when a library carries no UNITS record. */
export const DEFAULT_USER_UNITS_PER_DB_UNIT = 1e-3;
export const DEFAULT_METERS_PER_DB_UNIT = 1e-9;

/** Layer and datatype keys are 8-bit. */
export const MAX_LAYER_KEY = 255;
export const LAYER_TABLE_SIZE = (MAX_LAYER_KEY + 1) * (MAX_LAYER_KEY + 1);

/** Below this the clip intersection falls back to the segment midpoint. */
export const CLIP_PARALLEL_EPSILON = 1e-10;

/** Point comparison tolerance used by extrusion. */
export const DEFAULT_EXTRUSION_TOLERANCE = 1e-9;

/** Thickness vs z-range agreement in layer configs. */
export const DEFAULT_CONFIG_TOLERANCE = 1e-6;

export const DEFAULT_MAX_DEPTH = 64;

/** Slots in a handle registry. */
export const DEFAULT_HANDLE_CAPACITY = 64;

/** RGB in 0..1 for layers without a usable color. */
export const FALLBACK_LAYER_COLOR: readonly [number, number, number] = [0.5, 0.5, 0.5];
