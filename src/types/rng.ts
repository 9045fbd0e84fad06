// src/types/rng.ts

/** Uniform float in [0, 1). */
export type RNG = () => number;
