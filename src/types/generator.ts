// src/types/generator.ts
import type { Faker } from "@faker-js/faker";
import type { Vocabulary } from "../core/vocabulary.js";
import type { GeneratedRow, PoolReader } from "./data.js";
import type { RNG } from "./rng.js";
import type { TableName } from "./schema.js";

/**
 * Everything a generator needs to produce values. Passed explicitly so a
 * run never touches process-wide random state.
 */
export type GeneratorContext = {
  seed: number;
  rng: RNG;
  faker: Faker;
  // Reference clock for relative dates
  now: Date;
  vocabulary: Vocabulary;
};

export interface TableGenerator {
  readonly table: TableName;
  /**
   * Produce `count` rows. Pools for the table's dependencies are non-empty
   * whenever `count` is positive.
   */
  generate(
    pools: PoolReader,
    count: number,
    ctx: GeneratorContext,
  ): GeneratedRow[];
}
