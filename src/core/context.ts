// src/core/context.ts
import { Faker, en } from "@faker-js/faker";
import type { GeneratorContext } from "../types/generator.js";
import { createRng } from "../util/rng.js";
import { loadVocabulary } from "./vocabulary.js";

/**
 * Build the seeded context threaded through every generator call.
 * The RNG and the Faker instance share the seed, so a run is reproducible
 * from `seed` and `now` alone.
 */
export async function createContext(options: {
  seed: number;
  now?: Date;
}): Promise<GeneratorContext> {
  const faker = new Faker({ locale: [en] });
  faker.seed(options.seed);

  return {
    seed: options.seed,
    rng: createRng(options.seed),
    faker,
    now: options.now ?? new Date(),
    vocabulary: await loadVocabulary(),
  };
}
