// src/core/vocabulary.ts
import type { z } from "zod";
import { VocabularySchema } from "../models/vocabulary.js";
import { readJsonFile, resourceUrl } from "../util/fs.js";

export type Vocabulary = z.infer<typeof VocabularySchema>;

let cached: Promise<Vocabulary> | undefined;

/**
 * Load the word lists used by the generators from data/vocabulary.json.
 */
export function loadVocabulary(): Promise<Vocabulary> {
  cached ??= readJsonFile(resourceUrl("data/vocabulary.json")).then(
    (raw) => {
      const result = VocabularySchema.safeParse(raw);
      if (!result.success) {
        throw new Error(`Invalid vocabulary: ${result.error.message}`);
      }
      return result.data;
    },
  );
  return cached;
}
