// src/models/vocabulary.ts
import { z } from "zod";

const WordList = z.array(z.string().min(1)).min(1);

export const ActivityTypeSchema = z.enum([
  "call",
  "email",
  "meeting",
  "demo",
  "follow_up",
]);

export const VocabularySchema = z.object({
  industries: WordList,
  // department -> titles
  jobTitles: z
    .record(z.string(), WordList)
    .refine((m) => Object.keys(m).length > 0, {
      message: "At least one department is required",
    }),
  productPrefixes: WordList,
  productTypes: WordList,
  productCategories: WordList,
  dealSources: WordList,
  activitySubjects: z.record(ActivityTypeSchema, WordList),
  noteTemplates: WordList,
  taskTemplates: z
    .array(z.object({ title: z.string(), description: z.string() }))
    .min(1),
});
