/**
 * Runtime schema of the drill file read by the CLI and posted to the API.
 *
 * Pronouns are not part of the file: the vocabulary always carries the
 * fixed pronoun set. Conjugation row counts are left to the validation
 * engine so a short table is reported rather than rejected outright.
 */
import { z } from "zod";
import { VERB_QUESTIONS } from "./schema.js";

export const ConjugationSchema = z.object({
  singular: z.string(),
  plural: z.string(),
});

export const QuestionWordEntrySchema = z.object({
  text: z.string(),
});

export const VerbEntrySchema = z.object({
  forms: z.object({
    infinitive: z.string(),
    conjugations: z.array(ConjugationSchema),
  }),
  expectInfinitive: z.boolean().default(false),
  questions: z.array(z.enum(VERB_QUESTIONS)).default([]),
});

export const DrillFileSchema = z.object({
  words: z.object({
    questionWords: z.array(QuestionWordEntrySchema).default([]),
    verbs: z.array(VerbEntrySchema).default([]),
  }),
  learn: z.object({
    words: z.array(z.string()).default([]),
  }).default({}),
});

/** Shape accepted on input (defaults not yet applied) */
export type DrillFileInput = z.input<typeof DrillFileSchema>;
export type DrillFile = z.output<typeof DrillFileSchema>;
export type VerbEntry = z.output<typeof VerbEntrySchema>;
