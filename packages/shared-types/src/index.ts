/**
 * @phrasedrill/shared-types: public API surface
 */
export * from "./schema.js";
export * from "./errors.js";
export { ConjugationSchema, QuestionWordEntrySchema, VerbEntrySchema, DrillFileSchema } from "./drill-file.js";
export type { DrillFile, DrillFileInput, VerbEntry } from "./drill-file.js";
export { FIXTURE_BASICS, FIXTURE_MINIMAL } from "./fixtures.js";
