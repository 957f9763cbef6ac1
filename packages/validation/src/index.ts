/**
 * @phrasedrill/validation: pre-flight checks for a drill definition
 *
 * Run before generating from a drill file. A definition with neither errors
 * nor cross-module warnings cannot fail to generate; a CROSS_005 warning
 * marks random paths that raise EmptyVocabularyError.
 *
 * Four passes:
 *   1. Lexicon: unique surface texts, non-empty words
 *   2. Morphology: conjugation tables complete and renderable
 *   3. Targets: every learning target resolves
 *   4. Cross-module: every candidate pool a generation path draws from is non-empty
 */
import type {
  DrillDefinition, ValidationIssue, ValidationModule, Word
} from "@phrasedrill/shared-types";
import {
  buildLexicalIndex, validateLearningTargets, validateVocabulary
} from "@phrasedrill/lexicon";
import type { LexicalIndex } from "@phrasedrill/lexicon";
import { generateConjugationTable, validateConjugations } from "@phrasedrill/morphology";
import {
  DEFAULT_TARGET_LIMIT, isInfinitiveGoverningVerb, isNonInfinitiveGoverningVerb
} from "@phrasedrill/syntax";

// ─── Public surface ───────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;         // true only if no errors (warnings are OK)
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  /** Detailed per-pass summary */
  summary: ValidationSummary;
  durationMs: number;
}

export interface ValidationSummary {
  lexicon: PassResult;
  morphology: PassResult;
  targets: PassResult;
  crossModule: PassResult;
}

export interface PassResult {
  passed: boolean;
  errorCount: number;
  warningCount: number;
}

/**
 * Run all four passes. Never throws: every problem is returned as an issue.
 */
export function validate(definition: DrillDefinition): ValidationResult {
  const start = Date.now();
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const index = buildLexicalIndex(definition.vocabulary);

  classify(runLexiconPass(definition), "lexicon", errors, warnings);
  classify(runMorphologyPass(definition), "morphology", errors, warnings);
  classify(runTargetPass(definition, index), "targets", errors, warnings);
  classify(runCrossModulePass(definition, index), "cross-module", errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    summary: {
      lexicon: passResult(errors, warnings, "lexicon"),
      morphology: passResult(errors, warnings, "morphology"),
      targets: passResult(errors, warnings, "targets"),
      crossModule: passResult(errors, warnings, "cross-module"),
    },
    durationMs: Date.now() - start,
  };
}

/** One line per issue, errors first: `[module RULE_ID] message (ref: entity)` */
export function toValidationReport(result: ValidationResult): string[] {
  return [...result.errors, ...result.warnings].map(formatIssue);
}

export function formatIssue(issue: ValidationIssue): string {
  const ref = issue.entityRef !== undefined ? ` (ref: ${issue.entityRef})` : "";
  return `[${issue.module} ${issue.ruleId}] ${issue.message}${ref}`;
}

// ─── Pass 1: Lexicon ──────────────────────────────────────────────────────────

function runLexiconPass(definition: DrillDefinition): RawIssue[] {
  return validateVocabulary(definition.vocabulary).map((i): RawIssue => ({ ...i, module: "lexicon" }));
}

// ─── Pass 2: Morphology ───────────────────────────────────────────────────────

function runMorphologyPass(definition: DrillDefinition): RawIssue[] {
  const issues: RawIssue[] = [];
  for (const verb of definition.vocabulary.verbs) {
    for (const i of validateConjugations(verb))
      issues.push({ ...i, module: "morphology" });

    // Render the full table; anything the generator could hit must render
    try {
      generateConjugationTable(verb);
    } catch (e) {
      issues.push({
        ruleId: "MORPH_ERR", severity: "error", module: "morphology",
        message: `Could not render conjugations of "${verb.forms.infinitive}": ${e instanceof Error ? e.message : String(e)}`,
        entityRef: verb.forms.infinitive.toLowerCase()
      });
    }
  }
  return issues;
}

// ─── Pass 3: Learning targets ─────────────────────────────────────────────────

function runTargetPass(definition: DrillDefinition, index: LexicalIndex): RawIssue[] {
  const issues: RawIssue[] = validateLearningTargets(definition.learningTargets, index)
    .map((i): RawIssue => ({ ...i, module: "targets" }));

  if (definition.learningTargets.length > DEFAULT_TARGET_LIMIT) {
    issues.push({
      ruleId: "TGT_003", severity: "warning", module: "targets",
      message: `${definition.learningTargets.length} learning targets listed; each sentence is biased toward a random ${DEFAULT_TARGET_LIMIT} of them.`
    });
  }
  return issues;
}

// ─── Pass 4: Cross-module ─────────────────────────────────────────────────────

function runCrossModulePass(definition: DrillDefinition, index: LexicalIndex): RawIssue[] {
  const issues: RawIssue[] = [];
  const { questionWords, pronouns, verbs } = definition.vocabulary;

  if (pronouns.length === 0)
    issues.push({ ruleId: "CROSS_001", severity: "error", module: "cross-module", message: "Vocabulary has no pronouns; every sentence needs one." });
  if (verbs.length === 0)
    issues.push({ ruleId: "CROSS_002", severity: "error", module: "cross-module", message: "Vocabulary has no verbs; every sentence needs one." });
  // The opening coin flip can always request a question word
  if (questionWords.length === 0)
    issues.push({ ruleId: "CROSS_003", severity: "error", module: "cross-module", message: "Vocabulary has no question words; question-led sentences cannot be generated." });

  const governing = verbs.filter(isInfinitiveGoverningVerb);
  const nonGoverning = verbs.filter(isNonInfinitiveGoverningVerb);
  if (governing.length > 0 && nonGoverning.length === 0) {
    issues.push({
      ruleId: "CROSS_004", severity: "error", module: "cross-module",
      message: `Verbs ${governing.map(v => `"${v.forms.infinitive}"`).join(", ")} require an infinitive, but no verb can complete the chain.`
    });
  }

  // Targeted verbs that are all non-governing send a coin-flip's worth of
  // finite-verb picks to the governing pool
  const targetedVerbs = definition.learningTargets
    .map(t => index.get(t.toLowerCase()))
    .filter((w): w is Word => w !== undefined)
    .filter(w => w.type === "verb");
  if (targetedVerbs.length > 0 && !targetedVerbs.some(isInfinitiveGoverningVerb) && governing.length === 0) {
    issues.push({
      ruleId: "CROSS_005", severity: "warning", module: "cross-module",
      message: "Verb learning targets are set but the vocabulary has no infinitive-governing verb; some generations will fail."
    });
  }

  return issues;
}

// ─── Internals ────────────────────────────────────────────────────────────────

interface RawIssue {
  ruleId: string;
  severity: "error" | "warning";
  module: ValidationModule;
  message: string;
  entityRef?: string;
}

function classify(
  raw: RawIssue[],
  module: ValidationModule,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): void {
  for (const issue of raw) {
    const vi: ValidationIssue = {
      ruleId: issue.ruleId,
      module,
      severity: issue.severity,
      message: issue.message,
    };
    if (issue.entityRef !== undefined) vi.entityRef = issue.entityRef;
    if (issue.severity === "error") errors.push(vi);
    else warnings.push(vi);
  }
}

function passResult(errors: ValidationIssue[], warnings: ValidationIssue[], module: ValidationModule): PassResult {
  const e = errors.filter(i => i.module === module).length;
  const w = warnings.filter(i => i.module === module).length;
  return { passed: e === 0, errorCount: e, warningCount: w };
}
