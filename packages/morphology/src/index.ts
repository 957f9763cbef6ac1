/**
 * @phrasedrill/morphology
 * Agreement between pronoun and verb: the fixed pronoun → person/number
 * table, verb rendering for a grammatical form, and full conjugation tables.
 */
import type {
  FiniteForm, GrammaticalForm, GrammaticalPerson, InfinitiveForm,
  PronounName, PronounWord, VerbWord
} from "@phrasedrill/shared-types";
import {
  GRAMMATICAL_NUMBERS, GRAMMATICAL_PERSONS, MalformedConjugationTableError
} from "@phrasedrill/shared-types";

export interface MorphologyValidationIssue {
  ruleId: string; severity: "error"|"warning"; message: string; entityRef?: string;
}

export interface ConjugationRow {
  /** Short form label, e.g. "inf", "1sg", "3pl" */
  label: string;
  form: GrammaticalForm;
  text: string;
}

export interface ConjugationTable {
  infinitive: string;
  expectsInfinitive: boolean;
  rows: ConjugationRow[];
}

export const INFINITIVE: InfinitiveForm = { person: "infinitive" };

/** Row of a verb's conjugation list that holds each person */
export const PERSON_INDEX: Readonly<Record<GrammaticalPerson, number>> = {
  first: 0,
  second: 1,
  third: 2,
};

export const CONJUGATION_ROW_COUNT = GRAMMATICAL_PERSONS.length;

const PRONOUN_FORMS: Readonly<Record<PronounName, FiniteForm>> = {
  I: { person: "first", number: "singular" },
  You: { person: "second", number: "singular" },
  He: { person: "third", number: "singular" },
  She: { person: "third", number: "singular" },
  We: { person: "first", number: "plural" },
  YouPlural: { person: "second", number: "plural" },
  They: { person: "third", number: "plural" },
};

// ─── Agreement ────────────────────────────────────────────────────────────────

export function pronounForm(pronoun: PronounWord): FiniteForm {
  return { ...PRONOUN_FORMS[pronoun.pronounName] };
}

export function isInfinitive(form: GrammaticalForm): form is InfinitiveForm {
  return form.person === "infinitive";
}

/**
 * Surface text of a verb in the given form, lower-cased.
 * Throws MalformedConjugationTableError when the person's row is missing.
 */
export function renderVerb(verb: VerbWord, form: GrammaticalForm): string {
  if (isInfinitive(form)) return verb.forms.infinitive.toLowerCase();
  const index = PERSON_INDEX[form.person];
  const row = verb.forms.conjugations[index];
  if (!row) throw new MalformedConjugationTableError(verb.forms.infinitive, index);
  return (form.number === "singular" ? row.singular : row.plural).toLowerCase();
}

export function formLabel(form: GrammaticalForm): string {
  if (isInfinitive(form)) return "inf";
  return `${PERSON_INDEX[form.person] + 1}${form.number === "singular" ? "sg" : "pl"}`;
}

// ─── Conjugation tables ───────────────────────────────────────────────────────

/** Every form a verb renders in: the infinitive, then singular and plural by person. */
export const ALL_FORMS: readonly GrammaticalForm[] = [
  INFINITIVE,
  ...GRAMMATICAL_NUMBERS.flatMap(number =>
    GRAMMATICAL_PERSONS.map((person): FiniteForm => ({ person, number }))
  ),
];

/**
 * Render the full paradigm of a verb. Throws on the first missing row, so a
 * table that renders is safe to generate from.
 */
export function generateConjugationTable(verb: VerbWord): ConjugationTable {
  return {
    infinitive: verb.forms.infinitive.toLowerCase(),
    expectsInfinitive: verb.expectsInfinitive,
    rows: ALL_FORMS.map(form => ({ label: formLabel(form), form, text: renderVerb(verb, form) })),
  };
}

// ─── Morphology validation ────────────────────────────────────────────────────

export function validateConjugations(verb: VerbWord): MorphologyValidationIssue[] {
  const issues: MorphologyValidationIssue[] = [];
  const ref = verb.forms.infinitive.toLowerCase();
  const rows = verb.forms.conjugations;

  if (rows.length !== CONJUGATION_ROW_COUNT) {
    issues.push({
      ruleId:"MORPH_001",severity:"error",
      message:`Verb "${ref}" has ${rows.length} conjugation rows; expected ${CONJUGATION_ROW_COUNT} (first, second, third person).`,
      entityRef:ref
    });
  }
  rows.forEach((row, i) => {
    if (!row.singular.trim()) issues.push({ruleId:"MORPH_002",severity:"error",message:`Verb "${ref}" has an empty singular form for person ${i+1}.`,entityRef:ref});
    if (!row.plural.trim()) issues.push({ruleId:"MORPH_002",severity:"error",message:`Verb "${ref}" has an empty plural form for person ${i+1}.`,entityRef:ref});
  });

  return issues;
}
