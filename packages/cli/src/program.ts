/**
 * Command-line interface for drill files.
 *
 *   phrasedrill generate  --words-config drill.json [--seed <seed>]
 *   phrasedrill validate  --words-config drill.json
 *   phrasedrill conjugate <infinitive> --words-config drill.json
 *
 * --words-config falls back to PHRASEDRILL_WORDS_CONFIG.
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import type { DrillDefinition } from "@phrasedrill/shared-types";
import { parseDrillFile, wordText } from "@phrasedrill/lexicon";
import { generateConjugationTable } from "@phrasedrill/morphology";
import { generateDrillSentence, seededRandom, systemRandom } from "@phrasedrill/syntax";
import { toValidationReport, validate } from "@phrasedrill/validation";

export const WORDS_CONFIG_ENV = "PHRASEDRILL_WORDS_CONFIG";

/** Where the CLI writes; swapped out in tests */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

interface DrillOptions {
  wordsConfig?: string;
}

interface GenerateOptions extends DrillOptions {
  seed?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Read and parse a drill file. Throws DrillConfigError on a schema mismatch. */
export function loadDrillFile(path: string): DrillDefinition {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    throw new Error(`cannot read ${path}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`${path} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseDrillFile(raw);
}

function requireWordsConfig(options: DrillOptions): string {
  if (!options.wordsConfig) {
    throw new Error(`no drill file given; pass --words-config or set ${WORDS_CONFIG_ENV}`);
  }
  return options.wordsConfig;
}

export function createProgram(
  io: CliIo,
  env: NodeJS.ProcessEnv = process.env,
  setExitCode: (code: number) => void = () => {}
): Command {
  const program = new Command();
  const defaultWordsConfig = env[WORDS_CONFIG_ENV];

  program
    .name("phrasedrill")
    .description("Generate drill sentences from a vocabulary file")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  program
    .command("generate")
    .description("Generate one sentence biased toward the drill's learning targets")
    .option("-w, --words-config <path>", "drill file (JSON)", defaultWordsConfig)
    .option("-s, --seed <seed>", "seed for a reproducible sentence")
    .action((options: GenerateOptions) => {
      const definition = loadDrillFile(requireWordsConfig(options));
      const result = validate(definition);
      if (!result.valid) {
        for (const line of toValidationReport(result)) io.err(line);
        setExitCode(1);
        return;
      }
      const sentence = generateDrillSentence(definition, {
        rng: options.seed !== undefined ? seededRandom(options.seed) : systemRandom,
      });
      io.out(sentence.text);
    });

  program
    .command("validate")
    .description("Check a drill file and print every issue found")
    .option("-w, --words-config <path>", "drill file (JSON)", defaultWordsConfig)
    .action((options: DrillOptions) => {
      const result = validate(loadDrillFile(requireWordsConfig(options)));
      for (const line of toValidationReport(result)) io.out(line);
      if (result.valid) io.out(`OK (${result.warnings.length} warnings)`);
      else setExitCode(1);
    });

  program
    .command("conjugate")
    .description("Print the conjugation table of a verb in the drill file")
    .argument("<infinitive>", "the verb's infinitive")
    .option("-w, --words-config <path>", "drill file (JSON)", defaultWordsConfig)
    .action((infinitive: string, options: DrillOptions) => {
      const { vocabulary } = loadDrillFile(requireWordsConfig(options));
      const wanted = infinitive.trim().toLowerCase();
      const verb = vocabulary.verbs.find(v => wordText(v) === wanted);
      if (!verb) {
        io.err(`error: "${infinitive}" is not a verb in the vocabulary`);
        setExitCode(1);
        return;
      }
      for (const row of generateConjugationTable(verb).rows) io.out(`${row.label}\t${row.text}`);
    });

  return program;
}

/**
 * Run the CLI against `argv` (node-style: executable and script first).
 * Resolves to the process exit code; never rejects.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo = consoleIo,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, env, (code) => { exitCode = code; });
  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    // Help, version and usage errors: commander has already written its message
    if (error instanceof CommanderError) return error.exitCode;
    io.err(`error: ${errorMessage(error)}`);
    return 1;
  }
  return exitCode;
}
