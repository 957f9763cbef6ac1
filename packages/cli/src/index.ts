#!/usr/bin/env tsx

import { config } from "dotenv";
import { runCli } from "./program.js";

// Pick up PHRASEDRILL_WORDS_CONFIG from a local .env
config();

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv);
}

void main();
