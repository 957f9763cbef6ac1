/**
 * Drill routes. Stateless: every request carries the whole drill file.
 *
 * POST /v1/validate      → ValidationResult
 * POST /v1/sentences     → { sentence, tokens, parts, learningTargets }
 * POST /v1/conjugations  → ConjugationTable
 */

import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import type { ZodError } from "zod";
import { DrillFileSchema } from "@phrasedrill/shared-types";
import { toDrillDefinition, wordText } from "@phrasedrill/lexicon";
import { generateConjugationTable } from "@phrasedrill/morphology";
import { generateDrillSentence, seededRandom, systemRandom } from "@phrasedrill/syntax";
import type { SentencePart } from "@phrasedrill/syntax";
import { formatIssue, validate } from "@phrasedrill/validation";
import { getConfig } from "../config/index.js";

// ─── Body schemas ─────────────────────────────────────────────────────────────

const ValidateBodySchema = z.object({
  drill: DrillFileSchema,
});

const SentenceBodySchema = z.object({
  drill: DrillFileSchema,
  seed: z.union([z.string().min(1), z.number().int()]).optional(),
});

const ConjugationBodySchema = z.object({
  drill: DrillFileSchema,
  infinitive: z.string().min(1),
});

function ok(data: unknown, requestId: string) {
  return { data, requestId };
}

function badRequest(error: ZodError, requestId: string) {
  const issue = error.issues[0];
  const message = issue
    ? `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
    : "Invalid body";
  return { data: null, requestId, errors: [{ code: "BAD_REQUEST", message }] };
}

function serializePart(part: SentencePart) {
  return { role: part.role, word: wordText(part.word), form: part.form, text: part.text };
}

// ─── Rate limits ──────────────────────────────────────────────────────────────

const GENERATE_RATE = {
  max: 60,
  timeWindow: 60_000,
  keyGenerator: (r: FastifyRequest) => `generate:${r.ip}`,
  errorResponseBuilder: (_r: FastifyRequest, ctx: { ttl: number }) => ({
    data: null,
    errors: [{ code: "GENERATE_RATE_LIMITED", message: `Rate limit exceeded. Retry after ${Math.ceil(ctx.ttl / 1000)}s.` }],
  }),
};

// ─── Route registration ───────────────────────────────────────────────────────

export async function drillRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post("/v1/validate", async (req, reply) => {
    const parsed = ValidateBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(badRequest(parsed.error, req.id));

    return reply.send(ok(validate(toDrillDefinition(parsed.data.drill)), req.id));
  });

  fastify.post("/v1/sentences", { config: { rateLimit: GENERATE_RATE } }, async (req, reply) => {
    const parsed = SentenceBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(badRequest(parsed.error, req.id));

    const definition = toDrillDefinition(parsed.data.drill);
    const result = validate(definition);
    if (!result.valid) {
      return reply.code(422).send({
        data: null,
        requestId: req.id,
        errors: result.errors.map(issue => ({ code: issue.ruleId, message: formatIssue(issue) })),
      });
    }

    const { seed } = parsed.data;
    const sentence = generateDrillSentence(definition, {
      rng: seed !== undefined ? seededRandom(seed) : systemRandom,
      targetLimit: getConfig().targetSampleSize,
    });
    req.log.debug({ sentence: sentence.text, learningTargets: sentence.learningTargets }, "Sentence generated");

    return reply.send(ok({
      sentence: sentence.text,
      tokens: sentence.tokens,
      parts: sentence.parts.map(serializePart),
      learningTargets: sentence.learningTargets,
    }, req.id));
  });

  fastify.post("/v1/conjugations", async (req, reply) => {
    const parsed = ConjugationBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(badRequest(parsed.error, req.id));

    const { vocabulary } = toDrillDefinition(parsed.data.drill);
    const wanted = parsed.data.infinitive.trim().toLowerCase();
    const verb = vocabulary.verbs.find(v => wordText(v) === wanted);
    if (!verb) {
      return reply.code(404).send({
        data: null,
        requestId: req.id,
        errors: [{ code: "UNKNOWN_VERB", message: `"${parsed.data.infinitive}" is not a verb in the vocabulary.` }],
      });
    }

    // A malformed table throws MalformedConjugationTableError → 422 via the error handler
    return reply.send(ok(generateConjugationTable(verb), req.id));
  });
}
