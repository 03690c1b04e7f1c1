/**
 * Glossa routes — stateless rendering of interlinear glosses
 *
 * POST /v1/gloss          → { html } or { document } for one gloss block
 * POST /v1/render         → { html } for a template with {% gloss %} tags
 * GET  /v1/abbreviations  → the service's abbreviation table
 */

import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import {
  GlossConfigError,
  GlossOptionsSchema,
  GlossTemplateError,
  expandGlossTags,
  glossBlock,
  renderHtml,
  resolveConfig,
  withAbbreviations,
} from "@glossa/gloss";
import type { GlossConfig } from "@glossa/gloss";
import { getConfig } from "../config/index.js";

// ─── Request schemas ──────────────────────────────────────────────────────────
// The lexer stays server-side: patterns from clients are not compiled.
// Lines are capped because an unclosed "{" costs a scan to the end of its line.

const RequestOptionsSchema = GlossOptionsSchema.omit({ lexer: true }).strict();

function linesWithin(maxLineLength: number) {
  return (text: string) => text.split("\n").every(line => line.length <= maxLineLength);
}

function buildBodySchemas(maxLineLength: number) {
  const lineMessage = { message: `Lines may be at most ${maxLineLength} characters.` };

  const GlossBodySchema = z.object({
    text: z.string().max(50_000).refine(linesWithin(maxLineLength), lineMessage),
    options: RequestOptionsSchema.optional(),
    /** Start from an empty abbreviation table instead of the default one */
    replaceAbbreviations: z.boolean().optional(),
    format: z.enum(["html", "tree"]).default("html"),
  }).strict();

  const RenderBodySchema = z.object({
    source: z.string().max(200_000).refine(linesWithin(maxLineLength), lineMessage),
    options: RequestOptionsSchema.optional(),
  }).strict();

  return { GlossBodySchema, RenderBodySchema };
}

function ok(data: unknown, requestId: string) {
  return { data, requestId };
}

function failure(code: string, message: string, requestId: string) {
  return { data: null, requestId, errors: [{ code, message }] };
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid body";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

// ─── Rate limits ──────────────────────────────────────────────────────────────

const RENDER_RATE = {
  max: 30,
  timeWindow: 60_000,
  keyGenerator: (r: FastifyRequest) => `render:${r.ip}`,
  errorResponseBuilder: (_r: FastifyRequest, ctx: { ttl: number }) => ({
    data: null,
    errors: [{ code: "RENDER_RATE_LIMITED", message: `Rate limit exceeded. Retry after ${Math.ceil(ctx.ttl / 1000)}s.` }],
  }),
};

// ─── Route registration ───────────────────────────────────────────────────────

export async function glossRoutes(fastify: FastifyInstance): Promise<void> {
  const serviceConfig = getConfig();
  const serviceBase: GlossConfig = resolveConfig(serviceConfig.glossDefaults);
  const { GlossBodySchema, RenderBodySchema } = buildBodySchemas(serviceConfig.maxLineLength);

  fastify.post("/v1/gloss", async (req, reply) => {
    const parsed = GlossBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(failure("BAD_REQUEST", firstIssue(parsed.error), req.id));
    const { text, options = {}, replaceAbbreviations = false, format } = parsed.data;

    let config: GlossConfig;
    try {
      const base = replaceAbbreviations ? withAbbreviations({}, serviceBase) : serviceBase;
      config = resolveConfig(options, base);
    } catch (err) {
      if (err instanceof GlossConfigError) return reply.code(400).send(failure("INVALID_OPTIONS", err.message, req.id));
      throw err;
    }

    const document = glossBlock(text, config);
    const columns = document.nodes.reduce((n, node) => node.kind === "words" ? n + node.columns.length : n, 0);
    req.log.debug({ nodes: document.nodes.length, columns }, "Gloss block rendered");

    if (format === "tree") return reply.send(ok({ document }, req.id));
    return reply.send(ok({ html: renderHtml(document) }, req.id));
  });

  fastify.post("/v1/render", { config: { rateLimit: RENDER_RATE } }, async (req, reply) => {
    const parsed = RenderBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(failure("BAD_REQUEST", firstIssue(parsed.error), req.id));
    const { source, options = {} } = parsed.data;

    try {
      const html = expandGlossTags(source, resolveConfig(options, serviceBase));
      return reply.send(ok({ html }, req.id));
    } catch (err) {
      if (err instanceof GlossTemplateError) {
        req.log.info({ code: err.code }, "Template rejected");
        return reply.code(422).send(failure(err.code, err.message, req.id));
      }
      if (err instanceof GlossConfigError) return reply.code(400).send(failure("INVALID_OPTIONS", err.message, req.id));
      throw err;
    }
  });

  fastify.get("/v1/abbreviations", async (req, reply) => {
    return reply.send(ok({ abbreviations: serviceBase.abbreviations }, req.id));
  });
}
