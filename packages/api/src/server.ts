// imagegate HTTP API — Fastify adapter over ImageGateEngine
//
//   POST /v1/images/evaluate         { image, format? } → report document
//   GET  /v1/images/:ref             report document for a URL-encoded reference
//   GET  /v1/images/:ref/badge.svg   embeddable disposition badge
//   GET  /health

import Fastify from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { FastifyBaseLogger, FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import {
  EvaluationCancelledError,
  InvalidImageReferenceError,
  exitCodeFor,
  formatReportText,
  toReportDocument,
} from '@imagegate/core';
import type { EvaluationReport, ImageGateEngine } from '@imagegate/core';
import { renderBadge } from './badge.js';

export const VERSION = '0.1.0';

const MAX_REFERENCE_LEN = 512;
/** Headroom over the per-capability timeout before the whole evaluation is cancelled */
const EVALUATION_GRACE_MS = 5_000;

export interface ServerOptions {
  engine: ImageGateEngine;
  /** Fastify's own pino logger (ignored when loggerInstance is given) */
  logger?: boolean;
  /** Share one pino root between Fastify and the engine */
  loggerInstance?: FastifyBaseLogger;
  rateLimit?: { max: number; timeWindow: string | number };
  /** Overall budget per evaluation (default: capability timeout + 5s) */
  evaluationTimeoutMs?: number;
}

// ── Request validation ────────────────────────────────────────────────────────
const EvaluateBodySchema = z.object({
  image: z
    .string()
    .trim()
    .min(1, 'image must not be empty')
    .max(MAX_REFERENCE_LEN, `image exceeds maximum length of ${MAX_REFERENCE_LEN} characters`),
  format: z.enum(['json', 'text']).default('json'),
});

const RefParamsSchema = z.object({
  ref: z
    .string()
    .min(1)
    .max(MAX_REFERENCE_LEN, `image exceeds maximum length of ${MAX_REFERENCE_LEN} characters`),
});

function invalid(reply: FastifyReply, error: z.ZodError): FastifyReply {
  return reply.code(400).send({
    error: 'Invalid request',
    issues: error.issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`),
    example: { image: 'bitnami/redis:7.2' },
  });
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const { engine } = options;
  const timeoutMs = options.evaluationTimeoutMs ?? engine.config.timeouts.capabilityMs + EVALUATION_GRACE_MS;

  // trustProxy: false — use raw socket IP for rate limiting.
  const server = options.loggerInstance
    ? Fastify({ loggerInstance: options.loggerInstance, trustProxy: false })
    : Fastify({ logger: options.logger ?? false, trustProxy: false });

  // ── Rate limiting ───────────────────────────────────────────────────────────
  await server.register(rateLimit, {
    global: true,
    max: options.rateLimit?.max ?? 60,
    timeWindow: options.rateLimit?.timeWindow ?? '1 minute',
    errorResponseBuilder: (_req, context) => ({
      statusCode: 429,
      error: 'Rate limit exceeded',
      limit: context.max,
      retry_after_seconds: Math.ceil(context.ttl / 1000),
    }),
  });

  // ── Security headers ────────────────────────────────────────────────────────
  server.addHook('onSend', (_req, reply, _payload, done) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    reply.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    reply.header('Referrer-Policy', 'no-referrer');
    done();
  });

  /**
   * Run one evaluation under the request budget. Invalid input → 400,
   * budget exhausted → 504; anything else propagates as a 500.
   */
  async function evaluate(
    image: string,
    reply: FastifyReply,
    render: (report: EvaluationReport) => FastifyReply,
  ): Promise<FastifyReply> {
    let report: EvaluationReport;
    try {
      report = await engine.evaluate(image, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (err: unknown) {
      if (err instanceof InvalidImageReferenceError) {
        return reply.code(400).send({ error: err.message });
      }
      if (err instanceof EvaluationCancelledError) {
        return reply.code(504).send({ error: `Evaluation of ${image} exceeded ${timeoutMs}ms` });
      }
      throw err;
    }
    return render(report);
  }

  const sendDocument = (reply: FastifyReply) => (report: EvaluationReport): FastifyReply =>
    reply.send({ ...toReportDocument(report), exit_code: exitCodeFor(report.decision) });

  // ── Routes ──────────────────────────────────────────────────────────────────

  // POST /v1/images/evaluate
  server.post('/v1/images/evaluate', async (request, reply) => {
    const body = EvaluateBodySchema.safeParse(request.body ?? {});
    if (!body.success) return invalid(reply, body.error);

    const { image, format } = body.data;
    if (format === 'text') {
      return evaluate(image, reply, (report) =>
        reply.type('text/plain; charset=utf-8').send(formatReportText(report)),
      );
    }
    return evaluate(image, reply, sendDocument(reply));
  });

  // GET /v1/images/:ref — the reference is URL-encoded ("/" → %2F)
  server.get('/v1/images/:ref', async (request, reply) => {
    const params = RefParamsSchema.safeParse(request.params);
    if (!params.success) return invalid(reply, params.error);
    return evaluate(params.data.ref, reply, sendDocument(reply));
  });

  // GET /v1/images/:ref/badge.svg
  server.get('/v1/images/:ref/badge.svg', async (request, reply) => {
    const params = RefParamsSchema.safeParse(request.params);
    if (!params.success) return invalid(reply, params.error);
    return evaluate(params.data.ref, reply, (report) =>
      reply
        .header('Content-Type', 'image/svg+xml')
        .header('Cache-Control', 'public, max-age=300')
        .send(renderBadge(report)),
    );
  });

  // GET /health
  server.get('/health', async () => ({
    status: 'ok',
    version: VERSION,
    adoption_strategies: engine.adoptionStrategies(),
    thresholds: engine.config.thresholds,
    uptime_seconds: process.uptime(),
  }));

  return server;
}
