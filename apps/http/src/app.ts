// apps/http/src/app.ts
import Fastify, { type FastifyError, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import {
  ErrorCode,
  OptimizeBodySchema,
  ShadowError,
  errorMessage,
  formatZodIssues,
  silentLogger,
  type Logger,
  type ProposalSource,
  type RequestOutcome,
  type ShadowConfig,
  type ShadowDatabase
} from '@shadowsql/core';
import { DecisionOrchestrator, createRequest } from '@shadowsql/engine';
import { toOptimizeResponse } from './response';

export interface AppDeps {
  config: ShadowConfig;
  db: ShadowDatabase;
  source: ProposalSource;
  logger?: Logger;
}

function shouldDebug(req: FastifyRequest): boolean {
  const h = req.headers['x-debug'];
  return h === '1' || process.env.DEBUG_ERRORS === '1';
}

// client mistakes on the way in; everything else is ours or a collaborator's
const CLIENT_CODES = new Set<string>([ErrorCode.UNSAFE_SQL, ErrorCode.UNSUPPORTED_DIALECT, ErrorCode.CONFIG_INVALID]);

export function classifyError(e: unknown): { code: string; status: number; message: string; details?: unknown } {
  if (e instanceof ZodError) return { code: 'VALIDATION', status: 400, message: 'invalid request body', details: formatZodIssues(e) };
  if (e instanceof ShadowError) {
    if (CLIENT_CODES.has(e.code)) return { code: e.code, status: 400, message: e.message };
    if (e.code === ErrorCode.COLLABORATOR_UNAVAILABLE) return { code: e.code, status: 502, message: e.message, details: e.details };
    if (e.code === ErrorCode.CANCELLED) return { code: e.code, status: 499, message: e.message };
    return { code: e.code, status: 500, message: e.message };
  }
  // fastify's own errors (bad JSON, body too large, rate limited) carry their status
  const statusCode = typeof e === 'object' && e !== null ? Reflect.get(e, 'statusCode') : undefined;
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
    const code = statusCode === 429 ? 'RATE_LIMITED' : 'BAD_REQUEST';
    return { code, status: statusCode, message: errorMessage(e) };
  }
  return { code: ErrorCode.INTERNAL, status: 500, message: errorMessage(e) };
}

function requestId(header: string | string[] | undefined): string {
  const v = Array.isArray(header) ? header[0] : header;
  return v && /^[A-Za-z0-9._-]{1,128}$/.test(v) ? v : uuidv4();
}

export async function buildApp(deps: AppDeps) {
  const { config } = deps;
  const logger = deps.logger ?? silentLogger();
  const orchestrator = new DecisionOrchestrator({
    db: deps.db,
    source: deps.source,
    config: config.verification,
    forbiddenOperations: config.security.forbidden_operations,
    logger
  });

  const app = Fastify({
    logger,
    bodyLimit: config.server.body_limit,
    genReqId: (req) => requestId(req.headers['x-request-id'])
  });

  const allow = config.server.cors_origin.split(',').map((s) => s.trim()).filter(Boolean);
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(null, false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.server.rate_limit.max,
    timeWindow: config.server.rate_limit.time_window
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err: FastifyError, req, rep) => {
    const { code, status, message, details } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.warn({ code, requestId: req.id, msg: message }, 'request-rejected');
    rep.status(status).send({
      code,
      message: status >= 500 ? 'Request failed' : message,
      error: message,
      requestId: req.id,
      ...(details !== undefined && (code === 'VALIDATION' || shouldDebug(req)) ? { details } : {})
    });
  });

  // ------------------------------------
  // POST /optimize
  // ------------------------------------
  app.post('/optimize', async (req, reply) => {
    const body = OptimizeBodySchema.parse(req.body);
    const request = createRequest({ sql: body.sql, database: body.database, id: req.id });

    // a client that hangs up should not keep the shadow database busy
    const ctl = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) ctl.abort();
    };
    reply.raw.on('close', onClose);

    let outcome: RequestOutcome;
    try {
      outcome = await orchestrator.optimize(request, {
        signal: ctl.signal,
        maxAttempts: body.options?.max_attempts,
        minSpeedup: body.options?.min_speedup
      });
    } finally {
      reply.raw.off('close', onClose);
    }

    if (outcome.status === 'fatal_error' || outcome.status === 'cancelled') {
      const code = outcome.error?.code ?? ErrorCode.INTERNAL;
      const status = outcome.status === 'cancelled' ? 499 : 502;
      return reply.code(status).send({
        code,
        message: outcome.status === 'cancelled' ? 'Request cancelled' : 'Optimization failed',
        error: outcome.error?.message ?? 'unknown error',
        requestId: req.id,
        status: outcome.status
      });
    }
    return reply.send(toOptimizeResponse(outcome));
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async (_req, reply) => {
    const [dh, lh] = await Promise.allSettled([deps.db.health(), deps.source.health()]);
    const database = dh.status === 'fulfilled' ? dh.value : { ok: false, error: errorMessage(dh.reason) };
    const llm = lh.status === 'fulfilled' ? lh.value : { ok: false, error: errorMessage(lh.reason) };
    const ok = database.ok && llm.ok;
    return reply.code(ok ? 200 : 503).send({ ok, database, llm });
  });

  return app;
}
