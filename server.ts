import { timingSafeEqual } from 'crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { applyColumnMapping } from './columnMapping.js';
import { computeIndices } from './computeIndices.js';
import { config } from './config.js';
import { ConfigError, ValidationError } from './errors.js';
import { toCsv } from './lib/export.js';
import {
  computationCounter,
  computeDuration,
  register,
  rowsProcessedCounter,
  undefinedResultCounter,
} from './lib/metrics.js';
import { LimitStore } from './limits.js';
import { logger } from './logger.js';
import { parseSampleTableRequest } from './requests.js';
import type { WeightScheme } from './shared/types.js';
import { summarizeResults } from './summary.js';
import { validateSampleTable } from './validator.js';

export interface ServerOptions {
  store: LimitStore;
  /** Bearer token for limit edits; editing is disabled without one */
  adminToken?: string;
  weightScheme?: WeightScheme;
  pollutedThreshold?: number;
}

const tokenMatches = (header: string | undefined, token: string): boolean => {
  if (!header?.startsWith('Bearer ')) return false;
  const given = Buffer.from(header.slice('Bearer '.length));
  const expected = Buffer.from(token);
  return given.length === expected.length && timingSafeEqual(given, expected);
};

interface ErrorResponse {
  status: number;
  body: { error: string; message: string };
}

/**
 * 400 for bad payloads, 500 for anything else
 */
const errorResponse = (reqId: string, error: unknown, message: string): ErrorResponse => {
  if (error instanceof ValidationError || error instanceof ConfigError) {
    logger.warn({ reqId, error: error.message }, message);
    return { status: 400, body: { error: 'Bad Request', message: error.message } };
  }
  logger.error({ error, reqId }, message);
  return {
    status: 500,
    body: { error: 'Internal server error', message: error instanceof Error ? error.message : message },
  };
};

/**
 * Builds the HTTP API around a limits store
 */
export const buildServer = async (options: ServerOptions) => {
  const { store } = options;
  const defaultScheme = options.weightScheme ?? config.weightScheme;
  const pollutedThreshold = options.pollutedThreshold ?? config.pollutedThreshold;

  const server = Fastify({
    logger,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'reqId',
    bodyLimit: config.bodyLimitBytes,
    trustProxy: true,
  });

  await server.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
  });

  await server.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindow,
    allowList: ['127.0.0.1', 'localhost'],
  });

  /**
   * Health check with the number of tracked metals
   */
  server.get('/healthz', async () => ({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    metals: Object.keys(store.snapshot()).length,
  }));

  server.get('/metrics', async (_request, reply) => {
    reply.header('Content-Type', register.contentType);
    return register.metrics();
  });

  server.get('/v1/limits', async () => ({ limits: store.snapshot() }));

  /**
   * Admin edit path: validates, persists and swaps in a new snapshot
   */
  server.put('/v1/limits', async (request, reply) => {
    if (!options.adminToken) {
      return reply.code(403).send({ error: 'Forbidden', message: 'Limits editing is disabled' });
    }
    if (!tokenMatches(request.headers.authorization, options.adminToken)) {
      return reply.code(401).send({ error: 'Unauthorized', message: 'Invalid admin token' });
    }

    try {
      const limits = await store.update(request.body);
      logger.info({ reqId: request.id, metals: Object.keys(limits) }, 'Limits updated');
      return { limits };
    } catch (error) {
      if (error instanceof ConfigError) {
        return reply.code(422).send({ error: 'Unprocessable Entity', message: error.message });
      }
      const { status, body } = errorResponse(request.id, error, 'Failed to update limits');
      return reply.code(status).send(body);
    }
  });

  server.post('/v1/validate', async (request, reply) => {
    try {
      const payload = parseSampleTableRequest(request.body);
      const rows = payload.columnMap ? applyColumnMapping(payload.rows, payload.columnMap) : payload.rows;
      return { validation: validateSampleTable(rows, Object.keys(store.snapshot())) };
    } catch (error) {
      const { status, body } = errorResponse(request.id, error, 'Failed to validate sample table');
      return reply.code(status).send(body);
    }
  });

  /**
   * Computes HMPI, MCI and PI columns against one limits snapshot
   */
  server.post<{ Querystring: { format?: string } }>('/v1/indices', async (request, reply) => {
    try {
      const limits = store.snapshot();
      const payload = parseSampleTableRequest(request.body);
      const rows = payload.columnMap ? applyColumnMapping(payload.rows, payload.columnMap) : payload.rows;
      const weightScheme = payload.weightScheme ?? defaultScheme;

      const validation = validateSampleTable(rows, Object.keys(limits));
      const endTimer = computeDuration.startTimer();
      const result = computeIndices(rows, limits, { weightScheme });
      endTimer();

      computationCounter.inc({ weight_scheme: weightScheme });
      rowsProcessedCounter.inc(rows.length);
      undefinedResultCounter.inc({ index: 'HMPI' }, result.diagnostics.undefinedCounts.HMPI);
      undefinedResultCounter.inc({ index: 'MCI' }, result.diagnostics.undefinedCounts.MCI);

      const summary = summarizeResults(result.rows, pollutedThreshold);
      logger.info(
        { reqId: request.id, rows: summary.total, polluted: summary.polluted, unknown: summary.unknown, weightScheme },
        'Indices computed',
      );

      if (request.query.format === 'csv') {
        return reply
          .type('text/csv; charset=utf-8')
          .header('Content-Disposition', 'attachment; filename="hmpi_results.csv"')
          .send(toCsv(result.rows));
      }

      return { rows: result.rows, diagnostics: result.diagnostics, summary, validation };
    } catch (error) {
      const { status, body } = errorResponse(request.id, error, 'Failed to compute indices');
      return reply.code(status).send(body);
    }
  });

  return server;
};

/**
 * Start the server
 */
const start = async (): Promise<void> => {
  try {
    const store = await LimitStore.open(config.limitsPath);
    const server = await buildServer({ store, adminToken: config.adminToken });

    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down API server gracefully');
      try {
        await server.close();
        logger.info('Server shutdown complete');
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    await server.listen({ port: config.port, host: config.host });
    logger.info({ port: config.port, host: config.host, limitsPath: config.limitsPath }, 'API server running');
  } catch (error) {
    logger.error({ error }, 'Failed to start API server');
    process.exit(1);
  }
};

if (import.meta.url === `file://${process.argv[1]}`) {
  void start();
}
