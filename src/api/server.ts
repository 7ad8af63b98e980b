import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from 'fastify';
import type { LogLevel } from '../logger.ts';
import { HealthCheckRegistry, StorageHealthChecker } from './health.ts';
import { RecipeServiceError, recipeRoutesPlugin, type RecipeService } from './recipes/index.ts';

export type RecipeApiOptions = {
  service: RecipeService;
  /** Fastify request logging; off unless a level is given */
  logLevel?: LogLevel;
  requestTimeoutMs?: number;
};

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

function isFastifyError(error: unknown): error is FastifyError & { statusCode: number } {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

/** Every error body names the request it answers; `uri` is the path without query */
function errorBody<T extends object>(req: FastifyRequest, body: T): T & { method: string; uri: string } {
  return { ...body, method: req.method, uri: req.url.split('?')[0] };
}

export function buildServer(options: RecipeApiOptions): FastifyInstance {
  const { service } = options;
  const logLevel = options.logLevel ?? 'silent';
  const app = Fastify({
    logger: logLevel === 'silent' ? false : { level: logLevel },
    ignoreTrailingSlash: true,
  });

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof RecipeServiceError) {
      if (error.statusCode >= 500) {
        req.log.error({ code: error.code }, error.message);
      }
      return reply.code(error.statusCode).send(errorBody(req, error.toResponse()));
    }

    // Malformed or unsupported request bodies rejected by Fastify itself
    if (isFastifyError(error) && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send(errorBody(req, { error: error.message, code: 'INVALID_REQUEST' }));
    }

    req.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send(errorBody(req, { error: 'Internal server error', code: 'INTERNAL_ERROR' }));
  });

  app.setNotFoundHandler((req, reply) =>
    reply.code(404).send(errorBody(req, { error: 'Unknown endpoint', code: 'NOT_FOUND' })),
  );

  app.get('/health', async () => ({ ok: true }));

  // Health check endpoints (Kubernetes-compatible)
  const healthRegistry = new HealthCheckRegistry();
  healthRegistry.register(new StorageHealthChecker(service, service.backend));

  // Liveness probe - instant, no I/O, always 200
  app.get('/health/live', async () => ({ status: 'ok' }));

  // Readiness probe - checks critical dependencies
  app.get('/health/ready', async (req, reply) => {
    const ready = await healthRegistry.isReady();
    if (ready) {
      return { status: 'ok' };
    }
    return reply.code(503).send({ status: 'unavailable' });
  });

  // Detailed health status for monitoring
  app.get('/health/status', async (req, reply) => {
    const health = await healthRegistry.checkAll();
    const statusCode = health.status === 'unhealthy' ? 503 : 200;
    return reply.code(statusCode).send(health);
  });

  app.register(recipeRoutesPlugin, {
    service,
    requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
  });

  return app;
}
