import Fastify, { type FastifyBaseLogger, type FastifyRequest, type FastifyServerOptions } from 'fastify';
import { ConfigError, loadServiceConfig, type ServiceConfig } from '../config/service-config';
import { OutcomeTableError } from '../outcomes/errors';
import type { LogSeverity } from '../outcomes/types';
import { ROUTES } from '../service/handlers';
import type { HandlerResult, ServiceContext } from '../service/types';
import { buildContainer, tokens, type BuildContainerOptions } from './container';

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];
  config?: ServiceConfig;
  context?: BuildContainerOptions;
}

type LogMethod = 'info' | 'warn' | 'error' | 'fatal';

const SEVERITY_TO_LEVEL: Record<LogSeverity, LogMethod> = {
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal'
};

function isAuthorized(request: FastifyRequest, apiKey: string): boolean {
  const authHeader = request.headers.authorization;
  if (!authHeader) {
    return false;
  }

  // "Bearer <token>" or "ApiKey <key>"
  const parts = authHeader.split(' ');
  if (parts.length !== 2) {
    return false;
  }

  const [scheme, token] = parts;
  return (scheme === 'Bearer' || scheme === 'ApiKey') && token === apiKey;
}

function emitLogs(log: FastifyBaseLogger, endpoint: string, result: HandlerResult): void {
  const failure = result.kind === 'fatal' ? { err: result.error } : {};
  for (const entry of result.logs) {
    log[SEVERITY_TO_LEVEL[entry.severity]](
      { ...entry.fields, ...failure, endpoint, statusCode: result.statusCode, severity: entry.severity },
      entry.message
    );
  }
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadServiceConfig();
  const container = buildContainer(config, options.context);
  const context: ServiceContext = container.resolve(tokens.serviceContext);

  const fastify = Fastify({ logger: options.logger ?? { level: config.logLevel } });

  if (config.apiKey) {
    const apiKey = config.apiKey;
    fastify.addHook('onRequest', (request, reply, done) => {
      // Match on the routed pattern; the raw URL may still be percent-encoded.
      const route = request.routeOptions.url ?? '';
      if (!route.startsWith('/api/') || isAuthorized(request, apiKey)) {
        done();
        return;
      }
      request.log.warn({ url: request.url }, 'Rejected unauthenticated request');
      reply.code(401).send({ error: 'Authentication required' });
    });
  }

  fastify.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error, severity: 'ERROR' }, `Unhandled exception: ${error.message}`);
    reply.code(500).send({ error: 'Internal server error', message: error.message });
  });

  for (const route of ROUTES) {
    fastify.get(route.url, async (request, reply) => {
      const result = await route.handler(context);
      emitLogs(request.log, route.endpoint, result);
      reply.code(result.statusCode).send(result.body);
    });
  }

  return fastify;
}

async function start(): Promise<void> {
  const config = loadServiceConfig();
  const fastify = await buildServer({ config });
  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (error) {
    fastify.log.error({ err: error }, `Failed to start server on port ${config.port}`);
    process.exit(1);
  }
}

if (require.main === module) {
  start().catch((error: unknown) => {
    const message = error instanceof ConfigError || error instanceof OutcomeTableError
      ? error.message
      : String(error);
    console.error(`[ERROR] Failed to start service: ${message}`);
    process.exit(1);
  });
}
