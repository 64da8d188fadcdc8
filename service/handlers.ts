import type { Outcome } from '../outcomes/types';
import type { EndpointHandler, HandlerResult, LogEntry, ResponseResult, ServiceContext } from './types';

const STRESS_LOG_LINES = 10;
const STRESS_ERROR_PROBABILITY = 0.3;
const CPU_SPIKE_RANGE = 10_000;
/** Upper bound on loop passes in case the clock never advances. */
const CPU_SPIKE_MAX_ITERATIONS = 1_000_000;

/** Error type named in the process failure line, keyed by outcome name. */
const PROCESS_ERROR_TYPES: Record<string, string> = {
  'bad-request': 'ValueError',
  forbidden: 'PermissionError',
  unavailable: 'ConnectionError',
  'gateway-timeout': 'TimeoutError'
};

function respond(statusCode: number, body: ResponseResult['body'], logs: LogEntry[]): ResponseResult {
  return { kind: 'response', statusCode, body, logs };
}

/** Fills `{requestId}` placeholders in outcome log messages. */
function outcomeLogs(outcome: Outcome, requestId?: number): LogEntry[] {
  const fields = requestId === undefined ? { outcome: outcome.name } : { outcome: outcome.name, requestId };
  const message = requestId === undefined
    ? outcome.logMessage
    : outcome.logMessage.replace(/\{requestId\}/g, String(requestId));
  return [
    { severity: outcome.logSeverity, message, fields },
    ...(outcome.details ?? []).map((message) => ({ severity: outcome.logSeverity, message, fields }))
  ];
}

export const health: EndpointHandler = async (ctx) =>
  respond(200, { status: 'healthy', service: ctx.config.serviceName }, [
    { severity: 'INFO', message: 'Health check' }
  ]);

export const processRequest: EndpointHandler = async (ctx) => {
  const requestId = ctx.nextRequestId();
  const outcome = ctx.selector.pick(ctx.outcomeTable.process);
  const logs: LogEntry[] = [{ severity: 'INFO', message: `Processing request #${requestId}`, fields: { requestId } }];

  if (outcome.statusCode < 400) {
    logs.push(...outcomeLogs(outcome, requestId));
    return respond(
      outcome.statusCode,
      { ...outcome.body, request_id: requestId, timestamp: new Date(ctx.now()).toISOString() },
      logs
    );
  }

  const errorType = PROCESS_ERROR_TYPES[outcome.name] ?? 'Error';
  logs.push({
    severity: 'ERROR',
    message: `Request failed with ${errorType}: Unable to process request`,
    fields: { requestId }
  });
  logs.push(...outcomeLogs(outcome, requestId));
  return respond(outcome.statusCode, { ...outcome.body }, logs);
};

export const slow: EndpointHandler = async (ctx) => {
  const { minMs, maxMs } = ctx.config.slow;
  const delayMs = ctx.selector.uniform(minMs, maxMs);
  const delaySeconds = delayMs / 1000;

  const logs: LogEntry[] = [
    { severity: 'WARNING', message: `Slow endpoint called, sleeping for ${delaySeconds.toFixed(2)}s`, fields: { delayMs } }
  ];
  await ctx.sleep(delayMs);
  logs.push({ severity: 'INFO', message: 'Slow endpoint completed' });

  return respond(200, {
    status: 'completed',
    delay: delaySeconds,
    message: 'This endpoint is intentionally slow'
  }, logs);
};

export const database: EndpointHandler = async (ctx) => {
  const outcome = ctx.selector.pick(ctx.outcomeTable.database);
  return respond(outcome.statusCode, { ...outcome.body }, outcomeLogs(outcome));
};

export const permission: EndpointHandler = async () =>
  respond(403, { error: 'Permission denied' }, [
    { severity: 'ERROR', message: 'Permission denied: Insufficient privileges to access resource' },
    { severity: 'ERROR', message: 'IAM check failed for service account' }
  ]);

export const network: EndpointHandler = async () =>
  respond(503, { error: 'Network unreachable' }, [
    { severity: 'ERROR', message: 'Network error: Connection to external service timed out' },
    { severity: 'ERROR', message: 'DNS resolution failed for api.external-service.com' }
  ]);

export const memoryLeak: EndpointHandler = async (ctx) => {
  const { chunks, retainedBytes } = ctx.leakStore.retain();
  const { criticalChunks } = ctx.config.leak;

  const logs: LogEntry[] = [
    { severity: 'WARNING', message: `Memory leak: ${chunks}MB allocated`, fields: { chunks, retainedBytes } }
  ];
  if (chunks > criticalChunks) {
    logs.push({ severity: 'ERROR', message: `Memory leak critical: Over ${criticalChunks}MB leaked!`, fields: { chunks } });
  }

  return respond(200, { status: 'ok', leaked_mb: chunks, retained_bytes: retainedBytes }, logs);
};

export const crash: EndpointHandler = async (): Promise<HandlerResult> => ({
  kind: 'fatal',
  statusCode: 500,
  body: { error: 'Internal server error', message: 'Simulated application crash!' },
  logs: [
    { severity: 'CRITICAL', message: 'CRITICAL: Application crash triggered!' },
    { severity: 'CRITICAL', message: 'NullPointerException: Attempted to access null object' }
  ],
  error: new Error('Simulated application crash!')
});

/**
 * Sum of 0..n-1, computed the slow way on purpose.
 */
function burn(n: number): number {
  let total = 0;
  for (let i = 0; i < n; i += 1) {
    total += i;
  }
  return total;
}

export const cpuSpike: EndpointHandler = async (ctx) => {
  const logs: LogEntry[] = [{ severity: 'WARNING', message: 'CPU spike endpoint called' }];

  const start = ctx.now();
  let result = 0;
  let iterations = 0;
  while (ctx.now() - start < ctx.config.cpuSpikeMs && iterations < CPU_SPIKE_MAX_ITERATIONS) {
    result += burn(CPU_SPIKE_RANGE);
    iterations += 1;
  }

  logs.push({ severity: 'INFO', message: 'CPU spike completed', fields: { iterations, elapsedMs: ctx.now() - start } });
  return respond(200, { status: 'completed', computation_result: result, iterations }, logs);
};

export const stress: EndpointHandler = async (ctx: ServiceContext) => {
  const logs: LogEntry[] = [{ severity: 'INFO', message: 'Stress test started' }];
  for (let i = 0; i < STRESS_LOG_LINES; i += 1) {
    if (ctx.selector.chance(STRESS_ERROR_PROBABILITY)) {
      logs.push({ severity: 'ERROR', message: `Stress test error #${i}: Random failure` });
    } else {
      logs.push({ severity: 'INFO', message: `Stress test log #${i}` });
    }
  }
  return respond(200, { status: 'completed', logs_generated: STRESS_LOG_LINES }, logs);
};

export interface RouteDefinition {
  url: string;
  endpoint: string;
  handler: EndpointHandler;
}

export const ROUTES: readonly RouteDefinition[] = [
  { url: '/', endpoint: 'home', handler: health },
  { url: '/health', endpoint: 'health', handler: health },
  { url: '/api/process', endpoint: 'process', handler: processRequest },
  { url: '/api/slow', endpoint: 'slow', handler: slow },
  { url: '/api/database', endpoint: 'database', handler: database },
  { url: '/api/permission', endpoint: 'permission', handler: permission },
  { url: '/api/network', endpoint: 'network', handler: network },
  { url: '/api/memory-leak', endpoint: 'memory-leak', handler: memoryLeak },
  { url: '/api/crash', endpoint: 'crash', handler: crash },
  { url: '/api/cpu-spike', endpoint: 'cpu-spike', handler: cpuSpike },
  { url: '/api/stress', endpoint: 'stress', handler: stress }
];
