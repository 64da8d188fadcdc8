/**
 * Pure helpers for the traffic generator. Exported for testing.
 */

import { selectWeighted } from '../outcomes/outcome-selector';
import type { RandomSource } from '../outcomes/types';

export interface TrafficEndpoint {
  path: string;
  description: string;
  weight: number;
}

/** Normal traffic on /api/process outweighs each failure route 3:1. */
export const TRAFFIC_MIX: readonly TrafficEndpoint[] = [
  { path: '/api/process', description: 'Normal requests with 30% errors', weight: 3 },
  { path: '/api/slow', description: 'Slow endpoint (2-5s)', weight: 1 },
  { path: '/api/database', description: 'Database errors (50% fail)', weight: 1 },
  { path: '/api/permission', description: 'Permission errors', weight: 1 },
  { path: '/api/network', description: 'Network errors', weight: 1 }
];

export interface TrafficArgs {
  serviceUrl?: string;
  durationMinutes: number;
  count?: number;
  concurrency: number;
  token?: string;
  useGcloud: boolean;
}

export interface RequestRecord {
  endpoint: string;
  /** Undefined when the request never got a response. */
  statusCode?: number;
  error?: string;
}

export interface TrafficSummary {
  total: number;
  errors: number;
  /** Percentage, 0 when nothing was sent. */
  errorRate: number;
  durationMs: number;
  byStatus: Record<string, number>;
}

export const USAGE = [
  'Usage: traffic-generator <SERVICE_URL> [duration_minutes]',
  '',
  'Environment:',
  '  TRAFFIC_TOKEN        bearer token sent with every request',
  '  TRAFFIC_USE_GCLOUD   "true" to mint a token with gcloud auth print-identity-token',
  '  TRAFFIC_COUNT        stop after this many requests instead of the duration',
  '  TRAFFIC_CONCURRENCY  maximum requests in flight (default 3)'
].join('\n');

function parsePositiveInt(raw: string, label: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${label} must be a positive integer, got: ${raw}`);
  }
  return value;
}

export function normalizeServiceUrl(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, '');
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new Error(`Invalid service URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Service URL must use http or https: ${raw}`);
  }
  return trimmed;
}

export function parseArgs(argv: readonly string[], env: NodeJS.ProcessEnv = {}): TrafficArgs {
  const [url, duration] = argv;
  const token = env.TRAFFIC_TOKEN?.trim();

  return {
    serviceUrl: url ? normalizeServiceUrl(url) : undefined,
    durationMinutes: duration ? parsePositiveInt(duration, 'duration_minutes') : 5,
    count: env.TRAFFIC_COUNT ? parsePositiveInt(env.TRAFFIC_COUNT, 'TRAFFIC_COUNT') : undefined,
    concurrency: env.TRAFFIC_CONCURRENCY ? parsePositiveInt(env.TRAFFIC_CONCURRENCY, 'TRAFFIC_CONCURRENCY') : 3,
    token: token ? token : undefined,
    useGcloud: env.TRAFFIC_USE_GCLOUD === 'true' || env.TRAFFIC_USE_GCLOUD === '1'
  };
}

export function pickEndpoint(random: RandomSource, mix: readonly TrafficEndpoint[] = TRAFFIC_MIX): TrafficEndpoint {
  return selectWeighted(mix, random);
}

export function isErrorRecord(record: RequestRecord): boolean {
  return record.statusCode === undefined || record.statusCode >= 400;
}

export function formatRecord(record: RequestRecord): string {
  if (record.statusCode === undefined) {
    return `✗ ${record.endpoint} -> Error: ${record.error ?? 'unknown error'}`;
  }
  return `${isErrorRecord(record) ? '✗' : '✓'} ${record.endpoint} -> ${record.statusCode}`;
}

export function summarize(records: readonly RequestRecord[], durationMs: number): TrafficSummary {
  const byStatus: Record<string, number> = {};
  let errors = 0;
  for (const record of records) {
    const key = record.statusCode === undefined ? 'failed' : String(record.statusCode);
    byStatus[key] = (byStatus[key] ?? 0) + 1;
    if (isErrorRecord(record)) {
      errors += 1;
    }
  }

  return {
    total: records.length,
    errors,
    errorRate: records.length > 0 ? (errors / records.length) * 100 : 0,
    durationMs,
    byStatus
  };
}

export function formatSummary(summary: TrafficSummary): string {
  const rule = '='.repeat(60);
  const lines = [
    '',
    rule,
    'Traffic Generation Complete!',
    rule,
    `Total Requests: ${summary.total}`,
    `Errors: ${summary.errors}`,
    `Error Rate: ${summary.errorRate.toFixed(1)}%`,
    `Duration: ${(summary.durationMs / 60_000).toFixed(1)} minutes`
  ];

  const statuses = Object.keys(summary.byStatus).sort();
  if (statuses.length > 0) {
    lines.push('By status:');
    for (const status of statuses) {
      lines.push(`  ${status}: ${summary.byStatus[status]}`);
    }
  }
  return lines.join('\n');
}
