#!/usr/bin/env node
/**
 * Traffic generator for the demo service.
 * Sends a weighted mix of requests to a running instance so its logs show
 * realistic failure patterns.
 */

import { execFile } from 'child_process';
import { setTimeout as delay } from 'timers/promises';
import { promisify } from 'util';
import { input } from '@inquirer/prompts';
import type { RandomSource } from '../outcomes/types';
import {
  TRAFFIC_MIX,
  USAGE,
  formatRecord,
  formatSummary,
  normalizeServiceUrl,
  parseArgs,
  pickEndpoint,
  summarize,
  type RequestRecord,
  type TrafficSummary
} from './traffic-generator-helpers';

const REQUEST_TIMEOUT_MS = 10_000;
const HEALTH_TIMEOUT_MS = 5_000;
const MIN_GAP_MS = 500;
const MAX_GAP_MS = 2_000;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface TrafficOptions {
  serviceUrl: string;
  durationMs: number;
  /** Stop after this many requests instead of at the deadline. */
  count?: number;
  concurrency: number;
  token?: string;
}

export interface TrafficDeps {
  fetch: FetchLike;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
  random: RandomSource;
  log: (line: string) => void;
}

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string }>;

const execFileAsync = promisify(execFile);

const runCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, args, { encoding: 'utf-8' });
  return { stdout };
};

export const defaultDeps: TrafficDeps = {
  fetch: (url, init) => fetch(url, init),
  sleep: (ms) => delay(ms).then(() => undefined),
  now: Date.now,
  random: Math.random,
  log: (line) => console.log(line)
};

/**
 * Mints an identity token with the gcloud CLI.
 */
export async function getIdentityToken(run: CommandRunner = runCommand): Promise<string> {
  let stdout: string;
  try {
    ({ stdout } = await run('gcloud', ['auth', 'print-identity-token']));
  } catch (err) {
    throw new Error(
      `Failed to get auth token: ${err instanceof Error ? err.message : String(err)}. Make sure you are authenticated: gcloud auth login`
    );
  }

  const token = stdout.trim();
  if (!token) {
    throw new Error('Failed to get auth token: gcloud returned an empty token');
  }
  return token;
}

function buildHeaders(token?: string): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {};
}

async function timedFetch(deps: TrafficDeps, url: string, token: string | undefined, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await deps.fetch(url, { headers: buildHeaders(token), signal: controller.signal });
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      throw new Error(`Request timed out after ${timeoutMs / 1000}s`);
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}

export async function sendRequest(options: TrafficOptions, deps: TrafficDeps, endpoint: string): Promise<RequestRecord> {
  try {
    const res = await timedFetch(deps, `${options.serviceUrl}${endpoint}`, options.token, REQUEST_TIMEOUT_MS);
    // Drain the body so the connection can be reused.
    await res.text();
    return { endpoint, statusCode: res.status };
  } catch (err) {
    return { endpoint, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Returns the /health status code, or undefined when the service is unreachable.
 */
export async function checkConnectivity(options: TrafficOptions, deps: TrafficDeps): Promise<number | undefined> {
  try {
    const res = await timedFetch(deps, `${options.serviceUrl}/health`, options.token, HEALTH_TIMEOUT_MS);
    await res.text();
    return res.status;
  } catch (err) {
    deps.log(`✗ Connection failed: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
}

export async function generateTraffic(options: TrafficOptions, deps: TrafficDeps = defaultDeps): Promise<TrafficSummary> {
  if (!Number.isInteger(options.concurrency) || options.concurrency <= 0) {
    throw new Error('Concurrency must be a positive integer');
  }

  const start = deps.now();
  const deadline = start + options.durationMs;
  const records: RequestRecord[] = [];
  const inFlight = new Set<Promise<void>>();
  let submitted = 0;

  const hasBudget = (): boolean =>
    options.count !== undefined ? submitted < options.count : deps.now() < deadline;

  while (hasBudget()) {
    if (inFlight.size >= options.concurrency) {
      await Promise.race(inFlight);
      if (!hasBudget()) {
        break;
      }
    }

    const endpoint = pickEndpoint(deps.random).path;
    const task: Promise<void> = sendRequest(options, deps, endpoint).then((record) => {
      records.push(record);
      deps.log(formatRecord(record));
    }).finally(() => {
      inFlight.delete(task);
    });
    inFlight.add(task);
    submitted += 1;

    if (hasBudget()) {
      await deps.sleep(MIN_GAP_MS + deps.random() * (MAX_GAP_MS - MIN_GAP_MS));
    }
  }

  await Promise.all(inFlight);
  return summarize(records, deps.now() - start);
}

export async function main(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Promise<void> {
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(USAGE);
    return;
  }

  const args = parseArgs(argv, env);
  const serviceUrl = args.serviceUrl ?? normalizeServiceUrl(await input({
    message: 'Service URL',
    validate: (v: string) => (v.trim() ? true : 'Required')
  }));

  let token = args.token;
  if (!token && args.useGcloud) {
    console.log('Getting authentication token...');
    token = await getIdentityToken();
  }

  const options: TrafficOptions = {
    serviceUrl,
    durationMs: args.durationMinutes * 60_000,
    count: args.count,
    concurrency: args.concurrency,
    token
  };

  const limit = args.count !== undefined ? `${args.count} requests` : `${args.durationMinutes} minutes`;
  console.log(`\nDemo service traffic generator: ${serviceUrl} (${limit})\n`);
  console.log('Traffic pattern:');
  for (const endpoint of TRAFFIC_MIX) {
    console.log(`  • ${endpoint.path}: ${endpoint.description}`);
  }

  const status = await checkConnectivity(options, defaultDeps);
  if (status === undefined) {
    process.exitCode = 1;
    return;
  }
  console.log(status === 200 ? '\n✓ Service is reachable\n' : `\n⚠ Service returned status ${status}\n`);

  const summary = await generateTraffic(options);
  console.log(formatSummary(summary));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`\n✗ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
}
