import { readFileSync } from 'fs';
import { z } from 'zod';
import { OutcomeTableError } from './errors';
import type { JsonValue, Outcome, OutcomeSet, OutcomeTable } from './types';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

const outcomeSchema = z.object({
  name: z.string().min(1),
  weight: z.number().finite().positive(),
  statusCode: z.number().int().min(100).max(599),
  body: z.record(jsonValueSchema),
  logMessage: z.string().min(1),
  logSeverity: z.enum(['INFO', 'WARNING', 'ERROR', 'CRITICAL']),
  details: z.array(z.string().min(1)).optional()
});

const outcomeSetSchema = z.array(outcomeSchema).min(1, { message: 'Outcome set must not be empty' });

const outcomeTableSchema = z.object({
  process: outcomeSetSchema,
  database: outcomeSetSchema
});

const outcomeTableOverrideSchema = outcomeTableSchema.partial().strict();

export const DEFAULT_OUTCOME_TABLE: OutcomeTable = {
  process: [
    {
      name: 'success',
      weight: 70,
      statusCode: 200,
      body: { status: 'success' },
      logMessage: 'Request #{requestId} completed successfully',
      logSeverity: 'INFO'
    },
    {
      name: 'bad-request',
      weight: 7.5,
      statusCode: 400,
      body: { error: 'Invalid data' },
      logMessage: 'ValueError: Invalid input data received',
      logSeverity: 'ERROR'
    },
    {
      name: 'forbidden',
      weight: 7.5,
      statusCode: 403,
      body: { error: 'Permission denied' },
      logMessage: 'PermissionError: Access denied to resource',
      logSeverity: 'ERROR'
    },
    {
      name: 'unavailable',
      weight: 7.5,
      statusCode: 503,
      body: { error: 'Database unavailable' },
      logMessage: 'ConnectionError: Database connection refused',
      logSeverity: 'ERROR'
    },
    {
      name: 'gateway-timeout',
      weight: 7.5,
      statusCode: 504,
      body: { error: 'Request timeout' },
      logMessage: 'TimeoutError: Request timed out after 30s',
      logSeverity: 'ERROR'
    }
  ],
  database: [
    {
      name: 'success',
      weight: 50,
      statusCode: 200,
      body: { status: 'ok', data: [] },
      logMessage: 'Database query successful',
      logSeverity: 'INFO'
    },
    {
      name: 'connection-failed',
      weight: 50,
      statusCode: 503,
      body: { error: 'Database unavailable' },
      logMessage: 'Database connection failed: Connection refused on port 5432',
      logSeverity: 'ERROR',
      details: ['PostgreSQL connection pool exhausted']
    }
  ]
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function freezeSet(set: Outcome[]): OutcomeSet {
  return Object.freeze(set.map((outcome) => Object.freeze({ ...outcome })));
}

/**
 * Validates a raw table and returns a frozen copy.
 * Throws OutcomeTableError so a bad table stops the process at startup.
 */
export function validateOutcomeTable(raw: unknown): OutcomeTable {
  const parsed = outcomeTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new OutcomeTableError(`Invalid outcome table: ${formatIssues(parsed.error)}`);
  }

  return Object.freeze({
    process: freezeSet(parsed.data.process),
    database: freezeSet(parsed.data.database)
  });
}

/**
 * Loads the default table, optionally replacing endpoint sets from a JSON file.
 */
export function loadOutcomeTable(overridePath?: string): OutcomeTable {
  if (!overridePath) {
    return validateOutcomeTable(DEFAULT_OUTCOME_TABLE);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(overridePath, 'utf-8'));
  } catch (error) {
    throw new OutcomeTableError(
      `Failed to read outcome table from ${overridePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const override = outcomeTableOverrideSchema.safeParse(raw);
  if (!override.success) {
    throw new OutcomeTableError(`Invalid outcome table: ${formatIssues(override.error)}`);
  }

  return validateOutcomeTable({ ...DEFAULT_OUTCOME_TABLE, ...override.data });
}
