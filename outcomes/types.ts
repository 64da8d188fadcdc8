/**
 * Outcome model shared by the selector, the handlers and the server.
 */

export type LogSeverity = 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonBody = { [key: string]: JsonValue };

/** One possible result an endpoint may produce. */
export interface Outcome {
  /** Stable label, used in log fields and tests. */
  name: string;
  /** Relative weight; normalized against the rest of the set at selection time. */
  weight: number;
  statusCode: number;
  body: JsonBody;
  logMessage: string;
  logSeverity: LogSeverity;
  /** Follow-up lines logged at the same severity after logMessage. */
  details?: string[];
}

export type OutcomeSet = readonly Outcome[];

export type RandomizedEndpoint = 'process' | 'database';

export type OutcomeTable = Readonly<Record<RandomizedEndpoint, OutcomeSet>>;

/** Returns a value in [0, 1). */
export type RandomSource = () => number;
