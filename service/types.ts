import type { ServiceConfig } from '../config/service-config';
import type { WeightedSelector } from '../outcomes/outcome-selector';
import type { JsonBody, LogSeverity, OutcomeTable } from '../outcomes/types';
import type { LeakStore } from './leak-store';

export interface LogEntry {
  severity: LogSeverity;
  message: string;
  fields?: Record<string, unknown>;
}

/** Ordinary reply, successful or a synthetic error. */
export interface ResponseResult {
  kind: 'response';
  statusCode: number;
  body: JsonBody;
  logs: LogEntry[];
}

/**
 * Simulated hard crash. The server logs it at CRITICAL and replies 500;
 * the process keeps running.
 */
export interface FatalResult {
  kind: 'fatal';
  statusCode: 500;
  body: JsonBody;
  logs: LogEntry[];
  error: Error;
}

export type HandlerResult = ResponseResult | FatalResult;

export type Sleep = (ms: number) => Promise<void>;

export type Clock = () => number;

/**
 * Everything a handler may touch. Process-wide mutable state lives here
 * rather than in module-level variables.
 */
export interface ServiceContext {
  config: ServiceConfig;
  outcomeTable: OutcomeTable;
  selector: WeightedSelector;
  sleep: Sleep;
  now: Clock;
  leakStore: LeakStore;
  /** Returns the next /api/process request number, starting at 1. */
  nextRequestId(): number;
}

export type EndpointHandler = (ctx: ServiceContext) => Promise<HandlerResult>;
