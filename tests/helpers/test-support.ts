import { loadServiceConfig, type ServiceConfig } from '../../config/service-config';
import type { BuildServerOptions } from '../../server/server';

export interface CapturedLine {
  level: number;
  msg: string;
  endpoint?: string;
  severity?: string;
  statusCode?: number;
  [key: string]: unknown;
}

/** pino numeric levels */
export const LEVEL = { info: 30, warn: 40, error: 50, fatal: 60 } as const;

export function testConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return { ...loadServiceConfig({}), ...overrides };
}

export function createLogCapture() {
  const lines: CapturedLine[] = [];
  const logger: BuildServerOptions['logger'] = {
    level: 'info',
    stream: {
      write: (msg: string) => {
        lines.push(JSON.parse(msg));
      }
    }
  };

  return {
    lines,
    logger,
    forEndpoint: (endpoint: string) => lines.filter((line) => line.endpoint === endpoint),
    clear: () => {
      lines.length = 0;
    }
  };
}

export const constantRandom = (value: number) => () => value;

export const instantSleep = async (): Promise<void> => undefined;
