import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const serviceConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    HOST: z.string().min(1).default('0.0.0.0'),
    SERVICE_NAME: z.string().min(1).default('aiops-demo-service'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    SLOW_MIN_MS: z.coerce.number().int().min(0).default(2000),
    SLOW_MAX_MS: z.coerce.number().int().min(0).default(5000),
    CPU_SPIKE_MS: z.coerce.number().int().min(0).default(3000),
    LEAK_CHUNK_BYTES: z.coerce.number().int().min(1).default(1024 * 1024),
    LEAK_CRITICAL_CHUNKS: z.coerce.number().int().min(0).default(10),
    RANDOM_SEED: z.coerce.number().int().optional(),
    OUTCOME_TABLE_PATH: optionalString,
    API_KEY: optionalString
  })
  .refine((env) => env.SLOW_MAX_MS >= env.SLOW_MIN_MS, {
    message: 'SLOW_MAX_MS must be greater than or equal to SLOW_MIN_MS',
    path: ['SLOW_MAX_MS']
  });

export type LogLevel = z.infer<typeof serviceConfigSchema>['LOG_LEVEL'];

export interface ServiceConfig {
  port: number;
  host: string;
  serviceName: string;
  logLevel: LogLevel;
  slow: { minMs: number; maxMs: number };
  cpuSpikeMs: number;
  leak: { chunkBytes: number; criticalChunks: number };
  randomSeed?: number;
  outcomeTablePath?: string;
  apiKey?: string;
}

/**
 * Reads service settings from the environment. Empty strings count as unset.
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }

  const parsed = serviceConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    host: data.HOST,
    serviceName: data.SERVICE_NAME,
    logLevel: data.LOG_LEVEL,
    slow: { minMs: data.SLOW_MIN_MS, maxMs: data.SLOW_MAX_MS },
    cpuSpikeMs: data.CPU_SPIKE_MS,
    leak: { chunkBytes: data.LEAK_CHUNK_BYTES, criticalChunks: data.LEAK_CRITICAL_CHUNKS },
    randomSeed: data.RANDOM_SEED,
    outcomeTablePath: data.OUTCOME_TABLE_PATH,
    apiKey: data.API_KEY
  };
}
