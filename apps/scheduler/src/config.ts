import { z } from 'zod';
import {
  BLOB_CONTAINERS,
  ConfigurationError,
  DEFAULT_CONCURRENCY_LIMIT,
  DEFAULT_MAX_PAGES,
} from '@deltaflow/shared';
import { formatZodError } from '@deltaflow/table-registry';

const backend = z.enum(['postgres', 'blob']).default('postgres');
const milliseconds = z.coerce.number().int().nonnegative();

const envSchema = z
  .object({
    CONCURRENCY_LIMIT: z.coerce.number().default(DEFAULT_CONCURRENCY_LIMIT),
    MAX_PAGES_PER_TABLE: z.coerce.number().int().positive().default(DEFAULT_MAX_PAGES),
    TABLE_TIMEOUT_MS: milliseconds.default(0),
    CYCLE_DEADLINE_MS: milliseconds.default(0),
    RUNNER_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
    RUNNER_RETRY_BASE_DELAY_MS: milliseconds.default(500),
    REGISTRY_SOURCE: z.enum(['file', 'postgres']).default('file'),
    REGISTRY_PATH: z.string().min(1).default('./tables.json'),
    WATERMARK_BACKEND: backend,
    SINK_BACKEND: backend,
    SOURCE_DATABASE_URL: z.string().min(1),
    AZURE_STORAGE_CONNECTION_STRING: z.string().min(1).optional(),
    WATERMARK_CONTAINER: z.string().min(1).default(BLOB_CONTAINERS.WATERMARKS),
    SINK_CONTAINER: z.string().min(1).default(BLOB_CONTAINERS.DELTAS),
    SINK_PREFIX: z.string().default(''),
  })
  .superRefine((env, ctx) => {
    const usesBlob = env.WATERMARK_BACKEND === 'blob' || env.SINK_BACKEND === 'blob';
    if (usesBlob && !env.AZURE_STORAGE_CONNECTION_STRING) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AZURE_STORAGE_CONNECTION_STRING'],
        message: 'required when a blob backend is selected',
      });
    }
  });

export type Backend = z.infer<typeof backend>;

export type RegistryConfig = { source: 'file'; path: string } | { source: 'postgres' };

export interface SchedulerConfig {
  concurrencyLimit: number;
  maxPagesPerTable: number;
  /** 0 disables the per-table budget */
  tableTimeoutMs: number;
  /** 0 disables the cycle deadline */
  cycleDeadlineMs: number;
  retry: { maxRetries: number; baseDelayMs: number };
  registry: RegistryConfig;
  watermarkBackend: Backend;
  sinkBackend: Backend;
  sourceDatabaseUrl: string;
  blob: {
    connectionString?: string;
    watermarkContainer: string;
    sinkContainer: string;
    sinkPrefix: string;
  };
}

/** Treat blank variables as unset so their defaults apply. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') values[key] = value;
  }
  return values;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SchedulerConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid scheduler configuration: ${formatZodError(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    concurrencyLimit: e.CONCURRENCY_LIMIT,
    maxPagesPerTable: e.MAX_PAGES_PER_TABLE,
    tableTimeoutMs: e.TABLE_TIMEOUT_MS,
    cycleDeadlineMs: e.CYCLE_DEADLINE_MS,
    retry: { maxRetries: e.RUNNER_MAX_RETRIES, baseDelayMs: e.RUNNER_RETRY_BASE_DELAY_MS },
    registry: e.REGISTRY_SOURCE === 'file' ? { source: 'file', path: e.REGISTRY_PATH } : { source: 'postgres' },
    watermarkBackend: e.WATERMARK_BACKEND,
    sinkBackend: e.SINK_BACKEND,
    sourceDatabaseUrl: e.SOURCE_DATABASE_URL,
    blob: {
      connectionString: e.AZURE_STORAGE_CONNECTION_STRING,
      watermarkContainer: e.WATERMARK_CONTAINER,
      sinkContainer: e.SINK_CONTAINER,
      sinkPrefix: e.SINK_PREFIX,
    },
  };
}
