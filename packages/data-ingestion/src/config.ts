import { z } from 'zod';
import { DEFAULT_NULL_TOKEN, STAGING_TABLE_PATTERN, TABLES } from '@layoffs/shared';
import { PipelineError } from './utils/errorUtils';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const ConfigSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LAYOFFS_SUPABASE_URL: z.string().url().optional(),
  LAYOFFS_SUPABASE_KEY: z.string().min(1).optional(),
  LAYOFFS_SOURCE_TABLE: z.string().min(1).default(TABLES.SOURCE),
  LAYOFFS_STAGING_TABLE: z
    .string()
    .regex(STAGING_TABLE_PATTERN, 'must be lowercase and end in _staging')
    .default(TABLES.STAGING),
  LAYOFFS_GAP_FILL_STRATEGY: z.enum(['last_match', 'most_frequent']).default('last_match'),
  LAYOFFS_PRUNE_INCOMPLETE: booleanFlag,
  LAYOFFS_NULL_TOKEN: z.string().default(DEFAULT_NULL_TOKEN)
});

export interface IngestionConfig {
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  supabase: { url?: string; key?: string };
  sourceTable: string;
  stagingTable: string;
  gapFillStrategy: 'last_match' | 'most_frequent';
  pruneIncomplete: boolean;
  nullToken: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): IngestionConfig {
  const parsed = ConfigSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new PipelineError('INVALID_CONFIG', `Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    logLevel: values.LOG_LEVEL,
    supabase: { url: values.LAYOFFS_SUPABASE_URL, key: values.LAYOFFS_SUPABASE_KEY },
    sourceTable: values.LAYOFFS_SOURCE_TABLE,
    stagingTable: values.LAYOFFS_STAGING_TABLE,
    gapFillStrategy: values.LAYOFFS_GAP_FILL_STRATEGY,
    pruneIncomplete: values.LAYOFFS_PRUNE_INCOMPLETE,
    nullToken: values.LAYOFFS_NULL_TOKEN
  };
}
