import { z } from 'zod';

export const MergeConfigSchema = z
  .object({
    /** Base URL of the OpenAI-compatible Fast Apply endpoint */
    baseUrl: z.string().url().default('https://api.morphllm.com/v1'),
    model: z.string().min(1).default('morph-v3-fast'),
    apiKey: z.string().optional(),
    apiKeyEnv: z.string().default('MORPH_API_KEY'),
    timeoutMs: z.number().int().min(1000).default(30_000),
  })
  .default({
    baseUrl: 'https://api.morphllm.com/v1',
    model: 'morph-v3-fast',
    apiKeyEnv: 'MORPH_API_KEY',
    timeoutMs: 30_000,
  });

export const GitHubConfigSchema = z
  .object({
    token: z.string().optional(),
    tokenEnv: z.string().default('GITHUB_TOKEN'),
    apiBaseUrl: z.string().url().default('https://api.github.com'),
    /** `{repo}` is replaced by owner/name */
    remoteUrlTemplate: z
      .string()
      .refine((v) => v.includes('{repo}'), { message: 'must contain the {repo} placeholder' })
      .default('https://github.com/{repo}.git'),
    timeoutMs: z.number().int().min(1000).default(60_000),
  })
  .default({
    tokenEnv: 'GITHUB_TOKEN',
    apiBaseUrl: 'https://api.github.com',
    remoteUrlTemplate: 'https://github.com/{repo}.git',
    timeoutMs: 60_000,
  });

export const GitConfigSchema = z
  .object({
    branchPrefix: z.string().default('northstar'),
    maxBranchProbes: z.number().int().min(1).default(50),
    timeoutMs: z.number().int().min(1000).default(120_000),
    authorName: z.string().default('Northstar'),
    authorEmail: z.string().default('northstar@users.noreply.github.com'),
  })
  .default({
    branchPrefix: 'northstar',
    maxBranchProbes: 50,
    timeoutMs: 120_000,
    authorName: 'Northstar',
    authorEmail: 'northstar@users.noreply.github.com',
  });

export const ExecutionConfigSchema = z
  .object({
    /** Overall ceiling for one execution, across all steps */
    deadlineMs: z.number().int().min(1000).default(300_000),
    defaultBaseBranch: z.string().default('main'),
    defaultRepo: z
      .string()
      .regex(/^[^/\s]+\/[^/\s]+$/, 'must be in owner/name form')
      .optional(),
    defaultFile: z.string().optional(),
    defaultRolloutPct: z.number().int().min(0).max(100).default(20),
    commitMessagePrefix: z.string().default('Northstar: '),
    prTitlePrefix: z.string().default('Northstar Experiment: '),
    diffPreviewMaxLines: z.number().int().min(0).default(200),
  })
  .default({
    deadlineMs: 300_000,
    defaultBaseBranch: 'main',
    defaultRolloutPct: 20,
    commitMessagePrefix: 'Northstar: ',
    prTitlePrefix: 'Northstar Experiment: ',
    diffPreviewMaxLines: 200,
  });

export const ExtractionConfigSchema = z
  .object({
    /** Non-JSON replies shorter than this are treated as refusals */
    minLength: z.number().int().min(0).default(20),
    /** Length of the raw-output snippet attached to extraction errors */
    snippetLength: z.number().int().min(20).default(200),
  })
  .default({ minLength: 20, snippetLength: 200 });

export const StoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'json']).default('json'),
    path: z.string().default('.northstar/lifecycle.json'),
  })
  .default({ backend: 'json', path: '.northstar/lifecycle.json' });

export const LoggingConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    /** When set, pipeline events are appended to this JSONL file */
    eventsPath: z.string().optional(),
  })
  .default({ level: 'info' });

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  merge: MergeConfigSchema,
  github: GitHubConfigSchema,
  git: GitConfigSchema,
  execution: ExecutionConfigSchema,
  extraction: ExtractionConfigSchema,
  store: StoreConfigSchema,
  logging: LoggingConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type MergeConfig = z.infer<typeof MergeConfigSchema>;
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type GitConfig = z.infer<typeof GitConfigSchema>;
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Fully-defaulted configuration, handy for tests and embedding.
 */
export function defaultConfig(overrides: ConfigInput = {}): Config {
  return ConfigSchema.parse(overrides);
}
