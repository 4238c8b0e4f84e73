import { z } from 'zod';

export const DEFAULT_INCLUDE = [
  '*.py',
  '*.ts',
  '*.tsx',
  '*.js',
  '*.jsx',
  '*.go',
  '*.rs',
  '*.java',
  '*.rb',
];

export const DEFAULT_EXCLUDE = [
  '.git/',
  'node_modules/',
  'dist/',
  'build/',
  '__pycache__/',
  '.venv/',
  'venv/',
  '.mender/',
];

export const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).optional(),
    initialDelayMs: z.number().int().min(0).optional(),
    maxDelayMs: z.number().int().min(0).optional(),
    backoffFactor: z.number().min(1).optional(),
  })
  .strict();

export const ProviderConfigSchema = z.object({
  type: z.enum(['openai', 'fake']),
  model: z.string().min(1),
  api_key_env: z.string().optional(),
  api_key: z.string().optional(),
  baseURL: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  retry: RetryConfigSchema.optional(),
  /** Scripted replies for the fake provider, consumed in order */
  responses: z.array(z.string()).optional(),
});

export const LoopConfigSchema = z.object({
  maxIterations: z.number().int().min(1).default(10),
  phaseTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(10 * 60 * 1000),
});

export const RolesConfigSchema = z.object({
  auditor: z.string().optional(),
  fixer: z.string().optional(),
  judge: z.string().optional(),
});

export const ResourcesConfigSchema = z.object({
  include: z.array(z.string()).default(DEFAULT_INCLUDE),
  exclude: z.array(z.string()).default(DEFAULT_EXCLUDE),
  maxFileBytes: z.number().int().positive().default(200_000),
});

export const JudgeConfigSchema = z.object({
  command: z.string().min(1).default('pytest'),
  args: z.array(z.string()).default([]),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .default(10 * 60 * 1000),
  /** Exit codes meaning "no tests were collected" (pytest uses 5) */
  noTestsExitCodes: z.array(z.number().int()).default([5]),
  /** Ask the judge provider to classify failing test runs */
  triage: z.boolean().default(true),
});

/** Optional static analyser whose findings are handed to the auditor */
export const LintConfigSchema = z.object({
  command: z.string().min(1).optional(),
  args: z.array(z.string()).default([]),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .default(60 * 1000),
  maxOutputLines: z.number().int().positive().default(80),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  loop: LoopConfigSchema.default({}),
  providers: z.record(z.string(), ProviderConfigSchema).default({}),
  defaults: RolesConfigSchema.default({}),
  resources: ResourcesConfigSchema.default({}),
  judge: JudgeConfigSchema.default({}),
  lint: LintConfigSchema.default({}),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderType = ProviderConfig['type'];
export type JudgeConfig = z.infer<typeof JudgeConfigSchema>;
export type LintConfig = z.infer<typeof LintConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
/** Config as written by users: every defaulted field is optional */
export type ConfigInput = z.input<typeof ConfigSchema>;
