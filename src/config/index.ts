import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const threshold = z.coerce.number().min(0).max(1);

const configSchema = z.object({
  // Anthropic (optional: without a key the agent runs rule-based only)
  anthropicApiKey: z.string().min(1).optional(),
  llmTextModel: z.string().default('claude-sonnet-4-5'),
  llmTimeoutMs: z.coerce.number().int().positive().default(10_000),

  // Confidence policy
  modelAcceptThreshold: threshold.default(0.4),
  escalationThreshold: threshold.default(0.5),
  autoProcessThreshold: threshold.default(0.6),

  // App
  databasePath: z.string().optional(),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(8001),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Confidence cut-offs used by the pipeline. Built once at startup and frozen;
 * nothing mutates it afterwards.
 */
export interface PipelinePolicy {
  /** Model results are accepted only above this confidence. */
  readonly modelAcceptThreshold: number;
  /** Below this confidence a message is escalated and the reply carries a review note. */
  readonly escalationThreshold: number;
  /** Above this confidence the routed action counts as safe to auto-process. */
  readonly autoProcessThreshold: number;
}

export const DEFAULT_POLICY: PipelinePolicy = Object.freeze({
  modelAcceptThreshold: 0.4,
  escalationThreshold: 0.5,
  autoProcessThreshold: 0.6,
});

export function policyFromConfig(config: Config): PipelinePolicy {
  return Object.freeze({
    modelAcceptThreshold: config.modelAcceptThreshold,
    escalationThreshold: config.escalationThreshold,
    autoProcessThreshold: config.autoProcessThreshold,
  });
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    llmTextModel: env('LLM_TEXT_MODEL'),
    llmTimeoutMs: env('LLM_TIMEOUT_MS'),
    modelAcceptThreshold: env('MODEL_ACCEPT_THRESHOLD'),
    escalationThreshold: env('ESCALATION_THRESHOLD'),
    autoProcessThreshold: env('AUTO_PROCESS_THRESHOLD'),
    databasePath: env('DATABASE_PATH'),
    host: env('HOST'),
    port: env('PORT'),
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return parsed.data;
}
