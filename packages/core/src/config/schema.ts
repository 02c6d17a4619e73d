import { z } from 'zod';
import type { IgnoreSpec } from '../planner/ignore-policy';
import type { CompiledRule } from '../planner/rule-matcher';
import {
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_RATE_LIMIT_MS,
  DEFAULT_SETTLE_DELAY_MS,
  DEFAULT_SUGGESTION_INSTRUCTIONS,
  DEFAULT_SUGGESTION_MODEL,
} from '../planner/constants';

// ============================================================================
// Config file shape
// ============================================================================

export const RuleSchema = z.object({
  pattern: z.string().min(1),
  destination: z.string().min(1),
});

export const IgnoreSpecSchema = z.object({
  useOsDefaults: z.boolean().default(true),
  exactNames: z.array(z.string()).default([]),
  extensions: z.array(z.string()).default([]), // with the dot: ".log"
  pathSubstrings: z.array(z.string().min(1)).default([]),
});

export const OptionsSchema = z.object({
  preserveStructure: z.boolean().default(false),
  knowledgeBase: z.string().default(''), // path, relative to the config file
});

export const SuggestionsSchema = z.object({
  enabled: z.boolean().default(false),
  provider: z.enum(['openai', 'openrouter']).optional(),
  apiKey: z.string().optional(), // falls back to OPENROUTER_API_KEY / OPENAI_API_KEY
  model: z.string().min(1).default(DEFAULT_SUGGESTION_MODEL),
  instructions: z.string().default(DEFAULT_SUGGESTION_INSTRUCTIONS),
  rateLimitMs: z.number().int().nonnegative().default(DEFAULT_RATE_LIMIT_MS),
  queueCapacity: z.number().int().positive().default(DEFAULT_QUEUE_CAPACITY),
});

export const SortboxConfigSchema = z.object({
  root: z.string().min(1).default('entropy'),
  settleDelayMs: z.number().int().nonnegative().default(DEFAULT_SETTLE_DELAY_MS),
  options: OptionsSchema.default({}),
  ignore: IgnoreSpecSchema.default({}),
  rules: z.array(RuleSchema).default([]),
  suggestions: SuggestionsSchema.default({}),
});

export type SortboxConfigFile = z.infer<typeof SortboxConfigSchema>;
export type SuggestionConfig = z.infer<typeof SuggestionsSchema>;

// ============================================================================
// Resolved config, as the pipeline consumes it
// ============================================================================

export interface OrganizerConfig {
  /** Absolute path of the watched root */
  root: string;
  settleDelayMs: number;
  preserveStructure: boolean;
  /** Knowledge-base text (not its path); empty when none */
  knowledgeBase: string;
  ignore: IgnoreSpec;
  rules: CompiledRule[];
  suggestions: SuggestionConfig;
}
