import * as fs from 'fs';
import * as dotenv from 'dotenv';
import type { LLMProvider } from '@sortbox/core';

/**
 * Load the first .env found among the candidate paths.
 * Values already set in the process environment win.
 */
export function loadEnv(candidatePaths: string[]): string | null {
  for (const envPath of candidatePaths) {
    if (!envPath || !fs.existsSync(envPath)) {
      continue;
    }
    const result = dotenv.config({ path: envPath });
    if (!result.error) {
      console.log(`[Main] Loaded .env from: ${envPath}`);
      return envPath;
    }
    console.warn(`[Main] Could not load ${envPath}: ${result.error.message}`);
  }
  return null;
}

/**
 * Provider whose key is present in the environment. Priority: OpenRouter > OpenAI
 */
export function getActiveProvider(env: NodeJS.ProcessEnv = process.env): LLMProvider | null {
  if (env.OPENROUTER_API_KEY?.trim()) {
    return 'openrouter';
  }
  if (env.OPENAI_API_KEY?.trim()) {
    return 'openai';
  }
  return null;
}
