// Sortbox daemon: watch one folder and sort what lands in it
import * as fs from 'fs';
import * as path from 'path';
import {
  ConfigurationError,
  OrganizerPipeline,
  createLLMClient,
  getProviderDisplayName,
  loadConfig,
  type LLMClient,
} from '@sortbox/core';
import { getActiveProvider, loadEnv } from './env';

loadEnv([path.join(process.cwd(), '.env')]);

function getConfigPath(): string {
  return path.resolve(process.env.SORTBOX_CONFIG ?? 'sortbox.config.json');
}

async function main(): Promise<void> {
  const config = loadConfig(getConfigPath());

  fs.mkdirSync(config.root, { recursive: true });

  let service: LLMClient | null = null;
  if (config.suggestions.enabled) {
    service = createLLMClient({
      provider: config.suggestions.provider,
      apiKey: config.suggestions.apiKey,
      model: config.suggestions.model,
    });
    if (!service) {
      throw new ConfigurationError(
        'Suggestions are enabled but no API key is configured (suggestions.apiKey, OPENROUTER_API_KEY or OPENAI_API_KEY)'
      );
    }
    console.log(`[Main] Suggestions via ${getProviderDisplayName(service.getProvider())}, model ${config.suggestions.model}`);
  } else if (getActiveProvider()) {
    console.log('[Main] An API key is set but suggestions are disabled in the config');
  }

  const pipeline = new OrganizerPipeline({ config, service });
  pipeline.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`[Main] Received ${signal}, shutting down`);
    pipeline.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[Main] Error during shutdown:', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

process.on('unhandledRejection', (reason) => {
  console.error('[Main] Unhandled rejection:', reason);
});

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`[Main] ${error.message}`);
  } else {
    console.error('[Main] Failed to start:', error);
  }
  process.exit(1);
});
