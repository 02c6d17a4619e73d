import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, errorMessage } from '../errors';
import { compileRules } from '../planner/rule-matcher';
import { SortboxConfigSchema, type OrganizerConfig } from './schema';

/**
 * Read, validate and resolve a JSON config file.
 * Relative paths inside it are resolved against the file's directory.
 */
export function loadConfig(configPath: string): OrganizerConfig {
  const absolutePath = path.resolve(configPath);

  let text: string;
  try {
    text = fs.readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Couldn't open config file ${absolutePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${absolutePath}: ${errorMessage(error)}`, { cause: error });
  }

  const config = parseConfig(raw, path.dirname(absolutePath));
  console.log(`[Config] Loaded ${absolutePath} (${config.rules.length} rule(s), suggestions ${config.suggestions.enabled ? 'on' : 'off'})`);
  return config;
}

/**
 * Validate an in-memory config value. Throws ConfigurationError on any problem,
 * including a rule pattern that does not compile.
 */
export function parseConfig(raw: unknown, baseDir: string): OrganizerConfig {
  const result = SortboxConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config: ${issues}`, { context: { issues: result.error.issues } });
  }

  const file = result.data;
  const knowledgeBasePath = file.options.knowledgeBase ? path.resolve(baseDir, file.options.knowledgeBase) : '';

  return {
    root: path.resolve(baseDir, file.root),
    settleDelayMs: file.settleDelayMs,
    preserveStructure: file.options.preserveStructure,
    knowledgeBase: loadKnowledgeBase(knowledgeBasePath),
    ignore: file.ignore,
    rules: compileRules(file.rules),
    suggestions: file.suggestions,
  };
}

/**
 * Knowledge-base text for the suggestion prompt. A missing file is not fatal.
 */
export function loadKnowledgeBase(filePath: string): string {
  if (!filePath) {
    return '';
  }
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    console.warn(`[Config] Could not read knowledge base ${filePath}: ${errorMessage(error)}`);
    return '';
  }
}
