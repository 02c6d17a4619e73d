import { ConfigurationError, errorMessage } from '../errors';

/**
 * A routing rule as written in the config file.
 */
export interface Rule {
  pattern: string;
  destination: string;
}

export interface CompiledRule extends Rule {
  regex: RegExp;
}

/**
 * Compile every rule pattern once, at config load.
 * An invalid pattern is a configuration error, never a per-event one.
 */
export function compileRules(rules: Rule[]): CompiledRule[] {
  return rules.map((rule, index) => {
    try {
      // No g/y flags: RegExp.test must stay stateless across calls
      return { ...rule, regex: new RegExp(rule.pattern) };
    } catch (error) {
      throw new ConfigurationError(`Invalid pattern in rule ${index}: ${rule.pattern} (${errorMessage(error)})`, {
        cause: error,
        context: { index, pattern: rule.pattern },
      });
    }
  });
}

/**
 * Returns the destination of the first rule whose pattern matches anywhere in the filename,
 * or undefined when none does.
 */
export function matchRule(filename: string, rules: CompiledRule[]): string | undefined {
  for (const rule of rules) {
    if (rule.regex.test(filename)) {
      return rule.destination;
    }
  }
  return undefined;
}
