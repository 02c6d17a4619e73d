import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors';
import { compileRules, matchRule } from './rule-matcher';

describe('compileRules', () => {
  it('keeps rule order and attaches a compiled regex', () => {
    const compiled = compileRules([
      { pattern: 'a', destination: 'A' },
      { pattern: 'b', destination: 'B' },
    ]);
    expect(compiled.map((r) => r.destination)).toEqual(['A', 'B']);
    expect(compiled[0]?.regex).toBeInstanceOf(RegExp);
  });

  it('throws a ConfigurationError for an invalid pattern', () => {
    expect(() => compileRules([{ pattern: '(unclosed', destination: 'X' }])).toThrow(ConfigurationError);
    expect(() => compileRules([{ pattern: '(unclosed', destination: 'X' }])).toThrow(/rule 0/);
  });
});

describe('matchRule', () => {
  const rules = compileRules([
    { pattern: '.*invoice.*\\.pdf$', destination: 'Documents/Finance/Invoices' },
    { pattern: '\\.pdf$', destination: 'Documents' },
    { pattern: 'report', destination: 'Reports' },
  ]);

  it('returns the first matching rule in list order', () => {
    expect(matchRule('project_invoice_2024.pdf', rules)).toBe('Documents/Finance/Invoices');
    expect(matchRule('manual.pdf', rules)).toBe('Documents');
  });

  it('searches anywhere in the name rather than matching the whole name', () => {
    expect(matchRule('q3-report-final.docx', rules)).toBe('Reports');
  });

  it('returns undefined when nothing matches', () => {
    expect(matchRule('notes.xyz', rules)).toBeUndefined();
    expect(matchRule('anything', [])).toBeUndefined();
  });

  it('gives the same answer on repeated calls', () => {
    const first = matchRule('report.txt', rules);
    const second = matchRule('report.txt', rules);
    expect(first).toBe('Reports');
    expect(second).toBe('Reports');
  });
});
