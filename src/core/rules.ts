/**
 * Line-pattern rewrite rules for weighted `super(...)` constructor calls.
 *
 * The rules are plain regular expressions, not a parser: calls split across
 * lines, nested parentheses or non-literal arguments are left alone.
 */

import { ReplacementCounts } from './types';

export interface RewriteRule {
  name: string;
  /** Must carry the global flag. */
  pattern: RegExp;
  replace(match: string, ...groups: string[]): string;
}

export interface SuperCallRuleOptions {
  /** Inserted before each setter call. Defaults to eight spaces. */
  indent?: string;
}

export const DEFAULT_INDENT = ' '.repeat(8);

// digits with at most one decimal point: 3, 0.75, 1., .5
const NUMBER = String.raw`(\d+(?:\.\d*)?|\.\d+)`;
const BOOLEAN = '(true|false)';

export function createSuperCallRules(opts: SuperCallRuleOptions = {}): RewriteRule[] {
  const indent = opts.indent ?? DEFAULT_INDENT;

  // two-argument form first so it is never split by the one-argument rule
  return [
    {
      name: 'two-argument',
      pattern: new RegExp(String.raw`\bsuper\(${NUMBER},\s*${BOOLEAN}\s*\);`, 'g'),
      replace: (_match, weight, enabled) =>
        `super();\n${indent}setWeight(${weight});\n${indent}setEnabled(${enabled});`,
    },
    {
      name: 'one-argument',
      pattern: new RegExp(String.raw`\bsuper\(${NUMBER}\);`, 'g'),
      replace: (_match, weight) => `super();\n${indent}setWeight(${weight});`,
    },
  ];
}

export const SUPER_CALL_RULES: readonly RewriteRule[] = createSuperCallRules();

export interface RewriteResult {
  content: string;
  replacements: ReplacementCounts;
  changed: boolean;
}

export function applyRules(content: string, rules: readonly RewriteRule[] = SUPER_CALL_RULES): RewriteResult {
  let updated = content;
  const replacements: ReplacementCounts = {};

  for (const rule of rules) {
    let count = 0;
    updated = updated.replace(rule.pattern, (match: string, ...rest: unknown[]) => {
      count++;
      // captures are followed by the numeric match offset
      const offsetIndex = rest.findIndex((value) => typeof value === 'number');
      const groups = rest
        .slice(0, offsetIndex)
        .map((value) => (typeof value === 'string' ? value : ''));
      return rule.replace(match, ...groups);
    });
    replacements[rule.name] = count;
  }

  return { content: updated, replacements, changed: updated !== content };
}
