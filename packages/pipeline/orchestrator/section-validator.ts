// Structural checks on a generated section, applied in a fixed order:
// empty, too_long, placeholder, unsupported_number.

import type { SectionSpec } from '../types/report.js';
import { extractNumbers, matchesFact } from '../prompts/numbers.js';

export type ViolationRule = 'empty' | 'too_long' | 'placeholder' | 'unsupported_number';

export interface SectionViolation {
  rule: ViolationRule;
  message: string;
}

const PLACEHOLDER_PATTERNS: RegExp[] = [
  /\{\{[^}]*\}\}/,
  /\{[a-z_]+\}/,
  /\[(?:insert|your|placeholder|tbd|name|amount)[^\]]*\]/i,
  /<[A-Z][A-Z_]+>/,
  /\b(?:TODO|TBD|XXX)\b/,
  /lorem ipsum/i,
];

/** Numbers at or below this are ordinary prose ("two or three", "top 5") and are not checked */
const SMALL_NUMBER = 10;

export function findPlaceholder(text: string): string | undefined {
  for (const pattern of PLACEHOLDER_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return match[0];
  }
  return undefined;
}

export function validateSection(
  text: string,
  spec: SectionSpec,
  facts: readonly number[],
  tolerance: number,
): SectionViolation[] {
  if (text.trim() === '') {
    return [{ rule: 'empty', message: 'the answer is empty' }];
  }

  const violations: SectionViolation[] = [];

  if (text.length > spec.maxLength) {
    violations.push({
      rule: 'too_long',
      message: `the answer is ${text.length} characters; the limit is ${spec.maxLength}`,
    });
  }

  const placeholder = findPlaceholder(text);
  if (placeholder !== undefined) {
    violations.push({ rule: 'placeholder', message: `the answer contains the placeholder "${placeholder}"` });
  }

  if (spec.checkNumbers) {
    const unsupported = new Set<string>();
    for (const mention of extractNumbers(text)) {
      if (!mention.percent && mention.value <= SMALL_NUMBER) continue;
      if (!matchesFact(mention.value, facts, tolerance)) unsupported.add(mention.raw);
    }
    if (unsupported.size > 0) {
      violations.push({
        rule: 'unsupported_number',
        message: `the answer quotes figures not found in the transaction summary: ${[...unsupported].join(', ')}`,
      });
    }
  }

  return violations;
}
