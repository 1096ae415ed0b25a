import { describe, it, expect } from 'vitest';
import { validateSection, findPlaceholder } from '../orchestrator/section-validator.js';
import { extractNumbers, matchesFact } from '../prompts/numbers.js';
import type { SectionSpec } from '../types/report.js';

const SPEC: SectionSpec = {
  name: 'executive_summary',
  title: 'Executive Summary',
  maxLength: 100,
  checkNumbers: true,
};
const FACTS = [4, 83.33, 1000, 1200, 2025];

describe('extractNumbers', () => {
  it('reads grouped thousands, decimals and percentages', () => {
    expect(extractNumbers('Paid 1,200.50 and 45% on 2025-04')).toEqual([
      { raw: '1,200.50', value: 1200.5, percent: false },
      { raw: '45%', value: 45, percent: true },
      { raw: '2025', value: 2025, percent: false },
      { raw: '04', value: 4, percent: false },
    ]);
  });

  it('ignores digits inside words', () => {
    expect(extractNumbers('user u2 in area B12')).toEqual([]);
  });
});

describe('matchesFact', () => {
  it('uses a relative tolerance with an absolute floor', () => {
    expect(matchesFact(83, FACTS, 0.01)).toBe(true);
    expect(matchesFact(1011, FACTS, 0.01)).toBe(false);
    expect(matchesFact(1009, FACTS, 0.01)).toBe(true);
    expect(matchesFact(0.005, [0], 0.01)).toBe(true);
  });
});

describe('validateSection', () => {
  it('accepts text whose figures come from the facts', () => {
    expect(validateSection('You spent 1,000 of 1200.00, about 83% of income.', SPEC, FACTS, 0.01)).toEqual([]);
  });

  it('reports an empty answer alone', () => {
    expect(validateSection('   \n', SPEC, FACTS, 0.01)).toEqual([
      { rule: 'empty', message: 'the answer is empty' },
    ]);
  });

  it('reports length, placeholder and figures in order', () => {
    const text = `Dear {{name}}, you spent 1500 this month.${' '.repeat(70)}`;
    const violations = validateSection(text, SPEC, FACTS, 0.01);

    expect(violations.map(v => v.rule)).toEqual(['too_long', 'placeholder', 'unsupported_number']);
    expect(violations[0].message).toBe(`the answer is ${text.length} characters; the limit is 100`);
    expect(violations[1].message).toBe('the answer contains the placeholder "{{name}}"');
    expect(violations[2].message).toBe('the answer quotes figures not found in the transaction summary: 1500');
  });

  it('skips small counts but checks small percentages', () => {
    expect(validateSection('Try 2 or 3 changes.', SPEC, FACTS, 0.01)).toEqual([]);
    expect(validateSection('Spending rose 5%.', SPEC, FACTS, 0.01).map(v => v.rule)).toEqual(['unsupported_number']);
  });

  it('skips figure checks when the section does not require them', () => {
    expect(validateSection('Aim for 5000 in savings.', { ...SPEC, checkNumbers: false }, FACTS, 0.01)).toEqual([]);
  });
});

describe('findPlaceholder', () => {
  it('finds template leftovers', () => {
    expect(findPlaceholder('Hello {user_name}')).toBe('{user_name}');
    expect(findPlaceholder('Send [insert amount] today')).toBe('[insert amount]');
    expect(findPlaceholder('Dear <CUSTOMER_NAME>')).toBe('<CUSTOMER_NAME>');
    expect(findPlaceholder('TODO: write this')).toBe('TODO');
    expect(findPlaceholder('Lorem ipsum dolor')).toBe('Lorem ipsum');
    expect(findPlaceholder('All figures are final.')).toBeUndefined();
  });
});
