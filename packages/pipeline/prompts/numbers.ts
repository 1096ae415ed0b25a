// Numeric mentions in free text, shared by the prompt context (what the model
// is given) and the section validator (what the model said).

export interface NumericMention {
  readonly raw: string;
  /** Absolute value with thousands separators removed */
  readonly value: number;
  readonly percent: boolean;
}

// Grouped thousands first so "1,200.50" is read as one number
const NUMBER_PATTERN = /(?<![\w.])\d{1,3}(?:,\d{3})+(?:\.\d+)?%?|(?<![\w.])\d+(?:\.\d+)?%?/g;

export function extractNumbers(text: string): NumericMention[] {
  const mentions: NumericMention[] = [];
  for (const match of text.matchAll(NUMBER_PATTERN)) {
    const raw = match[0];
    const percent = raw.endsWith('%');
    const value = Number((percent ? raw.slice(0, -1) : raw).replace(/,/g, ''));
    if (Number.isFinite(value)) mentions.push({ raw, value, percent });
  }
  return mentions;
}

/** True when `value` is within a relative `tolerance` of any fact (absolute floor of 1 × tolerance) */
export function matchesFact(value: number, facts: readonly number[], tolerance: number): boolean {
  return facts.some(f => Math.abs(value - f) <= tolerance * Math.max(Math.abs(f), 1));
}
