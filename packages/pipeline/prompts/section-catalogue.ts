// Report section catalogue — title, narrative instruction, an example answer
// for few-shot prompting and the reasoning steps for chain-of-thought.

import type { PromptApproach, ReportSchema, SectionName, SectionSpec } from '../types/report.js';

export interface SectionTemplate {
  readonly title: string;
  readonly instruction: string;
  readonly checkNumbers: boolean;
  readonly example: { readonly facts: string; readonly output: string };
  readonly steps: readonly string[];
}

const EXAMPLE_FACTS = [
  'User u-example monthly transaction summary (March 2024)',
  '- Total spend is 640.00 with 9 transactions',
  '- Spending methods include card with 62.50%, transfer with 37.50%',
  '- Total cash-in is 1600.00 with 2 transactions',
  '- Cash-in methods include salary with 100.00%',
  '- Spending accounts for 40.00% of total cash-in',
  '- Net flow is 960.00',
].join('\n');

export const SECTION_CATALOGUE: Readonly<Record<SectionName, SectionTemplate>> = Object.freeze({
  executive_summary: {
    title: 'Executive Summary',
    instruction: 'Write a concise executive summary of this month, highlighting the key financial insights and how the user compares with similar users.',
    checkNumbers: true,
    example: {
      facts: EXAMPLE_FACTS,
      output: 'In March you spent 640.00, which is 40.00% of the 1600.00 you received, leaving a comfortable surplus of 960.00.',
    },
    steps: [
      'Note the period and the user tags.',
      'Compare total spend with total cash-in and note the share of cash-in that was spent.',
      'Identify the dominant spending and cash-in methods.',
      'Place the user against the peer group figures.',
      'Summarise the overall position in two or three sentences.',
    ],
  },
  spending_patterns: {
    title: 'Spending Patterns',
    instruction: 'Describe how the user spent money this month: which methods, categories and merchants dominate, and how their spending compares with similar users.',
    checkNumbers: true,
    example: {
      facts: EXAMPLE_FACTS,
      output: 'Card payments made up 62.50% of your spending, with transfers covering the remaining 37.50% across 9 transactions.',
    },
    steps: [
      'List the spending methods and categories by share.',
      'Note the number of spend transactions and the largest merchants.',
      'Compare transaction counts and totals with the peer group.',
      'Describe the pattern in plain language.',
    ],
  },
  cash_flow: {
    title: 'Cash Flow',
    instruction: 'Explain the balance between money coming in and money going out this month, including the net flow.',
    checkNumbers: true,
    example: {
      facts: EXAMPLE_FACTS,
      output: 'You received 1600.00 and spent 640.00, for a positive net flow of 960.00 this month.',
    },
    steps: [
      'Extract total cash-in and total spend.',
      'Compute whether the net flow is positive or negative.',
      'Identify the main sources of cash-in.',
      'Explain what the balance means for the month.',
    ],
  },
  savings_position: {
    title: 'Savings Position',
    instruction: 'Assess how much room the user has to save, based on the share of cash-in left after spending.',
    checkNumbers: true,
    example: {
      facts: EXAMPLE_FACTS,
      output: 'With only 40.00% of your cash-in spent, 960.00 was left over and is available to set aside.',
    },
    steps: [
      'Determine the share of cash-in that was spent.',
      'Determine the amount left over.',
      'Compare the spend-to-income ratio with the peer group.',
      'State the savings position plainly.',
    ],
  },
  recommendations: {
    title: 'Recommendations',
    instruction: 'Give two or three practical, supportive recommendations grounded in this month\'s activity. Do not give investment, legal or tax advice.',
    // Advisory: targets such as "set aside 10-15%" are not claims about the month
    checkNumbers: false,
    example: {
      facts: EXAMPLE_FACTS,
      output: 'Consider moving part of this month\'s surplus into savings as soon as your salary arrives. Keep an eye on card spending, which drives most of your outflow.',
    },
    steps: [
      'Identify the biggest driver of spending.',
      'Identify whether there is a surplus or a shortfall.',
      'Choose recommendations that address those two points.',
      'Phrase them as supportive suggestions.',
    ],
  },
});

export function buildReportSchema(
  sections: readonly SectionName[],
  approach: PromptApproach,
  maxLength: number,
): ReportSchema {
  const specs: SectionSpec[] = [];
  const seen = new Set<SectionName>();
  for (const name of sections) {
    if (seen.has(name)) continue;
    seen.add(name);
    const template = SECTION_CATALOGUE[name];
    specs.push(Object.freeze({ name, title: template.title, maxLength, checkNumbers: template.checkNumbers }));
  }
  return Object.freeze({ sections: Object.freeze(specs), approach });
}
