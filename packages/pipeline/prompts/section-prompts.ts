// Section prompt templates for the three prompting approaches. A run applies
// one approach to every section.

import type { PromptApproach, SectionSpec } from '../types/report.js';
import { SECTION_CATALOGUE } from './section-catalogue.js';
import type { PromptContext } from './prompt-context.js';

function rules(spec: SectionSpec): string {
  return [
    'Rules:',
    `- Keep it under ${spec.maxLength} characters.`,
    '- Quote only figures that appear in the transaction summary.',
    '- Do not use placeholders or leave anything to be filled in.',
    '- Output only the text, without a heading.',
  ].join('\n');
}

function zeroShot(spec: SectionSpec, context: PromptContext): string {
  const template = SECTION_CATALOGUE[spec.name];
  return [
    'Given the following transaction summary:',
    context.facts,
    '',
    `${template.instruction}`,
    '',
    rules(spec),
  ].join('\n');
}

function fewShot(spec: SectionSpec, context: PromptContext): string {
  const template = SECTION_CATALOGUE[spec.name];
  return [
    `Here is an example of a transaction summary and its ${template.title}.`,
    '',
    'Transaction summary:',
    template.example.facts,
    `${template.title}: ${template.example.output}`,
    '',
    'Now analyse the following transaction summary:',
    context.facts,
    '',
    `${template.instruction} Follow the style of the example, using this user's figures.`,
    '',
    rules(spec),
  ].join('\n');
}

function chainOfThought(spec: SectionSpec, context: PromptContext): string {
  const template = SECTION_CATALOGUE[spec.name];
  return [
    `Analyse the following transaction summary step by step to write the ${template.title}:`,
    context.facts,
    '',
    'Thought process:',
    ...template.steps.map((step, i) => `${i + 1}. ${step}`),
    '',
    `Based on that analysis: ${template.instruction} Output only the final text, not the reasoning.`,
    '',
    rules(spec),
  ].join('\n');
}

const BUILDERS: Record<PromptApproach, (spec: SectionSpec, context: PromptContext) => string> = {
  zero_shot: zeroShot,
  few_shot: fewShot,
  chain_of_thought: chainOfThought,
};

export function buildSectionPrompt(
  spec: SectionSpec,
  approach: PromptApproach,
  context: PromptContext,
): string {
  return BUILDERS[approach](spec, context);
}

/** Re-prompt after a validation failure, stating each violation. */
export function buildRefinedPrompt(basePrompt: string, previous: string, violations: readonly string[]): string {
  return [
    basePrompt,
    '',
    'Your previous answer was rejected:',
    '"""',
    previous,
    '"""',
    'Fix these problems and answer again:',
    ...violations.map(v => `- ${v}`),
  ].join('\n');
}
