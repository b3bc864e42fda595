import type { TextListField } from '../types';
import type { ComponentStore } from './store';
import { isReasoningPattern, type ReasoningPattern } from './schema';

export const REASONING_INSTRUCTIONS: Record<ReasoningPattern, string> = {
  'analytical': 'Think through this step-by-step, showing your reasoning.',
  'creative': 'Explore multiple approaches before selecting the best one.',
  'technical': 'Break down the technical requirements systematically.',
  'step-by-step': 'Approach this methodically, one step at a time.',
  'comparative': 'Compare different options and explain your choice.'
};

/** Known patterns expand to their canned sentence; anything else (including "custom") is used as written. */
export function reasoningInstruction(pattern: string): string {
  return isReasoningPattern(pattern) ? REASONING_INSTRUCTIONS[pattern] : pattern;
}

export function renderPrompt(store: ComponentStore): string {
  const parts: string[] = [];
  const present = (value: string) => value.trim().length > 0;

  const bullets = (heading: string, field: TextListField) => {
    const items = store.list(field);
    if (!items.length) return;
    parts.push(`\n${heading}`);
    for (const item of items) parts.push(`- ${item}`);
  };

  const role = store.text('role');
  if (present(role)) parts.push(`You are ${role}.`);

  const context = store.text('context');
  if (present(context)) parts.push(`\nContext: ${context}`);

  const task = store.text('task');
  if (present(task)) parts.push(`\nYour task is to ${task}.`);

  bullets('Constraints:', 'constraints');

  const examples = store.pairs('examples');
  if (examples.length) {
    parts.push('\nExamples:');
    examples.forEach((ex, i) => {
      parts.push(`\nExample ${i + 1}:`);
      parts.push(`Input: ${ex.input}`);
      parts.push(`Output: ${ex.output}`);
    });
  }

  const pattern = store.text('reasoning_pattern');
  if (present(pattern)) parts.push(`\n${reasoningInstruction(pattern)}`);

  const outputFormat = store.text('output_format');
  if (present(outputFormat)) parts.push(`\nOutput Format: ${outputFormat}`);

  bullets('Success Criteria:', 'success_criteria');
  bullets('Consider these edge cases:', 'edge_cases');

  const perf = store.text('performance_requirements');
  if (present(perf)) parts.push(`\nPerformance Requirements: ${perf}`);

  bullets('Additional Instructions:', 'custom_instructions');

  return parts.join('\n');
}
