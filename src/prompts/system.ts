import type { TextField } from '../types';

export const SUGGESTION_SYSTEM_PROMPT = `You help people write instructions for AI agents.

You are shown one component of an agent prompt (its role, task, context, and so on) and its current value.
Reply with a single improved version of that component, or a short concrete note on what it is missing.

RULES:
- Make the wording clearer and more specific; keep the author's intent.
- Add a missing constraint, audience or scope only when it clearly helps.
- No preamble, no markdown headings, no quotes around the answer.
- Stay under 80 words.`;

export const FIELD_HINTS: Record<TextField, string> = {
  role: 'Who the agent is and which expertise it brings.',
  task: 'What the agent must accomplish, stated as a goal.',
  context: 'Background the agent needs about the domain or situation.',
  output_format: 'The shape the answer should take.',
  reasoning_pattern: 'How the agent should think the problem through.',
  performance_requirements: 'Measurable limits on speed, size or accuracy.'
};

export function buildSuggestionRequest(field: TextField, currentValue: string): string {
  const value = currentValue.trim() || 'Not provided yet';
  return [
    `Component: ${field}`,
    `Purpose: ${FIELD_HINTS[field]}`,
    `Current value: ${value}`,
    '',
    'Suggest one improvement. If the value is already good, propose a minor refinement.'
  ].join('\n');
}

export const REFINE_SYSTEM_PROMPT = `You edit complete instruction prompts written for AI agents.

Return the full prompt, rewritten for clarity and completeness.

RULES:
- Keep every requirement, constraint and example the author gave; never drop one.
- Keep the section order and the plain-text layout (headings ending in ":" and "- " bullets).
- Tighten vague wording; add a missing detail only when the prompt clearly implies it.
- Reply with the prompt only: no preamble, no commentary, no code fences.`;

export function buildRefineRequest(promptText: string): string {
  return `Improve this agent instruction:\n\n${promptText}`;
}
