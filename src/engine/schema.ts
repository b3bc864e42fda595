import type { ExamplePair, FieldDescriptor, FieldKind, FieldValue, Tier } from '../types';

export const TIERS: readonly Tier[] = ['minimal', 'guided', 'full'];

export const REASONING_PATTERNS = ['analytical', 'creative', 'technical', 'step-by-step', 'comparative'] as const;
export type ReasoningPattern = typeof REASONING_PATTERNS[number];

const MINIMAL_FIELDS: FieldDescriptor[] = [
  { name: 'role', kind: 'text', required: true, label: 'Role' },
  { name: 'task', kind: 'text', required: true, label: 'Task' },
  { name: 'constraints', kind: 'text_list', required: false, label: 'Constraints' }
];

const GUIDED_FIELDS: FieldDescriptor[] = [
  ...MINIMAL_FIELDS,
  { name: 'context', kind: 'text', required: false, label: 'Context' },
  { name: 'examples', kind: 'pair_list', required: false, label: 'Examples' },
  { name: 'output_format', kind: 'text', required: false, label: 'Output format' }
];

const FULL_FIELDS: FieldDescriptor[] = [
  ...GUIDED_FIELDS,
  { name: 'reasoning_pattern', kind: 'text', required: false, label: 'Reasoning pattern' },
  { name: 'success_criteria', kind: 'text_list', required: false, label: 'Success criteria' },
  { name: 'edge_cases', kind: 'text_list', required: false, label: 'Edge cases' },
  { name: 'performance_requirements', kind: 'text', required: false, label: 'Performance requirements' },
  { name: 'custom_instructions', kind: 'text_list', required: false, label: 'Custom instructions' }
];

const FIELDS_BY_TIER: Record<Tier, readonly FieldDescriptor[]> = {
  minimal: MINIMAL_FIELDS,
  guided: GUIDED_FIELDS,
  full: FULL_FIELDS
};

/** Ordered field descriptors for a tier. Higher tiers extend the lower ones. */
export function fieldsFor(tier: Tier): FieldDescriptor[] {
  return FIELDS_BY_TIER[tier].map(d => ({ ...d }));
}

export function totalFields(tier: Tier): number {
  return FIELDS_BY_TIER[tier].length;
}

export function isTier(value: string): value is Tier {
  return TIERS.some(t => t === value);
}

export function parseTier(value: string | undefined): Tier | null {
  if (!value) return null;
  const v = value.trim().toLowerCase();
  return isTier(v) ? v : null;
}

export function isReasoningPattern(value: string): value is ReasoningPattern {
  return REASONING_PATTERNS.some(p => p === value);
}

export function isExamplePair(item: unknown): item is ExamplePair {
  if (typeof item !== 'object' || item === null) return false;
  return 'input' in item && typeof item.input === 'string'
    && 'output' in item && typeof item.output === 'string';
}

export function isTextList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(i => typeof i === 'string');
}

export function isPairList(value: unknown): value is ExamplePair[] {
  return Array.isArray(value) && value.every(isExamplePair);
}

export function matchesKind(kind: FieldKind, value: unknown): value is FieldValue {
  switch (kind) {
    case 'text': return typeof value === 'string';
    case 'text_list': return isTextList(value);
    case 'pair_list': return isPairList(value);
  }
}

/** Text counts once it has non-whitespace content; lists once they have an item. */
export function isFilled(value: FieldValue | undefined): boolean {
  if (value === undefined) return false;
  return typeof value === 'string' ? value.trim().length > 0 : value.length > 0;
}

export function emptyValue(kind: FieldKind): FieldValue {
  return kind === 'text' ? '' : [];
}
