export type Tier = 'minimal' | 'guided' | 'full';
export type FieldKind = 'text' | 'text_list' | 'pair_list';

export interface ExamplePair { input: string; output: string }

export interface ComponentValues {
  role: string;
  task: string;
  constraints: string[];
  context: string;
  examples: ExamplePair[];
  output_format: string;
  reasoning_pattern: string; // one of REASONING_PATTERNS, or free text
  success_criteria: string[];
  edge_cases: string[];
  performance_requirements: string;
  custom_instructions: string[];
}

export type FieldName = keyof ComponentValues;
export type FieldValue = ComponentValues[FieldName];

type FieldsOfType<T> = { [K in FieldName]: ComponentValues[K] extends T ? K : never }[FieldName];
export type TextField = FieldsOfType<string>;
export type TextListField = FieldsOfType<string[]>;
export type PairListField = FieldsOfType<ExamplePair[]>;

export interface FieldDescriptor {
  name: FieldName;
  kind: FieldKind;
  required: boolean;
  label: string;
}

export type ComponentRecord = Partial<Record<FieldName, FieldValue>>;

export interface ValidationResult {
  isValid: boolean;
  clarityScore: number;      // 0–10
  completenessScore: number; // 0–1
  overallScore: number;
  issues: string[];
  suggestions: string[];
}
