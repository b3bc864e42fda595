import { z } from 'zod';

export const TierSchema = z.enum(['minimal', 'guided', 'full']);

export const ExamplePairSchema = z.object({
  input: z.string(),
  output: z.string()
});

const FieldValueSchema = z.union([
  z.string(),
  z.array(z.string()),
  z.array(ExamplePairSchema)
]);

export const ComponentsSchema = z.object({
  role: FieldValueSchema.optional(),
  task: FieldValueSchema.optional(),
  constraints: FieldValueSchema.optional(),
  context: FieldValueSchema.optional(),
  examples: FieldValueSchema.optional(),
  output_format: FieldValueSchema.optional(),
  reasoning_pattern: FieldValueSchema.optional(),
  success_criteria: FieldValueSchema.optional(),
  edge_cases: FieldValueSchema.optional(),
  performance_requirements: FieldValueSchema.optional(),
  custom_instructions: FieldValueSchema.optional()
}).strict();

export const MetricsSchema = z.object({
  tier: TierSchema,
  time_to_create_seconds: z.number().min(0),
  components_filled: z.number().int().min(0),
  total_components: z.number().int().min(1),
  suggestions_used: z.number().int().min(0),
  suggestions_offered: z.number().int().min(0),
  validation_score: z.number().min(0).max(1),
  estimated_success_rate: z.number().min(0).max(1),
  user_satisfaction: z.number().min(1).max(10).nullable()
});

export const ValidationSchema = z.object({
  is_valid: z.boolean(),
  clarity_score: z.number().min(0).max(10),
  completeness_score: z.number().min(0).max(1),
  overall_score: z.number().min(0).max(1),
  issues: z.array(z.string()),
  suggestions: z.array(z.string())
});

export const SnapshotSchema = z.object({
  tier: TierSchema,
  components: ComponentsSchema,
  rendered_text: z.string(),
  metrics: MetricsSchema,
  validation: ValidationSchema,
  timestamp: z.string()
});

export type MetricsRecord = z.infer<typeof MetricsSchema>;
export type ValidationRecord = z.infer<typeof ValidationSchema>;
export type PromptSnapshot = z.infer<typeof SnapshotSchema>;
