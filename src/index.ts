export * from './types';
export { fieldsFor, totalFields, isFilled, parseTier, TIERS, REASONING_PATTERNS } from './engine/schema';
export type { ReasoningPattern } from './engine/schema';
export { ComponentStore } from './engine/store';
export { renderPrompt, reasoningInstruction, REASONING_INSTRUCTIONS } from './engine/render';
export { validateComponents, overallScore } from './engine/validate';
export { MetricsTracker, TIER_BASE_RATE } from './engine/metrics';
export { CollectionDriver, REASONING_CHOICES } from './engine/driver';
export type { WizardIO, AskOptions } from './engine/driver';
export { UNAVAILABLE_SUGGESTIONS } from './engine/suggestions';
export type { SuggestionService } from './engine/suggestions';
export * from './engine/errors';
export { buildSnapshot, saveSnapshot, loadSnapshot, defaultSnapshotName, toMarkdown, markdownPath, saveMarkdown } from './state/snapshotStore';
export type { PromptSnapshot, MetricsRecord, ValidationRecord } from './schemas/snapshot';
export { createSuggestionService, OpenAISuggestionService } from './openai/client';
export { listPresets, getPreset, presetStore, reportPresets } from './presets/library';
export type { Preset } from './presets/library';
