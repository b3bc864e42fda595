import { join } from 'path';
import type { ValidationResult } from '../types';
import { PersistenceError, SnapshotFormatError } from '../engine/errors';
import type { MetricsTracker } from '../engine/metrics';
import { renderPrompt } from '../engine/render';
import { ComponentStore } from '../engine/store';
import { validateComponents } from '../engine/validate';
import { SnapshotSchema, type PromptSnapshot, type ValidationRecord } from '../schemas/snapshot';
import { readJSON, writeJSON, writeText } from '../util/fileCache';
import { componentLogger } from '../util/logger';

const logger = componentLogger('snapshot');

export interface LoadedSnapshot {
  snapshot: PromptSnapshot;
  store: ComponentStore;
}

export function toValidationRecord(result: ValidationResult): ValidationRecord {
  return {
    is_valid: result.isValid,
    clarity_score: result.clarityScore,
    completeness_score: result.completenessScore,
    overall_score: result.overallScore,
    issues: [...result.issues],
    suggestions: [...result.suggestions]
  };
}

/** Renders and validates the store, records the score on the tracker, and assembles the file record. */
export function buildSnapshot(store: ComponentStore, metrics: MetricsTracker, now: Date = new Date()): PromptSnapshot {
  const validation = validateComponents(store);
  metrics.recordValidation(validation);
  return {
    tier: store.tier,
    components: store.components(),
    rendered_text: renderPrompt(store),
    metrics: metrics.toJSON(),
    validation: toValidationRecord(validation),
    timestamp: now.toISOString()
  };
}

const pad = (n: number) => n.toString().padStart(2, '0');

export function defaultSnapshotName(tier: string, now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `agent_prompt_${tier}_${date}_${time}.json`;
}

export function snapshotPath(dir: string, snapshot: PromptSnapshot): string {
  return join(dir, defaultSnapshotName(snapshot.tier, new Date(snapshot.timestamp)));
}

/** Writes the snapshot. The in-memory snapshot stays usable when this throws. */
export function saveSnapshot(snapshot: PromptSnapshot, filePath: string): string {
  try {
    writeJSON(filePath, snapshot);
  } catch (error) {
    throw new PersistenceError(filePath, error);
  }
  logger.info({ filePath, tier: snapshot.tier }, 'snapshot saved');
  return filePath;
}

/** Markdown document of the final prompt text, for dropping into a repository as agent instructions. */
export function toMarkdown(snapshot: PromptSnapshot): string {
  const quality = `${(snapshot.validation.overall_score * 100).toFixed(1)}%`;
  return [
    '# Agent Instructions',
    '',
    `> Tier: ${snapshot.tier} | Quality: ${quality} | Created: ${snapshot.timestamp}`,
    '',
    snapshot.rendered_text
  ].join('\n');
}

/** `prompt.json` becomes `prompt.md`; any other name gets `.md` appended. */
export function markdownPath(snapshotFile: string): string {
  return snapshotFile.endsWith('.json') ? snapshotFile.slice(0, -'.json'.length) + '.md' : snapshotFile + '.md';
}

export function saveMarkdown(snapshot: PromptSnapshot, filePath: string): string {
  try {
    writeText(filePath, toMarkdown(snapshot));
  } catch (error) {
    throw new PersistenceError(filePath, error);
  }
  logger.info({ filePath }, 'markdown exported');
  return filePath;
}

export function loadSnapshot(filePath: string): LoadedSnapshot {
  let raw: unknown;
  try {
    raw = readJSON(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SnapshotFormatError(filePath, reason, error);
  }

  const parsed = SnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first.path.length ? first.path.join('.') : '(root)';
    throw new SnapshotFormatError(filePath, `${where}: ${first.message}`, parsed.error);
  }

  let store: ComponentStore;
  try {
    store = ComponentStore.fromComponents(parsed.data.tier, parsed.data.components);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SnapshotFormatError(filePath, reason, error);
  }
  logger.debug({ filePath, tier: store.tier }, 'snapshot loaded');
  return { snapshot: parsed.data, store };
}
