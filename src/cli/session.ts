import type { Tier } from '../types';
import { CollectionDriver, type WizardIO } from '../engine/driver';
import { PersistenceError, WizardCancelledError } from '../engine/errors';
import { MetricsTracker } from '../engine/metrics';
import { TIERS } from '../engine/schema';
import { ComponentStore } from '../engine/store';
import { UNAVAILABLE_SUGGESTIONS, type SuggestionService } from '../engine/suggestions';
import { validateComponents } from '../engine/validate';
import type { PromptSnapshot } from '../schemas/snapshot';
import { buildSnapshot, markdownPath, saveMarkdown, saveSnapshot, snapshotPath } from '../state/snapshotStore';
import { componentLogger } from '../util/logger';
import { formatFindings, formatRows, metricsRows, ratingMessage, validationRows } from './summary';

const logger = componentLogger('session');

export const TIER_CHOICES: Record<Tier, string> = {
  minimal: 'Minimal: role, task, constraints (2-3 min, simple tasks)',
  guided: 'Guided: adds context, examples, output format (5-8 min, most use cases) [Recommended]',
  full: 'Full: every component (10-15 min, complex requirements)'
};

export async function selectTier(io: WizardIO, defaultTier: Tier): Promise<Tier> {
  const index = await io.choose('Choose mode', TIERS.map(t => TIER_CHOICES[t]), TIERS.indexOf(defaultTier) + 1);
  return TIERS[index - 1] ?? defaultTier;
}

export interface SessionOptions {
  tier: Tier;
  io: WizardIO;
  outDir: string;
  suggestions?: SuggestionService;
  now?: () => number;
  /** Also write the prompt as Markdown beside the saved snapshot. */
  markdown?: boolean;
}

export interface SessionResult {
  store: ComponentStore;
  metrics: MetricsTracker;
  snapshot: PromptSnapshot;
  savedTo: string | null;
}

const RATING_PATTERN = /^\d+(\.\d+)?$/;

/** Plain decimal between 1 and 10, or null. */
export function parseRating(answer: string): number | null {
  const trimmed = answer.trim();
  if (!RATING_PATTERN.test(trimmed)) return null;
  const rating = Number.parseFloat(trimmed);
  return rating >= 1 && rating <= 10 ? rating : null;
}

/**
 * One wizard run: collect, summarize, optionally refine, save and rate.
 * A WizardCancelledError before the save step escapes with nothing written; after it, cancelling only skips the rating.
 */
export async function runSession(options: SessionOptions): Promise<SessionResult> {
  const { tier, io, outDir, suggestions = UNAVAILABLE_SUGGESTIONS, now = Date.now, markdown = false } = options;
  const store = new ComponentStore(tier);
  const metrics = new MetricsTracker(store, { now });

  await new CollectionDriver(store, metrics, io, suggestions).run();

  let snapshot = buildSnapshot(store, metrics, new Date(now()));
  const validation = validateComponents(store);
  io.note('Performance Metrics', formatRows(metricsRows(metrics)));
  io.note('Validation Results', formatRows(validationRows(validation)));
  const findings = formatFindings(validation);
  if (findings) io.show(findings);
  io.note('Generated Prompt', snapshot.rendered_text);

  if (suggestions.available) snapshot = await offerRefinement(io, suggestions, metrics, snapshot);

  let savedTo: string | null = null;
  if (await io.confirm('Save this prompt to file?', true)) {
    savedTo = persist(io, 'Could not save prompt', () => saveSnapshot(snapshot, snapshotPath(outDir, snapshot)));
    if (savedTo) io.show(`Prompt saved to: ${savedTo}`);
    if (savedTo && markdown) {
      const mdFile = markdownPath(savedTo);
      if (persist(io, 'Could not export Markdown', () => saveMarkdown(snapshot, mdFile))) {
        io.show(`Markdown saved to: ${mdFile}`);
      }
    }
  }

  try {
    snapshot = await collectRating(io, metrics, snapshot, savedTo);
  } catch (error) {
    if (!(error instanceof WizardCancelledError)) throw error;
    logger.debug({ savedTo }, 'rating cancelled');
  }

  return { store, metrics, snapshot, savedTo };
}

/** Whole-prompt rewrite offered after the preview. Any failure keeps the original text. */
async function offerRefinement(
  io: WizardIO,
  suggestions: SuggestionService,
  metrics: MetricsTracker,
  snapshot: PromptSnapshot
): Promise<PromptSnapshot> {
  if (!(await io.confirm('Use AI to enhance this prompt?', false))) return snapshot;

  let refined: string | null;
  try {
    refined = await suggestions.refine(snapshot.rendered_text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn({ reason }, 'refinement failed');
    io.show(`Refinement failed: ${reason}. Keeping the original prompt.`);
    return snapshot;
  }
  if (!refined || refined === snapshot.rendered_text) {
    io.show('No refinement suggested. Keeping the original prompt.');
    return snapshot;
  }

  metrics.recordSuggestionOffered();
  io.note('AI Enhanced', refined);
  if (!(await io.confirm('Use refined version?', true))) {
    return { ...snapshot, metrics: metrics.toJSON() };
  }
  metrics.recordSuggestionUsed();
  return { ...snapshot, rendered_text: refined, metrics: metrics.toJSON() };
}

/** A failed re-save leaves the earlier file and its path in place. */
async function collectRating(
  io: WizardIO,
  metrics: MetricsTracker,
  snapshot: PromptSnapshot,
  savedTo: string | null
): Promise<PromptSnapshot> {
  if (!(await io.confirm('Would you like to rate this experience?', false))) return snapshot;

  const rating = parseRating(await io.ask('Rate your satisfaction (1-10)', { defaultValue: '8' }));
  if (rating === null) {
    io.show('Invalid rating, but thanks anyway!');
    return snapshot;
  }

  metrics.setUserSatisfaction(rating);
  io.show(ratingMessage(rating));
  const rated = { ...snapshot, metrics: metrics.toJSON() };
  if (savedTo && persist(io, 'Rating was not written', () => saveSnapshot(rated, savedTo))) {
    io.show(`Rating saved to: ${savedTo}`);
  }
  return rated;
}

function persist(io: WizardIO, failure: string, write: () => string): string | null {
  try {
    return write();
  } catch (error) {
    if (!(error instanceof PersistenceError)) throw error;
    logger.error({ filePath: error.filePath, reason: error.message }, failure);
    io.show(`${failure}: ${error.message}`);
    return null;
  }
}
