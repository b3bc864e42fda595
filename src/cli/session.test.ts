import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AskOptions } from '../engine/driver';
import { WizardCancelledError } from '../engine/errors';
import { renderPrompt } from '../engine/render';
import type { SuggestionService } from '../engine/suggestions';
import { loadSnapshot, toMarkdown } from '../state/snapshotStore';
import { CANCEL, ScriptedIO, type ScriptedAnswer } from '../testing/scriptedIO';
import { parseRating, runSession, selectTier } from './session';

const MINIMAL_ANSWERS = ['a senior Python developer', 'review code for bugs and security issues', 'Be constructive', ''];
const GUIDED_ANSWERS = [...MINIMAL_ANSWERS, '', false, ''];
const FIXED_NOW = () => 1_700_000_000_000;

function refiner(refine: SuggestionService['refine']): SuggestionService {
  return { available: true, suggest: vi.fn(async () => null), refine: vi.fn(refine) };
}

/** Turns every saved file into a directory just before the rating is asked, so the re-save fails. */
class BlockResaveIO extends ScriptedIO {
  constructor(answers: ScriptedAnswer[], private readonly dir: string) {
    super(answers);
  }

  async ask(message: string, options: AskOptions = {}): Promise<string> {
    if (message.startsWith('Rate your satisfaction')) {
      for (const name of fs.readdirSync(this.dir)) {
        const file = path.join(this.dir, name);
        fs.rmSync(file);
        fs.mkdirSync(file);
      }
    }
    return super.ask(message, options);
  }
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'agent-builder-session-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('runSession', () => {
  it('saves the snapshot and folds the rating into it', async () => {
    const io = new ScriptedIO([...MINIMAL_ANSWERS, true, true, '9']);
    const result = await runSession({ tier: 'minimal', io, outDir: dir, now: FIXED_NOW });

    expect(result.savedTo).not.toBeNull();
    expect(path.dirname(result.savedTo ?? '')).toBe(dir);
    expect(path.basename(result.savedTo ?? '')).toMatch(/^agent_prompt_minimal_\d{8}_\d{6}\.json$/);

    const { snapshot, store } = loadSnapshot(result.savedTo ?? '');
    expect(snapshot.metrics.user_satisfaction).toBe(9);
    expect(snapshot.validation.clarity_score).toBe(8);
    expect(snapshot.validation.is_valid).toBe(true);
    expect(snapshot.rendered_text).toBe(renderPrompt(store));
    expect(store.components()).toEqual(result.store.components());
    expect(io.shown).toContain('Thank you for the great rating!');
  });

  it('shows the summary and the generated prompt', async () => {
    const io = new ScriptedIO([...MINIMAL_ANSWERS, false, false]);
    const result = await runSession({ tier: 'minimal', io, outDir: dir, now: FIXED_NOW });

    expect(result.savedTo).toBeNull();
    expect(io.notes.map(n => n.title)).toEqual([
      'Step 1: Define the Role',
      'Step 2: Define the Task',
      'Step 3: Define Constraints',
      'Performance Metrics',
      'Validation Results',
      'Generated Prompt'
    ]);
    expect(io.notes[5].body).toBe(result.snapshot.rendered_text);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('keeps the in-memory result when saving fails', async () => {
    const blocker = path.join(dir, 'not-a-directory');
    fs.writeFileSync(blocker, 'x');
    const io = new ScriptedIO([...MINIMAL_ANSWERS, true, false]);

    const result = await runSession({ tier: 'minimal', io, outDir: blocker, now: FIXED_NOW });

    expect(result.savedTo).toBeNull();
    expect(io.shown.some(s => s.startsWith('Could not save prompt:'))).toBe(true);
    expect(result.snapshot.rendered_text).toContain('You are a senior Python developer.');
  });

  it('writes nothing when the user cancels', async () => {
    const io = new ScriptedIO(['a tutor', CANCEL]);
    await expect(runSession({ tier: 'minimal', io, outDir: dir })).rejects.toBeInstanceOf(WizardCancelledError);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('keeps the saved file when the rating prompt is cancelled', async () => {
    const io = new ScriptedIO([...MINIMAL_ANSWERS, true, CANCEL]);
    const result = await runSession({ tier: 'minimal', io, outDir: dir, now: FIXED_NOW });

    expect(result.savedTo).not.toBeNull();
    expect(fs.readdirSync(dir)).toEqual([path.basename(result.savedTo ?? '')]);
    expect(result.metrics.userSatisfaction).toBeNull();
  });

  it('treats a cancel at the rating value as declining to rate', async () => {
    const io = new ScriptedIO([...MINIMAL_ANSWERS, true, true, CANCEL]);
    const result = await runSession({ tier: 'minimal', io, outDir: dir, now: FIXED_NOW });

    expect(result.metrics.userSatisfaction).toBeNull();
    expect(loadSnapshot(result.savedTo ?? '').snapshot.metrics.user_satisfaction).toBeNull();
  });

  it('keeps the first path when the rated snapshot cannot be written', async () => {
    const io = new BlockResaveIO([...MINIMAL_ANSWERS, true, true, '9'], dir);
    const result = await runSession({ tier: 'minimal', io, outDir: dir, now: FIXED_NOW });

    expect(result.savedTo).not.toBeNull();
    expect(path.dirname(result.savedTo ?? '')).toBe(dir);
    expect(io.shown.some(s => s.startsWith('Rating was not written:'))).toBe(true);
    expect(result.metrics.userSatisfaction).toBe(9);
  });

  it('rejects a rating written in hex notation', async () => {
    const io = new ScriptedIO([...MINIMAL_ANSWERS, false, true, '0x8']);
    const result = await runSession({ tier: 'minimal', io, outDir: dir, now: FIXED_NOW });

    expect(io.shown).toContain('Invalid rating, but thanks anyway!');
    expect(result.metrics.userSatisfaction).toBeNull();
  });

  it('exports Markdown beside the snapshot when asked', async () => {
    const io = new ScriptedIO([...MINIMAL_ANSWERS, true, false]);
    const result = await runSession({ tier: 'minimal', io, outDir: dir, now: FIXED_NOW, markdown: true });

    const jsonFile = result.savedTo ?? '';
    const mdFile = jsonFile.replace(/\.json$/, '.md');
    expect(fs.readdirSync(dir).sort()).toEqual([path.basename(jsonFile), path.basename(mdFile)].sort());
    expect(fs.readFileSync(mdFile, 'utf-8')).toBe(toMarkdown(result.snapshot) + '\n');
    expect(io.shown).toContain(`Markdown saved to: ${mdFile}`);
  });

  it('saves an accepted refinement as the prompt text', async () => {
    const suggestions = refiner(async () => 'You are a meticulous senior Python developer.');
    const io = new ScriptedIO([...GUIDED_ANSWERS, true, true, true, false]);
    const result = await runSession({ tier: 'guided', io, outDir: dir, now: FIXED_NOW, suggestions });

    expect(suggestions.refine).toHaveBeenCalledWith(renderPrompt(result.store));
    expect(io.notes).toContainEqual({ title: 'AI Enhanced', body: 'You are a meticulous senior Python developer.' });
    expect(result.snapshot.rendered_text).toBe('You are a meticulous senior Python developer.');
    expect(result.snapshot.metrics.suggestions_offered).toBe(1);
    expect(result.snapshot.metrics.suggestions_used).toBe(1);
    expect(loadSnapshot(result.savedTo ?? '').snapshot.rendered_text).toBe('You are a meticulous senior Python developer.');
  });

  it('keeps the original text when the refinement is declined', async () => {
    const suggestions = refiner(async () => 'You are someone else.');
    const io = new ScriptedIO([...GUIDED_ANSWERS, true, false, false, false]);
    const result = await runSession({ tier: 'guided', io, outDir: dir, now: FIXED_NOW, suggestions });

    expect(result.snapshot.rendered_text).toBe(renderPrompt(result.store));
    expect(result.snapshot.metrics.suggestions_offered).toBe(1);
    expect(result.snapshot.metrics.suggestions_used).toBe(0);
  });

  it('falls back to the original text when refinement fails', async () => {
    const suggestions = refiner(async () => { throw new Error('service down'); });
    const io = new ScriptedIO([...GUIDED_ANSWERS, true, false, false]);
    const result = await runSession({ tier: 'guided', io, outDir: dir, now: FIXED_NOW, suggestions });

    expect(io.shown).toContain('Refinement failed: service down. Keeping the original prompt.');
    expect(result.snapshot.rendered_text).toBe(renderPrompt(result.store));
    expect(io.asked).not.toContain('Use refined version?');
  });

  it('ignores an invalid rating', async () => {
    const io = new ScriptedIO([...MINIMAL_ANSWERS, false, true, 'great']);
    const result = await runSession({ tier: 'minimal', io, outDir: dir, now: FIXED_NOW });

    expect(io.shown).toContain('Invalid rating, but thanks anyway!');
    expect(result.metrics.userSatisfaction).toBeNull();
  });
});

describe('parseRating', () => {
  it('accepts plain decimals from 1 to 10', () => {
    expect(parseRating(' 9 ')).toBe(9);
    expect(parseRating('7.5')).toBe(7.5);
    expect(parseRating('10')).toBe(10);
  });

  it('rejects other numeric notations and out-of-range values', () => {
    for (const answer of ['0x8', '1e1', '0b101', '-3', '0', '11', '', 'great']) {
      expect(parseRating(answer)).toBeNull();
    }
  });
});

describe('selectTier', () => {
  it('maps the chosen option back to a tier', async () => {
    expect(await selectTier(new ScriptedIO([3]), 'guided')).toBe('full');
    expect(await selectTier(new ScriptedIO([1]), 'guided')).toBe('minimal');
  });
});
