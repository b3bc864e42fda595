#!/usr/bin/env node
import * as p from '@clack/prompts';
import { Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';
import { CFG } from '../config';
import { AgentBuilderError, WizardCancelledError } from '../engine/errors';
import { MetricsTracker } from '../engine/metrics';
import { renderPrompt } from '../engine/render';
import { parseTier, TIERS } from '../engine/schema';
import { UNAVAILABLE_SUGGESTIONS } from '../engine/suggestions';
import { createSuggestionService } from '../openai/client';
import { getPreset, listPresets, presetStore, reportPresets } from '../presets/library';
import { buildSnapshot, loadSnapshot, saveSnapshot, snapshotPath, toMarkdown } from '../state/snapshotStore';
import type { Tier } from '../types';
import { log } from '../util/logger';
import { formatPresetTable } from './summary';
import { runSession, selectTier } from './session';
import { ClackWizardIO } from './terminal';

const VERSION = '1.0.0';

function tierOption(value: string): Tier {
  const tier = parseTier(value);
  if (!tier) throw new InvalidArgumentError(`Expected one of: ${TIERS.join(', ')}.`);
  return tier;
}

async function buildCommand(opts: { tier?: Tier; out: string; markdown?: boolean }): Promise<void> {
  const io = new ClackWizardIO();
  p.intro(pc.bgCyan(pc.black(' Agent Builder ')));
  try {
    const tier = opts.tier ?? await selectTier(io, CFG.DEFAULT_TIER);
    // Suggestions are part of the guided and full tiers only.
    const suggestions = tier === 'minimal' ? UNAVAILABLE_SUGGESTIONS : createSuggestionService();
    if (tier !== 'minimal' && !suggestions.available) {
      io.show(pc.yellow('OPENAI_API_KEY not found. AI assistance disabled.'));
    }
    const result = await runSession({ tier, io, outDir: opts.out, suggestions, markdown: opts.markdown });
    p.outro(result.savedTo
      ? `Done. Prompt saved to ${pc.cyan(result.savedTo)}`
      : 'Thank you for using Agent Builder!');
  } catch (error) {
    if (error instanceof WizardCancelledError) {
      p.cancel('Process cancelled by user. Nothing was saved.');
      process.exitCode = 130;
      return;
    }
    throw error;
  }
}

function renderCommand(file: string, opts: { stored?: boolean; markdown?: boolean }): void {
  const { snapshot, store } = loadSnapshot(file);
  const text = opts.stored ? snapshot.rendered_text : renderPrompt(store);
  process.stdout.write((opts.markdown ? toMarkdown({ ...snapshot, rendered_text: text }) : text) + '\n');
}

function presetsCommand(name: string | undefined, opts: { save?: boolean; out: string }): void {
  if (!name) {
    process.stdout.write(formatPresetTable(reportPresets()) + '\n');
    return;
  }

  const preset = getPreset(name);
  if (!preset) {
    const known = listPresets().map(pr => pr.name).join(', ');
    process.stderr.write(pc.red(`Unknown preset "${name}". Available: ${known}`) + '\n');
    process.exitCode = 1;
    return;
  }

  const store = presetStore(preset);
  process.stdout.write(renderPrompt(store) + '\n');

  if (opts.save) {
    const metrics = new MetricsTracker(store);
    metrics.finalize();
    const snapshot = buildSnapshot(store, metrics);
    const saved = saveSnapshot(snapshot, snapshotPath(opts.out, snapshot));
    process.stderr.write(pc.green(`Saved: ${saved}`) + '\n');
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('agent-builder')
    .description('Build structured instructions for AI agents, one component at a time')
    .version(VERSION);

  program
    .command('build', { isDefault: true })
    .description('Run the interactive wizard')
    .option('-t, --tier <tier>', `complexity tier (${TIERS.join(' | ')})`, tierOption)
    .option('-o, --out <dir>', 'directory for saved prompts', CFG.OUTPUT_DIR)
    .option('--markdown', 'also write the prompt as Markdown next to the saved snapshot')
    .action(buildCommand);

  program
    .command('render')
    .description('Print the prompt of a saved snapshot, re-rendered from its components')
    .argument('<file>', 'snapshot JSON file')
    .option('--stored', 'print the text stored in the file instead of re-rendering')
    .option('--markdown', 'print as a Markdown document')
    .action(renderCommand);

  program
    .command('presets')
    .description('List ready-made agent presets, or render one')
    .argument('[name]', 'preset to render')
    .option('-s, --save', 'also save the rendered preset as a snapshot')
    .option('-o, --out <dir>', 'directory for saved prompts', CFG.OUTPUT_DIR)
    .action(presetsCommand);

  return program;
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    if (error instanceof AgentBuilderError) {
      log.error({ code: error.code }, error.message);
      process.stderr.write(pc.red(error.message) + '\n');
    } else {
      log.error({ err: error }, 'unexpected failure');
      process.stderr.write(pc.red(`An error occurred: ${error instanceof Error ? error.message : String(error)}`) + '\n');
    }
    process.exit(1);
  });
}
