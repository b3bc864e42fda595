import type { TextField, TextListField } from '../types';
import { componentLogger } from '../util/logger';
import type { MetricsTracker } from './metrics';
import { REASONING_PATTERNS } from './schema';
import type { ComponentStore } from './store';
import { UNAVAILABLE_SUGGESTIONS, type SuggestionService } from './suggestions';

const logger = componentLogger('driver');

export interface AskOptions {
  defaultValue?: string;
  placeholder?: string;
  required?: boolean;
}

/**
 * Terminal collaborator. Implementations throw WizardCancelledError when the user aborts.
 */
export interface WizardIO {
  ask(message: string, options?: AskOptions): Promise<string>;
  /** Returns the 1-based index of the chosen option. */
  choose(message: string, options: readonly string[], defaultIndex?: number): Promise<number>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  show(message: string): void;
  note(title: string, body: string): void;
}

export const REASONING_CHOICES: readonly string[] = [...REASONING_PATTERNS, 'custom'];

const MINIMAL_STEPS = [
  { title: 'Define the Role', hint: "Who is the AI agent? What expertise should it have?\nExamples: 'a senior Python developer', 'a marketing expert', 'a data scientist'" },
  { title: 'Define the Task', hint: "What should the agent do? Be specific about the goal.\nExamples: 'review code for bugs', 'write marketing copy', 'analyze data trends'" },
  { title: 'Define Constraints', hint: "What rules or limitations should the agent follow?\nExamples: 'Be concise', 'Use simple language', 'Focus on security'" }
];

export function progressLine(step: number, total: number, name: string): string {
  const bar = '#'.repeat(step) + '-'.repeat(Math.max(total - step, 0));
  const pct = Math.round((step / total) * 100);
  return `Progress: [${bar}] ${pct}% - ${name}`;
}

function titleCase(value: string): string {
  return value.split('-').map(w => w.charAt(0).toUpperCase() + w.slice(1)).join('-');
}

/**
 * Walks the active tier's fields in schema order. Guided and full tiers run the
 * lower tier's sequence first; there are no backward transitions.
 */
export class CollectionDriver {
  constructor(
    private readonly store: ComponentStore,
    private readonly metrics: MetricsTracker,
    private readonly io: WizardIO,
    private readonly suggestions: SuggestionService = UNAVAILABLE_SUGGESTIONS
  ) {}

  async run(): Promise<void> {
    logger.debug({ tier: this.store.tier }, 'collection started');
    await this.collectMinimal();
    if (this.store.tier !== 'minimal') await this.collectGuided();
    if (this.store.tier === 'full') await this.collectFull();
    this.metrics.finalize();
    logger.debug({ filled: this.metrics.componentsFilled, total: this.metrics.totalComponents }, 'collection finished');
  }

  private async collectMinimal(): Promise<void> {
    const total = MINIMAL_STEPS.length;

    this.io.show(progressLine(1, total, MINIMAL_STEPS[0].title));
    this.io.note(`Step 1: ${MINIMAL_STEPS[0].title}`, MINIMAL_STEPS[0].hint);
    this.store.set('role', (await this.io.ask('Role', { required: true, placeholder: 'a senior Python developer' })).trim());

    this.io.show(progressLine(2, total, MINIMAL_STEPS[1].title));
    this.io.note(`Step 2: ${MINIMAL_STEPS[1].title}`, MINIMAL_STEPS[1].hint);
    this.store.set('task', (await this.io.ask('Task', { required: true, placeholder: 'review code for bugs' })).trim());

    this.io.show(progressLine(3, total, MINIMAL_STEPS[2].title));
    this.io.note(`Step 3: ${MINIMAL_STEPS[2].title}`, MINIMAL_STEPS[2].hint);
    await this.collectList('constraints', n => `Constraint #${n} (or press Enter to finish)`, true);
  }

  private async collectGuided(): Promise<void> {
    if (this.suggestions.available) {
      this.io.show('AI Enhancement Phase');
      await this.offerSuggestion('role');
    }

    this.io.note('4. Add Context (Optional)', 'Provide background information or domain context');
    await this.collectOptionalText('context', 'Context (press Enter to skip)');

    this.io.note('5. Add Examples (Optional)', 'Provide input/output example pairs');
    if (await this.io.confirm('Would you like to add examples?', false)) {
      for (;;) {
        const input = (await this.io.ask('Example input (or press Enter to finish)')).trim();
        if (!input) break;
        const output = (await this.io.ask('Expected output')).trim();
        this.store.append('examples', { input, output });
      }
    }

    this.io.note('6. Define Output Format (Optional)', 'How should the answer be structured?');
    await this.collectOptionalText('output_format', 'Output format requirements (press Enter to skip)');
  }

  private async collectFull(): Promise<void> {
    this.io.show('Expert Components');

    const choice = await this.io.choose('7. Choose reasoning pattern', REASONING_CHOICES.map(titleCase), 1);
    const selected = REASONING_CHOICES[choice - 1] ?? REASONING_CHOICES[0];
    const pattern = selected === 'custom'
      ? (await this.io.ask('Define custom reasoning pattern', { required: true })).trim()
      : selected;
    this.store.set('reasoning_pattern', pattern);

    this.io.show('8. Success Criteria');
    await this.collectList('success_criteria', () => 'Add success criterion (or press Enter to finish)');

    if (await this.io.confirm('Define edge cases?', false)) {
      await this.collectList('edge_cases', () => 'Add edge case (or press Enter to finish)');
    }

    if (await this.io.confirm('Add performance requirements?', false)) {
      await this.collectOptionalText('performance_requirements', 'Performance requirements');
    }

    if (await this.io.confirm('Add custom instructions?', false)) {
      await this.collectList('custom_instructions', () => 'Add custom instruction (or press Enter to finish)');
    }
  }

  private async collectOptionalText(field: TextField, message: string): Promise<void> {
    const value = (await this.io.ask(message, { defaultValue: '' })).trim();
    if (value) this.store.set(field, value);
  }

  private async collectList(field: TextListField, message: (n: number) => string, echo = false): Promise<void> {
    for (let n = 1; ; n++) {
      const item = (await this.io.ask(message(n), { defaultValue: '' })).trim();
      if (!item) break;
      this.store.append(field, item);
      if (echo) this.io.show(`✓ Added: ${item}`);
    }
  }

  /** Failures leave the current value untouched; the session continues. */
  private async offerSuggestion(field: TextField): Promise<void> {
    const current = this.store.text(field);
    let suggestion: string | null;
    try {
      suggestion = await this.suggestions.suggest(field, current);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ field, reason }, 'suggestion request failed');
      this.io.show(`Could not get AI suggestion: ${reason}`);
      return;
    }
    if (!suggestion) return;

    this.metrics.recordSuggestionOffered();
    this.io.note(`AI Suggestion for ${field}`, suggestion);
    if (!(await this.io.confirm('Apply this suggestion?', false))) return;

    const enhanced = (await this.io.ask(`Enhanced ${field}`, { defaultValue: current })).trim();
    if (enhanced) {
      this.store.set(field, enhanced);
      this.metrics.recordSuggestionUsed();
    }
  }
}
