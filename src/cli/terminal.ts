import * as p from '@clack/prompts';
import type { AskOptions, WizardIO } from '../engine/driver';
import { WizardCancelledError } from '../engine/errors';

/** WizardIO over @clack/prompts. Ctrl+C on any prompt aborts the whole run. */
export class ClackWizardIO implements WizardIO {
  async ask(message: string, options: AskOptions = {}): Promise<string> {
    const value = await p.text({
      message,
      placeholder: options.placeholder,
      initialValue: options.defaultValue,
      defaultValue: options.defaultValue,
      validate: options.required
        ? (v) => (v.trim() ? undefined : 'A value is required')
        : undefined
    });
    if (p.isCancel(value)) throw new WizardCancelledError();
    return value ?? '';
  }

  async choose(message: string, options: readonly string[], defaultIndex = 1): Promise<number> {
    const value = await p.select({
      message,
      initialValue: defaultIndex,
      options: options.map((label, i) => ({ value: i + 1, label }))
    });
    if (p.isCancel(value)) throw new WizardCancelledError();
    return value;
  }

  async confirm(message: string, defaultValue = true): Promise<boolean> {
    const value = await p.confirm({ message, initialValue: defaultValue });
    if (p.isCancel(value)) throw new WizardCancelledError();
    return value;
  }

  show(message: string): void {
    p.log.message(message);
  }

  note(title: string, body: string): void {
    p.note(body, title);
  }
}
