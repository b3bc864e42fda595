import type {
  ComponentRecord,
  ExamplePair,
  FieldDescriptor,
  FieldName,
  FieldValue,
  PairListField,
  TextField,
  TextListField,
  Tier
} from '../types';
import { UnknownFieldError, TypeMismatchError } from './errors';
import { emptyValue, fieldsFor, isExamplePair, isFilled, isPairList, isTextList, matchesKind } from './schema';

export type ChangeListener = (field: FieldName, filled: boolean) => void;

/**
 * Fixed-schema record of component values for one tier.
 * Every field of the tier exists from construction; values are overwritten, never removed.
 */
export class ComponentStore {
  readonly tier: Tier;
  private readonly descriptors: FieldDescriptor[];
  private readonly values = new Map<FieldName, FieldValue>();
  private readonly listeners: ChangeListener[] = [];

  constructor(tier: Tier) {
    this.tier = tier;
    this.descriptors = fieldsFor(tier);
    for (const d of this.descriptors) {
      this.values.set(d.name, emptyValue(d.kind));
    }
  }

  static fromComponents(tier: Tier, record: ComponentRecord): ComponentStore {
    const store = new ComponentStore(tier);
    for (const [name, value] of Object.entries(record)) {
      if (value === undefined) continue;
      store.set(store.descriptorOf(name).name, value);
    }
    return store;
  }

  get fields(): FieldDescriptor[] {
    return this.descriptors.map(d => ({ ...d }));
  }

  get totalFields(): number {
    return this.descriptors.length;
  }

  has(field: string): boolean {
    return this.descriptors.some(d => d.name === field);
  }

  set(field: FieldName, value: FieldValue): void {
    const descriptor = this.descriptorOf(field);
    if (!matchesKind(descriptor.kind, value)) {
      throw new TypeMismatchError(field, descriptor.kind, `got ${describe(value)}`);
    }
    this.values.set(field, copyValue(value));
    this.notify(field);
  }

  append(field: FieldName, item: string | ExamplePair): void {
    const descriptor = this.descriptorOf(field);
    const current = this.values.get(field);
    if (descriptor.kind === 'text_list' && typeof item === 'string' && isTextList(current)) {
      this.values.set(field, [...current, item]);
    } else if (descriptor.kind === 'pair_list' && isExamplePair(item) && isPairList(current)) {
      this.values.set(field, [...current, { input: item.input, output: item.output }]);
    } else if (descriptor.kind === 'text') {
      throw new TypeMismatchError(field, descriptor.kind, 'cannot append to a text field');
    } else {
      throw new TypeMismatchError(field, descriptor.kind, `cannot append ${describe(item)}`);
    }
    this.notify(field);
  }

  text(field: TextField): string {
    const value = this.values.get(field);
    return typeof value === 'string' ? value : '';
  }

  list(field: TextListField): string[] {
    const value = this.values.get(field);
    return isTextList(value) ? [...value] : [];
  }

  pairs(field: PairListField): ExamplePair[] {
    const value = this.values.get(field);
    return isPairList(value) ? value.map(p => ({ ...p })) : [];
  }

  isFilled(field: FieldName): boolean {
    return isFilled(this.values.get(field));
  }

  filledCount(): number {
    return this.descriptors.filter(d => isFilled(this.values.get(d.name))).length;
  }

  /** Plain copy of every value, in schema order. */
  components(): ComponentRecord {
    const record: ComponentRecord = {};
    for (const d of this.descriptors) {
      const value = this.values.get(d.name);
      record[d.name] = value === undefined ? emptyValue(d.kind) : copyValue(value);
    }
    return record;
  }

  onChange(listener: ChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private descriptorOf(field: string): FieldDescriptor {
    const descriptor = this.descriptors.find(d => d.name === field);
    if (!descriptor) throw new UnknownFieldError(field, this.tier);
    return descriptor;
  }

  private notify(field: FieldName): void {
    const filled = this.isFilled(field);
    for (const listener of this.listeners) listener(field, filled);
  }
}

function copyValue(value: FieldValue): FieldValue {
  if (typeof value === 'string') return value;
  if (isTextList(value)) return [...value];
  return value.map(p => ({ input: p.input, output: p.output }));
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'a list';
  return value === null ? 'null' : typeof value;
}
