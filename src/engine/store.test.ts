import { describe, expect, it, vi } from 'vitest';
import { TypeMismatchError, UnknownFieldError } from './errors';
import { ComponentStore } from './store';

describe('ComponentStore', () => {
  it('starts with every tier field empty, in schema order', () => {
    const store = new ComponentStore('guided');
    const record = store.components();

    expect(Object.keys(record)).toEqual(['role', 'task', 'constraints', 'context', 'examples', 'output_format']);
    expect(record).toEqual({ role: '', task: '', constraints: [], context: '', examples: [], output_format: '' });
    expect(store.filledCount()).toBe(0);
  });

  it('rejects fields outside the tier', () => {
    const store = new ComponentStore('minimal');
    expect(() => store.set('context', 'background')).toThrow(UnknownFieldError);
    expect(() => store.append('edge_cases', 'empty input')).toThrow(UnknownFieldError);
  });

  it('rejects values of the wrong kind', () => {
    const store = new ComponentStore('guided');
    expect(() => store.set('role', ['a list'])).toThrow(TypeMismatchError);
    expect(() => store.set('constraints', 'text')).toThrow(TypeMismatchError);
    expect(() => store.append('role', 'more')).toThrow(TypeMismatchError);
    expect(() => store.append('constraints', { input: 'i', output: 'o' })).toThrow(TypeMismatchError);
    expect(() => store.append('examples', 'not a pair')).toThrow(TypeMismatchError);
  });

  it('keeps list items in insertion order without deduplicating', () => {
    const store = new ComponentStore('minimal');
    store.append('constraints', 'a');
    store.append('constraints', 'b');
    store.append('constraints', 'a');
    expect(store.list('constraints')).toEqual(['a', 'b', 'a']);
  });

  it('counts whitespace-only text as unfilled', () => {
    const store = new ComponentStore('minimal');
    store.set('role', '   ');
    store.set('task', 'summarize reports');
    store.append('constraints', 'Be brief');
    expect(store.filledCount()).toBe(2);
    expect(store.isFilled('role')).toBe(false);
  });

  it('returns empty values for fields the tier lacks', () => {
    const store = new ComponentStore('minimal');
    expect(store.text('context')).toBe('');
    expect(store.pairs('examples')).toEqual([]);
    expect(store.list('edge_cases')).toEqual([]);
  });

  it('hands out copies of list values', () => {
    const store = new ComponentStore('guided');
    store.append('constraints', 'a');
    store.append('examples', { input: 'i', output: 'o' });

    store.list('constraints').push('b');
    store.pairs('examples')[0].input = 'changed';

    expect(store.list('constraints')).toEqual(['a']);
    expect(store.pairs('examples')).toEqual([{ input: 'i', output: 'o' }]);
  });

  it('rebuilds from a component record', () => {
    const store = ComponentStore.fromComponents('guided', {
      role: 'a tutor',
      constraints: ['Be patient'],
      examples: [{ input: '2+2', output: '4' }]
    });
    expect(store.text('role')).toBe('a tutor');
    expect(store.list('constraints')).toEqual(['Be patient']);
    expect(store.pairs('examples')).toEqual([{ input: '2+2', output: '4' }]);
    expect(store.filledCount()).toBe(3);
  });

  it('refuses records with fields outside the tier', () => {
    expect(() => ComponentStore.fromComponents('minimal', { context: 'x' })).toThrow(UnknownFieldError);
  });

  it('notifies listeners until unsubscribed', () => {
    const store = new ComponentStore('minimal');
    const listener = vi.fn();
    const off = store.onChange(listener);

    store.set('role', 'x');
    store.set('task', '');
    off();
    store.append('constraints', 'c');

    expect(listener.mock.calls).toEqual([['role', true], ['task', false]]);
  });
});
