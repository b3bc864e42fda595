import type { TextField } from '../types';

/** Optional collaborator that proposes improved wording for one component or the whole prompt. */
export interface SuggestionService {
  readonly available: boolean;
  suggest(field: TextField, currentValue: string): Promise<string | null>;
  /** A reworked version of the full rendered prompt, or null when there is nothing to offer. */
  refine(promptText: string): Promise<string | null>;
}

export const UNAVAILABLE_SUGGESTIONS: SuggestionService = {
  available: false,
  suggest: async () => null,
  refine: async () => null
};
