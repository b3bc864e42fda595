import OpenAI from 'openai';
import { CFG, type Config } from '../config';
import { buildRefineRequest, buildSuggestionRequest, REFINE_SYSTEM_PROMPT, SUGGESTION_SYSTEM_PROMPT } from '../prompts/system';
import { UNAVAILABLE_SUGGESTIONS, type SuggestionService } from '../engine/suggestions';
import { componentLogger } from '../util/logger';
import type { TextField } from '../types';

const logger = componentLogger('openai');

type ChatParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

// The slice of a chat completion this module reads.
export interface CompletionLike {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number };
}

export type CompleteFn = (params: ChatParams) => Promise<CompletionLike>;

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  requests: number;
}

/**
 * Suggestion and refinement service backed by a chat completion endpoint.
 * Calls are single-shot: no retry and no timeout beyond the client's own. Errors propagate to the caller.
 */
export class OpenAISuggestionService implements SuggestionService {
  readonly available = true;
  private readonly usage: TokenUsage = { inputTokens: 0, outputTokens: 0, requests: 0 };

  constructor(
    private readonly complete: CompleteFn,
    private readonly model: string = CFG.CHAT_MODEL,
    private readonly maxTokens: number = CFG.SUGGESTION_MAX_TOKENS,
    private readonly refineMaxTokens: number = CFG.REFINE_MAX_TOKENS
  ) {}

  suggest(field: TextField, currentValue: string): Promise<string | null> {
    return this.request(field, SUGGESTION_SYSTEM_PROMPT, buildSuggestionRequest(field, currentValue), this.maxTokens);
  }

  refine(promptText: string): Promise<string | null> {
    return this.request('prompt', REFINE_SYSTEM_PROMPT, buildRefineRequest(promptText), this.refineMaxTokens);
  }

  private async request(subject: string, system: string, user: string, maxTokens: number): Promise<string | null> {
    const result = await this.complete({
      model: this.model,
      max_tokens: maxTokens,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user }
      ]
    });

    this.usage.requests += 1;
    if (result.usage) {
      this.usage.inputTokens += result.usage.prompt_tokens;
      this.usage.outputTokens += result.usage.completion_tokens;
      logger.debug({ subject, input: result.usage.prompt_tokens, output: result.usage.completion_tokens }, 'completion tokens');
    }

    const text = result.choices[0]?.message.content?.trim();
    return text ? text : null;
  }

  getTokenUsage(): TokenUsage {
    return { ...this.usage };
  }
}

/** Returns the OpenAI-backed service, or the unavailable stand-in when no API key is configured. */
export function createSuggestionService(cfg: Config = CFG): SuggestionService {
  if (!cfg.OPENAI_API_KEY) {
    logger.info('OPENAI_API_KEY not set, AI suggestions disabled');
    return UNAVAILABLE_SUGGESTIONS;
  }
  const openai = new OpenAI({ apiKey: cfg.OPENAI_API_KEY, maxRetries: 0 });
  logger.debug({ model: cfg.CHAT_MODEL }, 'AI suggestions enabled');
  return new OpenAISuggestionService(
    params => openai.chat.completions.create(params),
    cfg.CHAT_MODEL,
    cfg.SUGGESTION_MAX_TOKENS,
    cfg.REFINE_MAX_TOKENS
  );
}
