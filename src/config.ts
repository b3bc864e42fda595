import 'dotenv/config';
import { parseTier } from './engine/schema';

export const CFG = {
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '', // empty disables suggestions
  CHAT_MODEL: process.env.CHAT_MODEL || 'gpt-4o-mini',
  SUGGESTION_MAX_TOKENS: Number(process.env.SUGGESTION_MAX_TOKENS || 500),
  REFINE_MAX_TOKENS: Number(process.env.REFINE_MAX_TOKENS || 1500), // whole-prompt rewrite

  OUTPUT_DIR: process.env.OUTPUT_DIR || '.',
  DEFAULT_TIER: parseTier(process.env.DEFAULT_TIER) ?? 'guided',

  LOG_LEVEL: (process.env.LOG_LEVEL || 'warn').toLowerCase(),
  LOG_DEBUG: process.env.LOG_DEBUG === '1'
};

export type Config = typeof CFG;
