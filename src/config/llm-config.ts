/**
 * LLM configuration
 *
 * Model constants and a lazily created OpenAI client, so importing this module
 * never needs an API key (tests construct services with fakes instead).
 */

import OpenAI from 'openai';

export const GPT_4O_MINI_MODEL = 'gpt-4o-mini';
export const DEFAULT_MODEL = GPT_4O_MINI_MODEL;

export const DEFAULT_TRANSCRIPTION_MODEL = 'whisper-1';
export const DEFAULT_TTS_MODEL = 'tts-1';

export interface LLMCallSettings {
  temperature: number;
  maxTokens: number;
}

/** Conversational reply: some variety, short answers */
export const REPLY_SETTINGS: LLMCallSettings = { temperature: 0.7, maxTokens: 500 };

/** Field extraction: as deterministic as the model allows */
export const EXTRACTION_SETTINGS: LLMCallSettings = { temperature: 0.1, maxTokens: 200 };

/** Number of history messages sent along with each reply request */
export const REPLY_HISTORY_MESSAGES = 10;

let _openai: OpenAI | null = null;

export function getOpenAI(apiKey: string | undefined = process.env.OPENAI_API_KEY): OpenAI {
  if (!_openai) {
    _openai = new OpenAI({
      apiKey: apiKey || 'sk-placeholder-for-testing',
    });
  }
  return _openai;
}
