/**
 * LLMService
 *
 * Thin wrapper over the OpenAI chat completions API. Callers depend on the
 * `LLMCaller` interface so tests can substitute a scripted fake.
 */

import OpenAI from 'openai';
import { DEFAULT_MODEL, getOpenAI } from '../../config/llm-config.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMRequest {
  messages: LLMMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask the model for a JSON object */
  jsonResponse?: boolean;
}

export interface LLMResponse {
  content: string | null;
}

export interface LLMCaller {
  call(request: LLMRequest): Promise<LLMResponse>;
}

function toOpenAIMessage(message: LLMMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class LLMService implements LLMCaller {
  constructor(
    private readonly client: OpenAI = getOpenAI(),
    private readonly model: string = DEFAULT_MODEL,
    private readonly logger: Logger = defaultLogger
  ) {}

  async call(request: LLMRequest): Promise<LLMResponse> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: request.model ?? this.model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };
    if (request.jsonResponse) {
      params.response_format = { type: 'json_object' };
    }

    try {
      const completion = await this.client.chat.completions.create(params);
      const message = completion.choices[0]?.message;
      if (!message) {
        throw new Error('No message in LLM response');
      }
      return { content: message.content ?? null };
    } catch (error) {
      this.logger.error('[LLMService] Error calling LLM:', error);
      throw error;
    }
  }
}

/**
 * Parse a JSON object out of model output, tolerating code fences or prose
 * around it. Returns null when no object can be recovered.
 */
export function tryParseJsonObject(raw: string): unknown {
  const trimmed = raw.trim().replace(/^```(?:json)?\s*/i, '').replace(/```$/, '').trim();
  const candidates = [trimmed];
  const embedded = trimmed.match(/\{[\s\S]*\}/);
  if (embedded && embedded[0] !== trimmed) candidates.push(embedded[0]);

  for (const candidate of candidates) {
    const parsed = parseJson(candidate);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return parsed;
    }
  }
  return null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
