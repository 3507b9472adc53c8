/**
 * UnderstandingService
 *
 * Language-understanding collaborator backed by the LLM:
 * 1. a conversational reply over the recent history
 * 2. a JSON extraction of meeting fields from the latest user message
 *
 * Extraction output is validated field by field; anything malformed is
 * dropped rather than failing the turn.
 */

import { z } from 'zod';
import {
  EXTRACTION_SETTINGS,
  REPLY_HISTORY_MESSAGES,
  REPLY_SETTINGS,
} from '../../config/llm-config.js';
import { SystemPrompts } from '../../config/system-prompts.js';
import type { ContextSnapshot, ExtractedFields, Understanding } from '../../types/index.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { prependTimeContext } from '../../utils/timeContext.js';
import { fromWallClock, isValidDate } from '../../utils/zonedTime.js';
import type { UnderstandingCollaborator } from '../collaborators.js';
import { tryParseJsonObject, type LLMCaller, type LLMMessage } from './LLMService.js';

/** "2026-06-17" or "2026-06-17T14:00[:00[.000]]" without a zone designator */
const NAIVE_ISO = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;

/** Values without an offset are read on the clock of `timezone`. */
export function parseModelDate(value: string, timezone?: string): Date | null {
  const naive = value.trim().match(NAIVE_ISO);
  if (naive) {
    const [, year, month, day, hour = '0', minute = '0', second = '0'] = naive;
    const wallClock = new Date(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour),
      Number(minute),
      Number(second)
    );
    return isValidDate(wallClock) ? fromWallClock(wallClock, timezone) : null;
  }

  const date = new Date(value);
  return isValidDate(date) ? date : null;
}

const modelDate = (timezone?: string) =>
  z.string().transform((value, ctx) => {
    const date = parseModelDate(value, timezone);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a date: ${value}` });
      return z.NEVER;
    }
    return date;
  });

const extractionSchema = (timezone?: string) =>
  z.object({
    duration_minutes: z.coerce.number().int().positive().max(24 * 60).optional().catch(undefined),
    preferred_date: modelDate(timezone).optional().catch(undefined),
    preferred_time_range: z.enum(['morning', 'afternoon', 'evening', 'night']).optional().catch(undefined),
    specific_time: modelDate(timezone).optional().catch(undefined),
    title: z.string().trim().min(1).optional().catch(undefined),
    description: z.string().trim().min(1).optional().catch(undefined),
    attendees: z.array(z.string().email()).optional().catch(undefined),
  });

/**
 * Turn raw model output into extracted fields. Never throws: malformed JSON
 * gives {}, malformed fields are left out.
 */
export function parseExtractedFields(raw: string | null, timezone?: string): ExtractedFields {
  if (!raw) return {};

  const json = tryParseJsonObject(raw);
  if (json === null) return {};

  const parsed = extractionSchema(timezone).safeParse(json);
  if (!parsed.success) return {};

  const data = parsed.data;
  const fields: ExtractedFields = {};
  if (data.duration_minutes !== undefined) fields.durationMinutes = data.duration_minutes;
  if (data.preferred_date !== undefined) fields.preferredDate = data.preferred_date;
  if (data.preferred_time_range !== undefined) fields.preferredTimeRange = data.preferred_time_range;
  if (data.specific_time !== undefined) fields.specificTime = data.specific_time;
  if (data.title !== undefined) fields.title = data.title;
  if (data.description !== undefined) fields.description = data.description;
  if (data.attendees !== undefined) fields.attendees = data.attendees;
  return fields;
}

export interface UnderstandingServiceOptions {
  timezone?: string;
  now?: () => Date;
  logger?: Logger;
}

export class UnderstandingService implements UnderstandingCollaborator {
  private readonly timezone: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(private readonly llm: LLMCaller, options: UnderstandingServiceOptions = {}) {
    this.timezone = options.timezone ?? 'UTC';
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * A failed reply call rejects (the caller's timeout boundary maps it to a
   * failure result); a failed extraction call only costs the fields.
   */
  async understand(snapshot: ContextSnapshot, rawText: string): Promise<Understanding> {
    const reply = await this.generateReply(snapshot, rawText);
    const fields = await this.extractFields(rawText);
    this.logger.debug(`🧠 Extracted fields: ${Object.keys(fields).join(', ') || 'none'}`);
    return { reply, fields };
  }

  private async generateReply(snapshot: ContextSnapshot, rawText: string): Promise<string> {
    const history: LLMMessage[] = snapshot.history
      .slice(-REPLY_HISTORY_MESSAGES)
      .map((message): LLMMessage => ({ role: message.role, content: message.content }));

    const response = await this.llm.call({
      messages: [
        {
          role: 'system',
          content: SystemPrompts.getSchedulerAssistantPrompt().replace('{{STATE}}', snapshot.state),
        },
        ...history,
        { role: 'user', content: rawText },
      ],
      temperature: REPLY_SETTINGS.temperature,
      maxTokens: REPLY_SETTINGS.maxTokens,
    });

    return response.content?.trim() ?? '';
  }

  private async extractFields(rawText: string): Promise<ExtractedFields> {
    try {
      const response = await this.llm.call({
        messages: [
          { role: 'system', content: SystemPrompts.getExtractionPrompt() },
          { role: 'user', content: prependTimeContext(rawText, this.now(), this.timezone) },
        ],
        temperature: EXTRACTION_SETTINGS.temperature,
        maxTokens: EXTRACTION_SETTINGS.maxTokens,
        jsonResponse: true,
      });
      return parseExtractedFields(response.content, this.timezone);
    } catch (error) {
      this.logger.warn('⚠️ Field extraction failed, continuing without structured fields', error);
      return {};
    }
  }
}
