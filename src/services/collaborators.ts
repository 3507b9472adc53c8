/**
 * Collaborator contracts consumed by the conversation core, plus the
 * timeout boundary every call goes through.
 */

import type {
  CollaboratorResult,
  ContextSnapshot,
  CreatedEvent,
  MeetingRequest,
  ReferenceEvent,
  TimeSlot,
  Understanding,
  VoiceConfig,
  WorkingHoursConfig,
} from '../types/index.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export interface UnderstandingCollaborator {
  understand(snapshot: ContextSnapshot, rawText: string): Promise<Understanding>;
}

export interface AvailabilityCollaborator {
  findSlots(
    windowStart: Date,
    windowEnd: Date,
    durationMinutes: number,
    workingHours: WorkingHoursConfig
  ): Promise<TimeSlot[]>;
  /** Resolves to null when the event could not be created. */
  createEvent(request: MeetingRequest, title: string): Promise<CreatedEvent | null>;
  listEvents?(windowStart: Date, windowEnd: Date): Promise<ReferenceEvent[]>;
}

export interface SpeechCollaborator {
  /** Empty string means nothing usable was heard. */
  speechToText(audio: Buffer): Promise<string>;
  textToSpeech(text: string, voice: VoiceConfig): Promise<Buffer>;
}

export class CollaboratorTimeoutError extends Error {
  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'CollaboratorTimeoutError';
  }
}

/**
 * Await `fn` with a hard timeout. Throws and timeouts come back as
 * `{ success: false }` and are logged here; callers map them to user text.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: () => Promise<T>,
  logger: Logger = defaultLogger
): Promise<CollaboratorResult<T>> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CollaboratorTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    const data = await Promise.race([fn(), timeout]);
    return { success: true, data };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof CollaboratorTimeoutError) {
      logger.warn(`⏱️ ${message}`);
      return { success: false, error: message, timedOut: true };
    }
    logger.error(`❌ ${label} failed: ${message}`, error);
    return { success: false, error: message };
  } finally {
    if (timer) clearTimeout(timer);
  }
}
