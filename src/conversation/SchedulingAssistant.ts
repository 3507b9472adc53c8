/**
 * SchedulingAssistant - entry point for a single user turn
 *
 * 1. Take the session lock
 * 2. Transcribe voice input
 * 3. Ask the understanding collaborator for a reply and fields
 * 4. Let the state machine decide the next state
 * 5. Record both sides of the turn in the bounded history
 * 6. Synthesize speech for voice turns
 */

import {
  withTimeout,
  type SpeechCollaborator,
  type UnderstandingCollaborator,
} from '../services/collaborators.js';
import { toSnapshot, type SessionRegistry } from '../services/session/SessionRegistry.js';
import {
  TERMINAL_STATES,
  type CollaboratorResult,
  type ContextSnapshot,
  type ConversationContext,
  type MessageInput,
  type MessageResponse,
  type Understanding,
  type VoiceConfig,
} from '../types/index.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { DialogueStateMachine } from './DialogueStateMachine.js';
import { ResponseComposer } from './ResponseComposer.js';

export interface SchedulingAssistantOptions {
  registry: SessionRegistry;
  stateMachine: DialogueStateMachine;
  understanding: UnderstandingCollaborator;
  /** Only needed for voice turns */
  speech?: SpeechCollaborator;
  voice: VoiceConfig;
  composer?: ResponseComposer;
  timeoutMs?: number;
  logger?: Logger;
}

export class SchedulingAssistant {
  private readonly registry: SessionRegistry;
  private readonly stateMachine: DialogueStateMachine;
  private readonly understanding: UnderstandingCollaborator;
  private readonly speech?: SpeechCollaborator;
  private readonly voice: VoiceConfig;
  private readonly composer: ResponseComposer;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SchedulingAssistantOptions) {
    this.registry = options.registry;
    this.stateMachine = options.stateMachine;
    this.understanding = options.understanding;
    this.speech = options.speech;
    this.voice = options.voice;
    this.composer = options.composer ?? new ResponseComposer();
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.logger = options.logger ?? defaultLogger;
  }

  async handleMessage(input: MessageInput): Promise<MessageResponse> {
    return this.registry.runExclusive(input.sessionId, async context => {
      this.logger.info(`📨 Turn for ${input.sessionId} in state ${context.state}${input.isVoice ? ' (voice)' : ''}`);

      const rawText = await this.readInput(input);
      if (!rawText) {
        return this.respond(input, {
          response: this.composer.didNotCatch(),
          conversationState: context.state,
          requiresClarification: true,
        });
      }

      const understanding = await this.understand(context, rawText);
      const outcome = await this.stateMachine.processTurn(context, rawText, understanding);

      context.history.add('user', rawText);
      context.history.add('assistant', outcome.response);

      return this.respond(input, {
        response: outcome.response,
        conversationState: context.state,
        suggestedActions: outcome.suggestedActions,
        requiresClarification: outcome.requiresClarification,
      });
    });
  }

  getContext(sessionId: string): ContextSnapshot | undefined {
    return this.registry.snapshot(sessionId);
  }

  clearContext(sessionId: string): boolean {
    return this.registry.delete(sessionId);
  }

  private async readInput(input: MessageInput): Promise<string> {
    if (!input.isVoice || !input.audio) {
      return (input.message ?? '').trim();
    }

    const speech = this.speech;
    if (!speech) {
      this.logger.warn('🎙️ Voice turn received but no speech collaborator is configured');
      return '';
    }

    const audio = input.audio;
    const result = await withTimeout('speechToText', this.timeoutMs, () => speech.speechToText(audio), this.logger);
    return result.success ? result.data.trim() : '';
  }

  /** Terminal states do not need the language model. */
  private async understand(context: ConversationContext, rawText: string): Promise<CollaboratorResult<Understanding>> {
    if (TERMINAL_STATES.has(context.state)) {
      return { success: true, data: { reply: '', fields: {} } };
    }
    const snapshot = toSnapshot(context);
    return withTimeout('understand', this.timeoutMs, () => this.understanding.understand(snapshot, rawText), this.logger);
  }

  private async respond(input: MessageInput, response: MessageResponse): Promise<MessageResponse> {
    if (!input.isVoice) return response;

    const speech = this.speech;
    if (!speech) return response;

    const result = await withTimeout(
      'textToSpeech',
      this.timeoutMs,
      () => speech.textToSpeech(response.response, this.voice),
      this.logger
    );
    if (!result.success) {
      this.logger.warn('🔇 Falling back to a text-only reply');
      return response;
    }
    return { ...response, audioResponse: result.data.toString('base64') };
  }
}
