/**
 * SchedulingAssistant Tests
 *
 * Full turns through the registry, the state machine and scripted
 * collaborators.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DialogueStateMachine } from '../../src/conversation/DialogueStateMachine.js';
import { SchedulingAssistant } from '../../src/conversation/SchedulingAssistant.js';
import type {
  AvailabilityCollaborator,
  SpeechCollaborator,
  UnderstandingCollaborator,
} from '../../src/services/collaborators.js';
import { SessionRegistry } from '../../src/services/session/SessionRegistry.js';
import {
  ConversationState,
  type ContextSnapshot,
  type CreatedEvent,
  type MeetingRequest,
  type TimeSlot,
  type Understanding,
  type VoiceConfig,
} from '../../src/types/index.js';
import { silentLogger } from '../../src/utils/logger.js';

const now = new Date(2026, 5, 16, 10, 0);
const voice: VoiceConfig = { voiceId: 'alloy', speed: 1 };

const slots: TimeSlot[] = [9, 10, 11, 13].map(hour => ({
  start: new Date(2026, 5, 17, hour, 0),
  end: new Date(2026, 5, 17, hour, 30),
  isAvailable: true,
}));

function createUnderstanding(script: Understanding[] = []) {
  const queue = [...script];
  return {
    understand: vi.fn(
      async (_snapshot: ContextSnapshot, _rawText: string): Promise<Understanding> =>
        queue.shift() ?? { reply: '', fields: {} }
    ),
  } satisfies UnderstandingCollaborator;
}

function createAvailability() {
  return {
    findSlots: vi.fn(async (): Promise<TimeSlot[]> => slots),
    createEvent: vi.fn(
      async (request: MeetingRequest, title: string): Promise<CreatedEvent | null> => ({
        id: 'evt-1',
        title,
        start: request.specificTime ?? now,
        end: request.specificTime ?? now,
      })
    ),
  } satisfies AvailabilityCollaborator;
}

function createSpeech(transcript: string) {
  return {
    speechToText: vi.fn(async (_audio: Buffer) => transcript),
    textToSpeech: vi.fn(async (_text: string, _voice: VoiceConfig) => Buffer.from('audio')),
  } satisfies SpeechCollaborator;
}

describe('SchedulingAssistant', () => {
  let registry: SessionRegistry;
  let availability: ReturnType<typeof createAvailability>;

  function build(
    understanding: UnderstandingCollaborator,
    speech?: SpeechCollaborator,
    timeoutMs: number = 50
  ): SchedulingAssistant {
    const stateMachine = new DialogueStateMachine({
      availability,
      workingHours: { timezone: 'UTC', startHour: 9, endHour: 17, workingDays: [1, 2, 3, 4, 5] },
      logger: silentLogger,
      now: () => now,
    });
    return new SchedulingAssistant({
      registry,
      stateMachine,
      understanding,
      speech,
      voice,
      timeoutMs,
      logger: silentLogger,
    });
  }

  beforeEach(() => {
    registry = new SessionRegistry({ logger: silentLogger });
    availability = createAvailability();
  });

  it('walks a conversation from greeting to a booked meeting', async () => {
    const understanding = createUnderstanding([
      { reply: 'Sure! When would you like to meet?', fields: { durationMinutes: 30, title: 'Roadmap sync' } },
      { reply: 'Let me look at the calendar.', fields: {} },
    ]);
    const assistant = build(understanding);
    const send = (message: string) => assistant.handleMessage({ sessionId: 'chat-1', message });

    expect((await send('I need a 30 minute roadmap sync')).conversationState).toBe(
      ConversationState.COLLECTING_TIME_PREFERENCE
    );
    expect((await send('tomorrow at 9:00 am')).conversationState).toBe(ConversationState.CHECKING_AVAILABILITY);

    const options = await send('great');
    expect(options.conversationState).toBe(ConversationState.CONFIRMING_SLOT);
    expect(options.suggestedActions).toEqual(['Option 1', 'Option 2', 'Option 3']);

    expect((await send('Option 2')).conversationState).toBe(ConversationState.SCHEDULING);

    const done = await send('yes please');
    expect(done.conversationState).toBe(ConversationState.COMPLETED);
    expect(done.requiresClarification).toBe(false);
    expect(availability.createEvent).toHaveBeenCalledWith(
      expect.objectContaining({ durationMinutes: 30, specificTime: new Date(2026, 5, 17, 10, 0) }),
      'Roadmap sync'
    );

    const snapshot = assistant.getContext('chat-1');
    expect(snapshot?.history).toHaveLength(10);
    expect(snapshot?.history[0]).toMatchObject({ role: 'user', content: 'I need a 30 minute roadmap sync' });
    expect(snapshot?.history[1]).toMatchObject({ role: 'assistant', content: 'Sure! When would you like to meet?' });
  });

  it('passes the current state and history to the understanding step', async () => {
    const understanding = createUnderstanding([{ reply: 'How long?', fields: {} }]);
    const assistant = build(understanding);

    await assistant.handleMessage({ sessionId: 'chat-2', message: 'hello' });
    await assistant.handleMessage({ sessionId: 'chat-2', message: 'an hour' });

    const [snapshot, rawText] = understanding.understand.mock.calls[1];
    expect(rawText).toBe('an hour');
    expect(snapshot.state).toBe(ConversationState.COLLECTING_DURATION);
    expect(snapshot.history.map(message => message.content)).toEqual(['hello', 'How long?']);
  });

  it('does not consult the language model once the session is finished', async () => {
    const understanding = createUnderstanding();
    const assistant = build(understanding);
    registry.getOrCreate('chat-3').state = ConversationState.COMPLETED;

    const response = await assistant.handleMessage({ sessionId: 'chat-3', message: 'book another' });

    expect(response.conversationState).toBe(ConversationState.COMPLETED);
    expect(understanding.understand).not.toHaveBeenCalled();
  });

  it('recovers from an understanding failure', async () => {
    const understanding = createUnderstanding();
    understanding.understand.mockRejectedValueOnce(new Error('rate limited'));
    const assistant = build(understanding);

    const response = await assistant.handleMessage({ sessionId: 'chat-4', message: 'hello' });

    expect(response).toEqual({
      response: "Sorry, I'm having trouble understanding right now. Could you say that again?",
      conversationState: ConversationState.INITIAL,
      suggestedActions: undefined,
      requiresClarification: true,
    });
  });

  it('treats an empty text message as not caught', async () => {
    const understanding = createUnderstanding();
    const assistant = build(understanding);

    const response = await assistant.handleMessage({ sessionId: 'chat-5', message: '   ' });

    expect(response.response).toBe("I didn't catch that. Could you please try again?");
    expect(understanding.understand).not.toHaveBeenCalled();
  });

  describe('voice turns', () => {
    it('transcribes, processes and speaks the reply', async () => {
      const understanding = createUnderstanding([{ reply: 'When works?', fields: { durationMinutes: 45 } }]);
      const speech = createSpeech('forty five minutes please');
      const assistant = build(understanding, speech);

      const response = await assistant.handleMessage({
        sessionId: 'voice-1',
        audio: Buffer.from('fake-webm'),
        isVoice: true,
      });

      expect(understanding.understand.mock.calls[0][1]).toBe('forty five minutes please');
      expect(speech.textToSpeech).toHaveBeenCalledWith('When works?', voice);
      expect(response.audioResponse).toBe(Buffer.from('audio').toString('base64'));
      expect(response.conversationState).toBe(ConversationState.COLLECTING_TIME_PREFERENCE);
    });

    it('leaves state alone when nothing was heard', async () => {
      const understanding = createUnderstanding();
      const speech = createSpeech('');
      const assistant = build(understanding, speech);
      const context = registry.getOrCreate('voice-2');
      context.state = ConversationState.COLLECTING_DURATION;

      const response = await assistant.handleMessage({
        sessionId: 'voice-2',
        audio: Buffer.from('static'),
        isVoice: true,
      });

      expect(response.response).toBe("I didn't catch that. Could you please try again?");
      expect(response.conversationState).toBe(ConversationState.COLLECTING_DURATION);
      expect(response.requiresClarification).toBe(true);
      expect(context.history.size).toBe(0);
      expect(understanding.understand).not.toHaveBeenCalled();
    });

    it('treats a transcription failure like silence', async () => {
      const speech = createSpeech('ignored');
      speech.speechToText.mockRejectedValueOnce(new Error('bad audio'));
      const assistant = build(createUnderstanding(), speech);

      const response = await assistant.handleMessage({ sessionId: 'voice-3', audio: Buffer.from('x'), isVoice: true });

      expect(response.response).toBe("I didn't catch that. Could you please try again?");
      expect(response.conversationState).toBe(ConversationState.INITIAL);
    });

    it('falls back to text when speech synthesis fails', async () => {
      const speech = createSpeech('an hour');
      speech.textToSpeech.mockRejectedValueOnce(new Error('tts down'));
      const assistant = build(createUnderstanding([{ reply: 'Noted.', fields: { durationMinutes: 60 } }]), speech);

      const response = await assistant.handleMessage({ sessionId: 'voice-4', audio: Buffer.from('x'), isVoice: true });

      expect(response.response).toBe('Noted.');
      expect(response.audioResponse).toBeUndefined();
    });
  });

  describe('sessions', () => {
    it('serializes turns for the same session', async () => {
      let resolveFirst: (value: Understanding) => void = () => {};
      const understanding = createUnderstanding();
      understanding.understand.mockImplementationOnce(
        () => new Promise<Understanding>(resolve => (resolveFirst = resolve))
      );
      const assistant = build(understanding, undefined, 5000);

      const first = assistant.handleMessage({ sessionId: 'chat-6', message: 'first' });
      const second = assistant.handleMessage({ sessionId: 'chat-6', message: 'second' });

      await vi.waitFor(() => expect(understanding.understand).toHaveBeenCalledTimes(1));
      resolveFirst({ reply: 'First reply', fields: {} });
      await Promise.all([first, second]);

      const secondSnapshot = understanding.understand.mock.calls[1][0];
      expect(secondSnapshot.history.map(message => message.content)).toEqual(['first', 'First reply']);
    });

    it('does not block other sessions', async () => {
      const understanding = createUnderstanding();
      understanding.understand.mockImplementationOnce(() => new Promise<Understanding>(() => {}));
      const assistant = build(understanding);

      const stuck = assistant.handleMessage({ sessionId: 'slow', message: 'hello' });
      const other = await assistant.handleMessage({ sessionId: 'fast', message: 'hello' });

      expect(other.conversationState).toBe(ConversationState.COLLECTING_DURATION);
      // the stuck call is released by the 50ms collaborator timeout
      expect((await stuck).requiresClarification).toBe(true);
    });

    it('clears a session', async () => {
      const assistant = build(createUnderstanding());
      await assistant.handleMessage({ sessionId: 'chat-7', message: 'hello' });

      expect(assistant.clearContext('chat-7')).toBe(true);
      expect(assistant.getContext('chat-7')).toBeUndefined();
      expect(assistant.clearContext('chat-7')).toBe(false);
    });
  });
});
