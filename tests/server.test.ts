/**
 * HTTP surface tests against an ephemeral port.
 */

import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DialogueStateMachine } from '../src/conversation/DialogueStateMachine.js';
import { SchedulingAssistant } from '../src/conversation/SchedulingAssistant.js';
import { createApp } from '../src/server.js';
import type { AvailabilityCollaborator, UnderstandingCollaborator } from '../src/services/collaborators.js';
import { SessionRegistry } from '../src/services/session/SessionRegistry.js';
import { ConversationState, type Understanding } from '../src/types/index.js';
import { silentLogger } from '../src/utils/logger.js';

describe('server', () => {
  let server: Server;
  let baseUrl: string;
  let registry: SessionRegistry;

  beforeEach(async () => {
    registry = new SessionRegistry({ logger: silentLogger });

    const availability = {
      findSlots: vi.fn(async () => []),
      createEvent: vi.fn(async () => null),
    } satisfies AvailabilityCollaborator;
    const understanding = {
      understand: vi.fn(async (): Promise<Understanding> => ({ reply: 'How long should it be?', fields: {} })),
    } satisfies UnderstandingCollaborator;

    const assistant = new SchedulingAssistant({
      registry,
      stateMachine: new DialogueStateMachine({
        availability,
        workingHours: { timezone: 'UTC', startHour: 9, endHour: 17, workingDays: [1, 2, 3, 4, 5] },
        logger: silentLogger,
      }),
      understanding,
      voice: { voiceId: 'alloy', speed: 1 },
      logger: silentLogger,
    });

    const app = createApp({ assistant, registry });
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  const postJson = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', sessions: 0 });
  });

  it('runs a text turn', async () => {
    const res = await postJson('/message', { sessionId: 'session-1', message: 'I need a meeting' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      response: 'How long should it be?',
      conversationState: ConversationState.COLLECTING_DURATION,
      requiresClarification: true,
    });
    expect(registry.get('session-1')?.state).toBe(ConversationState.COLLECTING_DURATION);
  });

  it('rejects a body without message or audio', async () => {
    const res = await postJson('/message', { sessionId: 'session-1' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Either message or audioData is required' });
  });

  it('returns and clears a session context', async () => {
    await postJson('/message', { sessionId: 'session-1', message: 'hello' });

    const context = await fetch(`${baseUrl}/message/context/session-1`);
    expect(context.status).toBe(200);
    expect(await context.json()).toMatchObject({
      sessionId: 'session-1',
      state: ConversationState.COLLECTING_DURATION,
    });

    const cleared = await fetch(`${baseUrl}/message/context/session-1`, { method: 'DELETE' });
    expect(await cleared.json()).toEqual({ message: 'Conversation context cleared successfully' });
    expect(registry.has('session-1')).toBe(false);
  });

  it('answers 404 for unknown sessions', async () => {
    const context = await fetch(`${baseUrl}/message/context/missing`);
    expect(context.status).toBe(404);
    expect(await context.json()).toEqual({ success: false, error: 'Session not found' });

    const cleared = await fetch(`${baseUrl}/message/context/missing`, { method: 'DELETE' });
    expect(cleared.status).toBe(404);
  });

  it('lists the available voices', async () => {
    const res = await fetch(`${baseUrl}/voice/voices`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ voices: { alloy: 'Alloy - Neutral, balanced tone', nova: 'Nova - Bright, energetic tone' } });
  });

  it('opens a session', async () => {
    const res = await postJson('/session', { name: 'Planning' });
    const body: unknown = await res.json();

    expect(res.status).toBe(201);
    expect(body).toMatchObject({ name: 'Planning', description: '', status: 'active' });
    const id = typeof body === 'object' && body !== null && 'id' in body ? body.id : undefined;
    expect(typeof id === 'string' && registry.has(id)).toBe(true);
  });
});
