/**
 * Speech collaborators backed by OpenAI: transcription for voice turns and
 * text-to-speech for spoken replies.
 */

import OpenAI, { toFile } from 'openai';
import {
  DEFAULT_TRANSCRIPTION_MODEL,
  DEFAULT_TTS_MODEL,
  getOpenAI,
} from '../../config/llm-config.js';
import type { VoiceConfig, VoiceId } from '../../types/index.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { SpeechCollaborator } from '../collaborators.js';

export const AVAILABLE_VOICES: Readonly<Record<VoiceId, string>> = {
  alloy: 'Alloy - Neutral, balanced tone',
  echo: 'Echo - Warm, friendly tone',
  fable: 'Fable - Expressive, storytelling tone',
  onyx: 'Onyx - Deep, authoritative tone',
  nova: 'Nova - Bright, energetic tone',
  shimmer: 'Shimmer - Soft, gentle tone',
};

export interface VoiceServiceOptions {
  transcriptionModel?: string;
  ttsModel?: string;
  logger?: Logger;
}

export class VoiceService implements SpeechCollaborator {
  private readonly transcriptionModel: string;
  private readonly ttsModel: string;
  private readonly logger: Logger;

  constructor(private readonly client: OpenAI = getOpenAI(), options: VoiceServiceOptions = {}) {
    this.transcriptionModel = options.transcriptionModel ?? DEFAULT_TRANSCRIPTION_MODEL;
    this.ttsModel = options.ttsModel ?? DEFAULT_TTS_MODEL;
    this.logger = options.logger ?? defaultLogger;
  }

  async speechToText(audio: Buffer): Promise<string> {
    if (audio.length === 0) return '';

    try {
      const file = await toFile(audio, 'audio.webm');
      const transcription = await this.client.audio.transcriptions.create({
        file,
        model: this.transcriptionModel,
      });
      this.logger.info('🎙️ Audio transcribed successfully');
      return transcription.text.trim();
    } catch (error) {
      this.logger.error('Error transcribing audio:', error);
      throw error;
    }
  }

  async textToSpeech(text: string, voice: VoiceConfig): Promise<Buffer> {
    try {
      const response = await this.client.audio.speech.create({
        model: this.ttsModel,
        voice: voice.voiceId,
        input: text,
        speed: voice.speed,
      });
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      this.logger.error('Error in text-to-speech:', error);
      throw error;
    }
  }
}
