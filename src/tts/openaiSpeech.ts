import type { AppConfig } from '../env';
import { SynthesisError, previewBody, readResponseText } from '../errors';
import { fetchWithTimeout } from '../http/fetchWithTimeout';
import { log } from '../log';
import { AudioStore } from '../storage/audioStore';
import type { SpeechSynthesizer } from './types';

/** Reply audio is always spoken in English, whatever language the text arrives in. */
export const SPEECH_LANGUAGE = 'en';
export const SPEECH_INSTRUCTIONS = 'Speak in English with a clear, friendly voice.';

export class OpenAiSpeechSynthesizer implements SpeechSynthesizer {
  public readonly id = 'openai_speech';

  constructor(
    private readonly config: AppConfig['openai'],
    private readonly store: AudioStore,
  ) {}

  public async synthesize(text: string, fileName: string): Promise<string> {
    let audio: Buffer;
    try {
      audio = await this.requestSpeech(text);
    } catch (error) {
      if (error instanceof SynthesisError) {
        throw error;
      }
      throw new SynthesisError('speech request failed', { cause: error });
    }

    try {
      const asset = await this.store.save(fileName, audio);
      return asset.publicUrl;
    } catch (error) {
      throw new SynthesisError(`failed to write ${fileName}`, { cause: error });
    }
  }

  private async requestSpeech(text: string): Promise<Buffer> {
    return fetchWithTimeout(
      `${this.config.baseUrl}/audio/speech`,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.config.ttsModel,
          voice: this.config.ttsVoice,
          input: text,
          instructions: SPEECH_INSTRUCTIONS,
          response_format: 'mp3',
        }),
      },
      this.config.timeoutMs,
      async (response) => {
        if (!response.ok) {
          const body = await readResponseText(response);
          log.error(
            { event: 'speech_http_error', status: response.status, body_preview: previewBody(body) },
            'speech request failed',
          );
          throw new SynthesisError(`speech error ${response.status}: ${previewBody(body)}`);
        }

        const arrayBuffer = await response.arrayBuffer();
        log.debug(
          { event: 'speech_synthesized', bytes: arrayBuffer.byteLength, language: SPEECH_LANGUAGE },
          'speech synthesized',
        );
        return Buffer.from(arrayBuffer);
      },
    );
  }
}
