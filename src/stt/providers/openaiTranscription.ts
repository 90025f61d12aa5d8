import type { AppConfig } from '../../env';
import { DownloadError, TranscriptionError, previewBody, readResponseText } from '../../errors';
import { fetchWithTimeout } from '../../http/fetchWithTimeout';
import { log } from '../../log';
import { AudioStore } from '../../storage/audioStore';
import type { TranscriptionProvider } from '../provider';

export class OpenAiTranscriptionProvider implements TranscriptionProvider {
  public readonly id = 'openai_transcription';

  constructor(
    private readonly config: AppConfig['openai'],
    private readonly store: AudioStore,
  ) {}

  public async transcribe(audioUrl: string, fileName: string): Promise<string> {
    const audio = await this.download(audioUrl);
    const asset = await this.store.save(fileName, audio);

    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(audio)], { type: 'audio/mpeg' }), asset.fileName);
    form.append('model', this.config.transcriptionModel);

    return fetchWithTimeout(
      `${this.config.baseUrl}/audio/transcriptions`,
      {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        body: form,
      },
      this.config.timeoutMs,
      async (response) => {
        if (!response.ok) {
          const body = await readResponseText(response);
          log.error(
            { event: 'transcription_http_error', status: response.status, body_preview: previewBody(body) },
            'transcription request failed',
          );
          throw new TranscriptionError(response.status, body);
        }

        const data = (await response.json()) as { text?: unknown };
        return typeof data.text === 'string' ? data.text : '';
      },
    );
  }

  private async download(audioUrl: string): Promise<Buffer> {
    try {
      return await fetchWithTimeout(audioUrl, { method: 'GET' }, this.config.timeoutMs, async (response) => {
        if (!response.ok) {
          throw new DownloadError(audioUrl, response.status);
        }

        const arrayBuffer = await response.arrayBuffer();
        log.info(
          {
            event: 'recording_downloaded',
            bytes: arrayBuffer.byteLength,
            content_type: response.headers.get('content-type'),
          },
          'recording downloaded',
        );
        return Buffer.from(arrayBuffer);
      });
    } catch (error) {
      if (error instanceof DownloadError) {
        throw error;
      }
      throw new DownloadError(audioUrl, undefined, { cause: error });
    }
  }
}
