import { randomUUID } from 'crypto';
import type { ReplyProvider } from '../ai/types';
import { MissingRecordingError } from '../errors';
import { log } from '../log';
import { incRecordingsProcessed, incStageError, startStageTimer } from '../metrics';
import type { TranscriptionProvider } from '../stt/provider';
import type { SpeechSynthesizer } from '../tts/types';
import { buildApology, buildPlayback } from '../twiml/responses';
import type { PipelineStage, RecordingCallback, RecordingOutcome } from './types';

export interface RecordingProcessorDeps {
  transcriber: TranscriptionProvider;
  replier: ReplyProvider;
  synthesizer: SpeechSynthesizer;
  /** Per-request file token; defaults to 32 hex chars of a random UUID. */
  newToken?: () => string;
}

class StageFailure extends Error {
  constructor(
    public readonly stage: PipelineStage,
    public readonly provider: string,
    cause: unknown,
  ) {
    super(`${stage} failed`, { cause });
  }
}

const defaultToken = (): string => randomUUID().replace(/-/g, '');

/**
 * Runs one recording through transcription, completion and synthesis in
 * sequence. Every failure becomes a spoken apology for the stage that failed;
 * nothing from the underlying error reaches the caller.
 */
export class RecordingProcessor {
  private readonly newToken: () => string;

  constructor(private readonly deps: RecordingProcessorDeps) {
    this.newToken = deps.newToken ?? defaultToken;
  }

  public async process(
    callback: RecordingCallback,
    context: { requestId?: string } = {},
  ): Promise<RecordingOutcome> {
    const logContext = {
      request_id: context.requestId,
      recording_sid: callback.recordingSid,
      call_sid: callback.callSid,
    };

    const recordingUrl = callback.recordingUrl?.trim();
    if (!recordingUrl) {
      log.warn({ err: new MissingRecordingError(callback.recordingSid), ...logContext }, 'recording missing');
      incRecordingsProcessed('missing_recording');
      return { status: 'failed', reason: 'missing_recording', twiml: buildApology('missing_recording') };
    }

    log.info(
      { event: 'recording_received', recording_duration: callback.recordingDuration, ...logContext },
      'recording received',
    );

    const token = this.newToken();

    try {
      const transcript = await this.runStage('transcription', this.deps.transcriber.id, () =>
        this.transcribe(recordingUrl, `recording_${token}.mp3`),
      );
      log.info({ event: 'transcript_ready', transcript_chars: transcript.length, ...logContext }, 'transcript ready');

      const reply = await this.runStage('completion', this.deps.replier.id, () => this.deps.replier.reply(transcript));
      log.info({ event: 'reply_ready', reply_chars: reply.length, ...logContext }, 'reply ready');

      const audioUrl = await this.runStage('synthesis', this.deps.synthesizer.id, () =>
        this.deps.synthesizer.synthesize(reply, `response_${token}.mp3`),
      );
      log.info({ event: 'reply_audio_ready', audio_url: audioUrl, ...logContext }, 'reply audio ready');

      incRecordingsProcessed('played');
      return { status: 'played', transcript, reply, audioUrl, twiml: buildPlayback(audioUrl) };
    } catch (error) {
      if (!(error instanceof StageFailure)) {
        throw error;
      }
      log.error(
        { err: error.cause, stage: error.stage, provider: error.provider, ...logContext },
        `${error.stage} stage failed`,
      );
      incRecordingsProcessed(error.stage);
      return {
        status: 'failed',
        reason: error.stage,
        provider: error.provider,
        twiml: buildApology(error.stage),
      };
    }
  }

  // Some recording URLs only serve audio with an explicit extension, others only without.
  private async transcribe(recordingUrl: string, fileName: string): Promise<string> {
    const transcript = await this.deps.transcriber.transcribe(`${recordingUrl}.mp3`, fileName);
    if (transcript.trim()) {
      return transcript;
    }

    log.info({ event: 'transcript_empty_retry' }, 'empty transcript, retrying without extension');
    return this.deps.transcriber.transcribe(recordingUrl, fileName);
  }

  private async runStage<T>(stage: PipelineStage, provider: string, work: () => Promise<T>): Promise<T> {
    const end = startStageTimer(stage);
    try {
      return await work();
    } catch (error) {
      incStageError(stage);
      throw new StageFailure(stage, provider, error);
    } finally {
      end();
    }
  }
}
