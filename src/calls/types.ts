/** Recording Reference posted by the provider once the caller finishes speaking. */
export interface RecordingCallback {
  recordingUrl?: string;
  recordingDuration?: string;
  recordingSid?: string;
  callSid?: string;
}

export type PipelineStage = 'transcription' | 'completion' | 'synthesis';

export type RecordingOutcome =
  | {
      status: 'played';
      transcript: string;
      reply: string;
      audioUrl: string;
      twiml: string;
    }
  | {
      status: 'failed';
      reason: 'missing_recording' | PipelineStage;
      /** id of the client whose call failed; absent for a missing recording. */
      provider?: string;
      twiml: string;
    };
