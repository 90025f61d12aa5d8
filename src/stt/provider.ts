export interface TranscriptionProvider {
  readonly id: string;
  /** Downloads the audio at `audioUrl`, keeps it as `fileName`, returns the transcript. */
  transcribe(audioUrl: string, fileName: string): Promise<string>;
}
