export interface SpeechSynthesizer {
  readonly id: string;
  /** Writes speech for `text` as `fileName` and resolves to its public URL. */
  synthesize(text: string, fileName: string): Promise<string>;
}
