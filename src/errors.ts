/** Remote recording could not be fetched. */
export class DownloadError extends Error {
  public readonly name = 'DownloadError';

  constructor(
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(
      status === undefined
        ? `recording download failed: ${url}`
        : `recording download failed ${status}: ${url}`,
      options,
    );
  }
}

export class TranscriptionError extends Error {
  public readonly name = 'TranscriptionError';

  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`transcription error ${status}: ${body}`);
  }
}

export class CompletionError extends Error {
  public readonly name = 'CompletionError';

  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`completion error ${status}: ${body}`);
  }
}

/** Wraps anything that goes wrong while generating or writing reply audio. */
export class SynthesisError extends Error {
  public readonly name = 'SynthesisError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class MissingRecordingError extends Error {
  public readonly name = 'MissingRecordingError';

  constructor(public readonly recordingSid?: string) {
    super('recording callback arrived without RecordingUrl');
  }
}

/** Response bodies can be large HTML pages; keep log lines bounded. */
export function previewBody(body: string, limit = 500): string {
  return body.length > limit ? `${body.slice(0, limit)}...` : body;
}

export async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}
