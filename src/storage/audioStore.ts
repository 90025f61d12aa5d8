import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../log';
import { AudioAsset } from './types';

export const STATIC_ROUTE = '/static';

const SAFE_FILE_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Audio files written under the publicly served static directory. Files are
 * never removed here; each request names its own files with a random token.
 */
export class AudioStore {
  constructor(
    private readonly staticDir: string,
    private readonly hostUrl: string,
  ) {}

  public publicUrlFor(fileName: string): string {
    return `${this.hostUrl.replace(/\/$/, '')}${STATIC_ROUTE}/${fileName}`;
  }

  public async save(fileName: string, data: Buffer): Promise<AudioAsset> {
    if (!SAFE_FILE_NAME.test(fileName) || fileName.includes('..')) {
      throw new Error(`unsafe audio file name: ${fileName}`);
    }

    const localPath = path.join(this.staticDir, fileName);
    await fs.mkdir(this.staticDir, { recursive: true });
    await fs.writeFile(localPath, data);

    log.debug({ event: 'audio_saved', file_name: fileName, bytes: data.length }, 'audio saved');

    return {
      fileName,
      localPath,
      publicUrl: this.publicUrlFor(fileName),
    };
  }
}
