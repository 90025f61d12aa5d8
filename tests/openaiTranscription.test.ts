import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, test } from 'node:test';
import { installFetch, jsonResponse, makeTempDir, testConfig } from './testEnv';
import { DownloadError, TranscriptionError } from '../src/errors';
import { AudioStore } from '../src/storage/audioStore';
import { OpenAiTranscriptionProvider } from '../src/stt/providers/openaiTranscription';

let restoreFetch: (() => void) | undefined;

afterEach(() => {
  restoreFetch?.();
  restoreFetch = undefined;
});

async function makeProvider(): Promise<{ provider: OpenAiTranscriptionProvider; dir: string }> {
  const dir = await makeTempDir();
  const config = testConfig({ STATIC_DIR: dir });
  const store = new AudioStore(config.staticDir, config.hostUrl);
  return { provider: new OpenAiTranscriptionProvider(config.openai, store), dir };
}

function audioResponse(bytes: number[]): Response {
  return new Response(new Uint8Array(bytes), {
    status: 200,
    headers: { 'content-type': 'audio/mpeg' },
  });
}

test('downloads the recording, stores it and returns the transcript', async () => {
  const { provider, dir } = await makeProvider();
  const fake = installFetch((request) =>
    request.url === 'https://recordings.test/RE1.mp3'
      ? audioResponse([1, 2, 3])
      : jsonResponse({ text: 'What is the capital of France?' }),
  );
  restoreFetch = fake.restore;

  const text = await provider.transcribe('https://recordings.test/RE1.mp3', 'recording_tok.mp3');

  assert.equal(text, 'What is the capital of France?');
  assert.deepEqual(await readFile(path.join(dir, 'recording_tok.mp3')), Buffer.from([1, 2, 3]));

  assert.equal(fake.calls.length, 2);
  assert.equal(fake.calls[0].method, 'GET');
  const upload = fake.calls[1];
  assert.equal(upload.url, 'https://api.test/v1/audio/transcriptions');
  assert.equal(upload.method, 'POST');
  assert.equal(upload.headers.get('authorization'), 'Bearer test-key');

  assert.ok(upload.body instanceof FormData);
  assert.equal(upload.body.get('model'), 'whisper-1');
  const file = upload.body.get('file');
  assert.ok(file !== null && typeof file !== 'string');
  assert.equal(file.name, 'recording_tok.mp3');
  assert.deepEqual(Buffer.from(await file.arrayBuffer()), Buffer.from([1, 2, 3]));
});

test('returns empty text when the response has no text field', async () => {
  const { provider } = await makeProvider();
  const fake = installFetch((request) =>
    request.method === 'GET' ? audioResponse([9]) : jsonResponse({ language: 'en' }),
  );
  restoreFetch = fake.restore;

  assert.equal(await provider.transcribe('https://recordings.test/RE2', 'recording_a.mp3'), '');
});

test('a failed download raises DownloadError and skips the upload', async () => {
  const { provider } = await makeProvider();
  const fake = installFetch(() => new Response('not found', { status: 404 }));
  restoreFetch = fake.restore;

  await assert.rejects(
    provider.transcribe('https://recordings.test/RE3.mp3', 'recording_b.mp3'),
    (error: unknown) => {
      assert.ok(error instanceof DownloadError);
      assert.equal(error.status, 404);
      assert.equal(error.url, 'https://recordings.test/RE3.mp3');
      return true;
    },
  );
  assert.equal(fake.calls.length, 1);
});

test('a network error during download raises DownloadError', async () => {
  const { provider } = await makeProvider();
  const fake = installFetch(() => {
    throw new TypeError('fetch failed');
  });
  restoreFetch = fake.restore;

  await assert.rejects(
    provider.transcribe('https://recordings.test/RE4.mp3', 'recording_c.mp3'),
    (error: unknown) => error instanceof DownloadError && error.status === undefined,
  );
});

test('a non-success transcription status raises TranscriptionError with status and body', async () => {
  const { provider } = await makeProvider();
  const fake = installFetch((request) =>
    request.method === 'GET' ? audioResponse([7, 7]) : new Response('upstream exploded', { status: 500 }),
  );
  restoreFetch = fake.restore;

  await assert.rejects(
    provider.transcribe('https://recordings.test/RE5.mp3', 'recording_d.mp3'),
    (error: unknown) => {
      assert.ok(error instanceof TranscriptionError);
      assert.equal(error.status, 500);
      assert.equal(error.body, 'upstream exploded');
      return true;
    },
  );
});
