import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';
import { makeTempDir } from './testEnv';
import { AudioStore } from '../src/storage/audioStore';

test('save writes the file and returns its public URL', async () => {
  const dir = path.join(await makeTempDir(), 'nested', 'static');
  const store = new AudioStore(dir, 'http://host.test');

  const asset = await store.save('response_abc123.mp3', Buffer.from([0x49, 0x44, 0x33]));

  assert.deepEqual(asset, {
    fileName: 'response_abc123.mp3',
    localPath: path.join(dir, 'response_abc123.mp3'),
    publicUrl: 'http://host.test/static/response_abc123.mp3',
  });
  assert.deepEqual(await readFile(asset.localPath), Buffer.from([0x49, 0x44, 0x33]));
});

test('publicUrlFor joins host, static route and file name', () => {
  const store = new AudioStore('/unused', 'https://bridge.example.com/');

  assert.equal(
    store.publicUrlFor('response_1.mp3'),
    'https://bridge.example.com/static/response_1.mp3',
  );
});

test('save rejects names that escape the static directory', async () => {
  const store = new AudioStore(await makeTempDir(), 'http://host.test');

  await assert.rejects(store.save('../escape.mp3', Buffer.from([1])), /unsafe audio file name: \.\.\/escape\.mp3/);
  await assert.rejects(store.save('a/b.mp3', Buffer.from([1])), /unsafe audio file name/);
});
