import assert from 'node:assert/strict';
import { afterEach, test } from 'node:test';
import { installFetch, jsonResponse, testConfig } from './testEnv';
import { ChatCompletionClient, buildConversation } from '../src/ai/completionClient';
import { CompletionError } from '../src/errors';

let restoreFetch: (() => void) | undefined;

afterEach(() => {
  restoreFetch?.();
  restoreFetch = undefined;
});

test('buildConversation pairs the system prompt with the transcript', () => {
  assert.deepEqual(buildConversation('Be brief.', 'Hi there'), [
    { role: 'system', content: 'Be brief.' },
    { role: 'user', content: 'Hi there' },
  ]);
});

test('reply posts the conversation and returns the trimmed first choice', async () => {
  const client = new ChatCompletionClient(testConfig().openai);
  const fake = installFetch(() =>
    jsonResponse({
      choices: [{ message: { role: 'assistant', content: '  Paris.\n' } }, { message: { content: 'Lyon.' } }],
    }),
  );
  restoreFetch = fake.restore;

  const reply = await client.reply('What is the capital of France?');

  assert.equal(reply, 'Paris.');
  assert.equal(fake.calls.length, 1);
  const call = fake.calls[0];
  assert.equal(call.url, 'https://api.test/v1/chat/completions');
  assert.equal(call.method, 'POST');
  assert.equal(call.headers.get('authorization'), 'Bearer test-key');
  assert.equal(call.headers.get('content-type'), 'application/json');
  assert.equal(typeof call.body, 'string');
  assert.deepEqual(JSON.parse(String(call.body)), {
    model: 'gpt-3.5-turbo',
    messages: [
      { role: 'system', content: 'You are a helpful assistant answering callers briefly.' },
      { role: 'user', content: 'What is the capital of France?' },
    ],
    max_tokens: 250,
  });
});

test('reply sends an empty transcript as-is', async () => {
  const client = new ChatCompletionClient(testConfig().openai);
  const fake = installFetch(() => jsonResponse({ choices: [{ message: { content: 'Could you repeat that?' } }] }));
  restoreFetch = fake.restore;

  assert.equal(await client.reply(''), 'Could you repeat that?');
  const body = JSON.parse(String(fake.calls[0].body)) as { messages: Array<{ content: string }> };
  assert.equal(body.messages[1].content, '');
});

test('a non-success status raises CompletionError with status and body', async () => {
  const client = new ChatCompletionClient(testConfig().openai);
  const fake = installFetch(() => new Response('rate limited', { status: 429 }));
  restoreFetch = fake.restore;

  await assert.rejects(client.reply('hello'), (error: unknown) => {
    assert.ok(error instanceof CompletionError);
    assert.equal(error.status, 429);
    assert.equal(error.body, 'rate limited');
    return true;
  });
});

test('a response without choices raises CompletionError', async () => {
  const client = new ChatCompletionClient(testConfig().openai);
  const fake = installFetch(() => jsonResponse({ choices: [] }));
  restoreFetch = fake.restore;

  await assert.rejects(client.reply('hello'), (error: unknown) => {
    assert.ok(error instanceof CompletionError);
    assert.equal(error.status, 200);
    assert.equal(error.body, 'missing choice content');
    return true;
  });
});
