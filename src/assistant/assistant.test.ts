import test from 'node:test';
import assert from 'node:assert/strict';

import type { OpsData } from '../dashboard/stats.js';
import { Assistant } from './assistant.js';
import { cannedResponse } from './cannedResponses.js';
import { createGroqProvider, createOllamaProvider, type InferenceProvider } from './providers.js';

const data: OpsData = { maintenance: [], safety: [], flight: [] };

const answering = (name: string, answer: string | null, prompts: string[] = []): InferenceProvider => ({
  name,
  complete: async ({ prompt }) => {
    prompts.push(prompt);
    return answer;
  },
});

const failing: InferenceProvider = {
  name: 'broken',
  complete: async () => {
    throw new Error('connection refused');
  },
};

test('without providers the canned answer is returned', async () => {
  const assistant = new Assistant({ data: () => data });

  assert.deepEqual(await assistant.ask('What are our safety risks?'), {
    answer: cannedResponse('What are our safety risks?', data),
    source: 'fallback',
  });
});

test('a provider answer wins and receives the question with context', async () => {
  const prompts: string[] = [];
  const assistant = new Assistant({ data: () => data, providers: [answering('stub', 'All good.', prompts)] });

  assert.deepEqual(await assistant.ask('hello'), { answer: 'All good.', source: 'stub' });
  assert.equal(prompts.length, 1);
  assert.ok(prompts[0].startsWith('OPERATIONAL DATA SUMMARY:'));
  assert.ok(prompts[0].endsWith('\n\nQuestion: hello'));
});

test('a failing provider falls through to the next one', async () => {
  const assistant = new Assistant({ data: () => data, providers: [failing, answering('second', 'Backup answer')] });

  assert.deepEqual(await assistant.ask('hello'), { answer: 'Backup answer', source: 'second' });
});

test('blank or null answers fall back to the canned response', async () => {
  const assistant = new Assistant({
    data: () => data,
    providers: [answering('blank', '   '), answering('silent', null)],
  });

  assert.equal((await assistant.ask('cost')).source, 'fallback');
});

test('a provider that hangs is abandoned after the timeout', async () => {
  let aborted = false;
  const hanging: InferenceProvider = {
    name: 'slow',
    complete: (_request, signal) =>
      new Promise<string>((_resolve, reject) => {
        signal.addEventListener('abort', () => {
          aborted = true;
          reject(new Error('aborted'));
        });
      }),
  };
  const assistant = new Assistant({ data: () => data, providers: [hanging], timeoutMs: 20 });

  const result = await assistant.ask('trend');
  assert.equal(result.source, 'fallback');
  assert.equal(aborted, true);
});

test('the groq provider posts a chat completion and reads the first choice', async () => {
  let url = '';
  let authorization: string | null = null;
  let body: unknown;
  const provider = createGroqProvider({
    apiKey: 'test-key',
    model: 'test-model',
    url: 'http://groq.test/chat',
    fetchImpl: async (input, init) => {
      url = String(input);
      authorization = new Headers(init?.headers).get('Authorization');
      body = JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
      return new Response(JSON.stringify({ choices: [{ message: { content: 'hi' } }] }), { status: 200 });
    },
  });

  const answer = await provider.complete({ system: 'sys', prompt: 'question' }, new AbortController().signal);

  assert.equal(answer, 'hi');
  assert.equal(url, 'http://groq.test/chat');
  assert.equal(authorization, 'Bearer test-key');
  assert.deepEqual(body, {
    model: 'test-model',
    messages: [
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'question' },
    ],
    temperature: 0.7,
    max_tokens: 1000,
  });
});

test('the ollama provider returns null on an error status and releases the body', async () => {
  let url = '';
  let cancelled = false;
  const provider = createOllamaProvider({
    url: 'http://ollama.test/',
    model: 'test-model',
    fetchImpl: async input => {
      url = String(input);
      const body = new ReadableStream<Uint8Array>({
        cancel() {
          cancelled = true;
        },
      });
      return new Response(body, { status: 500 });
    },
  });

  assert.equal(await provider.complete({ system: 's', prompt: 'p' }, new AbortController().signal), null);
  assert.equal(url, 'http://ollama.test/api/generate');
  assert.equal(cancelled, true);
});

test('the groq provider releases the body of a failed response', async () => {
  let cancelled = false;
  const provider = createGroqProvider({
    apiKey: 'test-key',
    model: 'test-model',
    fetchImpl: async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          cancel() {
            cancelled = true;
          },
        }),
        { status: 429 },
      ),
  });

  assert.equal(await provider.complete({ system: 's', prompt: 'p' }, new AbortController().signal), null);
  assert.equal(cancelled, true);
});
