import { z } from 'zod';

export type CompletionRequest = {
  system: string;
  prompt: string;
};

/**
 * Optional text-generation backend. Returns null when it has nothing to say;
 * may throw. Callers always keep a deterministic fallback.
 */
export interface InferenceProvider {
  readonly name: string;
  complete(request: CompletionRequest, signal: AbortSignal): Promise<string | null>;
}

type FetchLike = typeof fetch;

const groqResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1),
});

const ollamaResponseSchema = z.object({ response: z.string() });

export const GROQ_CHAT_URL = 'https://api.groq.com/openai/v1/chat/completions';

export function createGroqProvider(options: {
  apiKey: string;
  model: string;
  url?: string;
  fetchImpl?: FetchLike;
}): InferenceProvider {
  const doFetch = options.fetchImpl ?? fetch;
  return {
    name: 'groq',
    async complete({ system, prompt }, signal) {
      const response = await doFetch(options.url ?? GROQ_CHAT_URL, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: options.model,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: prompt },
          ],
          temperature: 0.7,
          max_tokens: 1000,
        }),
        signal,
      });
      if (!response.ok) {
        await response.body?.cancel();
        return null;
      }
      const parsed = groqResponseSchema.safeParse(await response.json());
      return parsed.success ? parsed.data.choices[0].message.content : null;
    },
  };
}

export function createOllamaProvider(options: { url: string; model: string; fetchImpl?: FetchLike }): InferenceProvider {
  const doFetch = options.fetchImpl ?? fetch;
  return {
    name: 'ollama',
    async complete({ system, prompt }, signal) {
      const response = await doFetch(`${options.url.replace(/\/$/, '')}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: options.model,
          prompt: `${system}\n\n${prompt}\n\nAnswer:`,
          stream: false,
        }),
        signal,
      });
      if (!response.ok) {
        await response.body?.cancel();
        return null;
      }
      const parsed = ollamaResponseSchema.safeParse(await response.json());
      return parsed.success ? parsed.data.response : null;
    },
  };
}
