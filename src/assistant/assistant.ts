import type { OpsData } from '../dashboard/stats.js';
import { errorMessage } from '../store/errors.js';
import { cannedResponse } from './cannedResponses.js';
import { buildContext } from './context.js';
import type { InferenceProvider } from './providers.js';

export const SYSTEM_PROMPT =
  'You are an expert airline operations assistant. Analyze fleet data and give strategic insights, ' +
  'risk assessments and actionable recommendations. Be specific with numbers and timelines. ' +
  'Focus on cost reduction, efficiency improvements and safety.';

export type AssistantAnswer = {
  answer: string;
  source: string;
};

export type AssistantOptions = {
  data: () => OpsData;
  providers?: InferenceProvider[];
  timeoutMs?: number;
};

class TimeoutError extends Error {
  constructor(ms: number) {
    super(`timed out after ${ms}ms`);
  }
}

async function withTimeout<T>(ms: number, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(ms));
    }, ms);
  });
  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Answers operations questions. Each provider gets one bounded attempt; when
 * none answers, the canned response built from the current statistics is used.
 * `ask` never rejects.
 */
export class Assistant {
  private readonly data: () => OpsData;
  private readonly providers: InferenceProvider[];
  private readonly timeoutMs: number;

  constructor(options: AssistantOptions) {
    this.data = options.data;
    this.providers = options.providers ?? [];
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async ask(query: string): Promise<AssistantAnswer> {
    const data = this.data();
    const prompt = `${buildContext(data)}\n\nQuestion: ${query}`;

    for (const provider of this.providers) {
      try {
        const answer = await withTimeout(this.timeoutMs, signal =>
          provider.complete({ system: SYSTEM_PROMPT, prompt }, signal),
        );
        if (answer && answer.trim()) return { answer, source: provider.name };
      } catch (error) {
        console.error(`[assistant] ${provider.name} unavailable: ${errorMessage(error)}`);
      }
    }

    return { answer: cannedResponse(query, data), source: 'fallback' };
  }
}
