import type { TaskCategory } from './types.js';

export type AiResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'disabled' }
  | { ok: false; reason: 'failed'; message: string };

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface AiClientOptions {
  apiKey?: string;
  endpoint: string;
  model: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

export interface ChatOptions {
  maxTokens: number;
  temperature: number;
}

/** Categories the model may answer with, in match order. */
export const AI_CATEGORIES: TaskCategory[] = ['work', 'personal', 'shopping', 'errands', 'learning', 'other'];

export function titlePrompt(description: string): string {
  return [
    'You are a helpful assistant that suggests short, clear, actionable todo titles.',
    `Task description: ${description}`,
    'Return a 3-6 word title.'
  ].join('\n');
}

export function categoryPrompt(title: string, description: string): string {
  const list = AI_CATEGORIES.join(', ');
  return [
    `You are an assistant that assigns a concise category to a todo item (${list}).`,
    `Title: ${title}`,
    `Description: ${description}`,
    `Only return one of the categories: ${list}.`
  ].join('\n');
}

/** First category (in AI_CATEGORIES order) contained in the reply; `other` if none. */
export function matchCategory(reply: string): TaskCategory {
  const lower = reply.toLowerCase();
  return AI_CATEGORIES.find((c) => lower.includes(c)) ?? 'other';
}

function extractContent(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || !('choices' in data)) return null;
  const choices = data.choices;
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) return null;
  const message = first.message;
  if (typeof message !== 'object' || message === null || !('content' in message)) return null;
  return typeof message.content === 'string' ? message.content : null;
}

function failed(message: string): AiResult<never> {
  return { ok: false, reason: 'failed', message };
}

/**
 * Single-shot chat-completion calls. No retries; every failure comes back as a
 * tagged result instead of a throw.
 */
export class AiAssistClient {
  readonly enabled: boolean;
  readonly model: string;
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(opts: AiClientOptions) {
    this.apiKey = opts.apiKey ?? '';
    this.enabled = this.apiKey !== '';
    this.endpoint = opts.endpoint;
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  async chat(prompt: string, opts: ChatOptions): Promise<AiResult<string>> {
    if (!this.enabled) return { ok: false, reason: 'disabled' };

    let res: Response;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: opts.maxTokens,
          temperature: opts.temperature
        }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        return failed(`request timed out after ${this.timeoutMs}ms`);
      }
      return failed(err instanceof Error ? err.message : String(err));
    }

    if (!res.ok) {
      return failed(`HTTP ${res.status}`);
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch {
      return failed('response was not valid JSON');
    }

    const content = extractContent(data);
    if (content === null) return failed('response had no choices[0].message.content');
    return { ok: true, value: content.trim() };
  }

  async suggestTitle(description: string): Promise<AiResult<string>> {
    const res = await this.chat(titlePrompt(description), { maxTokens: 30, temperature: 0.3 });
    if (!res.ok) return res;
    if (!res.value) return failed('empty response');
    return res;
  }

  async categorize(title: string, description: string): Promise<AiResult<TaskCategory>> {
    const res = await this.chat(categoryPrompt(title, description), { maxTokens: 10, temperature: 0 });
    if (!res.ok) return res;
    return { ok: true, value: matchCategory(res.value) };
  }
}
