import path from 'node:path';

export const DEFAULT_AI_ENDPOINT = 'https://api.perplexity.ai/chat/completions';
export const DEFAULT_AI_MODEL = 'sonar-pro';
export const DEFAULT_AI_TIMEOUT_MS = 30_000;
export const DEFAULT_PORT = 8787;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface AppConfig {
  dataFile: string;
  ai: {
    apiKey?: string;
    endpoint: string;
    model: string;
    timeoutMs: number;
  };
  host: string;
  port: number;
  logLevel: LogLevel;
  cors: { enabled: boolean; origin: string | boolean };
}

function isTruthy(v: string | undefined): boolean {
  return v === '1' || v === 'true';
}

export function resolveDataFile(env = process.env): string {
  return env.TODO_DATA_FILE ? path.resolve(env.TODO_DATA_FILE) : path.join(process.cwd(), 'tasks.json');
}

export function resolveApiKey(env = process.env): string | undefined {
  const key = env.PERPLEXITY_API_KEY?.trim();
  return key ? key : undefined;
}

export function getAiTimeoutMs(env = process.env): number {
  const raw = env.TODO_AI_TIMEOUT_MS;
  const ms = raw ? Number(raw) : DEFAULT_AI_TIMEOUT_MS;
  if (!Number.isFinite(ms) || ms <= 0) return DEFAULT_AI_TIMEOUT_MS;
  return ms;
}

export function getLogLevel(env = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === raw) ?? 'info';
}

export function getPort(env = process.env): number {
  const port = env.PORT ? Number(env.PORT) : DEFAULT_PORT;
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT;
}

export function resolveConfig(env = process.env): AppConfig {
  return {
    dataFile: resolveDataFile(env),
    ai: {
      apiKey: resolveApiKey(env),
      endpoint: env.TODO_AI_ENDPOINT ?? DEFAULT_AI_ENDPOINT,
      model: env.TODO_AI_MODEL ?? DEFAULT_AI_MODEL,
      timeoutMs: getAiTimeoutMs(env)
    },
    host: env.HOST ?? '127.0.0.1',
    port: getPort(env),
    logLevel: getLogLevel(env),
    cors: { enabled: isTruthy(env.CORS), origin: env.CORS_ORIGIN ?? true }
  };
}
