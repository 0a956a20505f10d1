import fs from 'fs';
import path from 'path';

const LOG_DIR = path.resolve(process.env.LOG_DIR || path.join(process.cwd(), 'logs'));

const LOG_FILE = path.join(LOG_DIR, 'llm-api.log');
const DEBUG_LOG_FILE = path.join(LOG_DIR, 'llm-debug.jsonl');

const CALL_LOG_ENABLED = process.env.NODE_ENV !== 'test' && process.env.LLM_CALL_LOG !== '0';

const DEBUG_ENABLED =
  process.env.LLM_DEBUG_LOG === '1' ||
  (process.env.NODE_ENV !== 'production' &&
    process.env.NODE_ENV !== 'test' &&
    process.env.LLM_DEBUG_LOG !== '0');

const MAX_DEBUG_FIELD_CHARS = parseInt(process.env.LLM_DEBUG_MAX_CHARS || '200000', 10);

export interface LLMCallLog {
  timestamp: string;
  model: string;
  prompt: string;
  response: string;
  responseTimeMs: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  error?: string;
}

export type LLMDebugPhase = 'request' | 'response' | 'error';

export interface LLMDebugLog {
  timestamp: string;
  callId: string;
  phase: LLMDebugPhase;
  model: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutSeconds?: number;

  messages?: unknown;
  messagesJson?: string;
  response?: string;

  responseTimeMs?: number;
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;

  error?: string;
  stack?: string;

  truncated?: {
    messages?: boolean;
    response?: boolean;
  };
}

let logDirReady = false;

function appendLine(file: string, line: string): void {
  if (!logDirReady) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
    logDirReady = true;
  }
  fs.appendFileSync(file, line + '\n', 'utf8');
}

export function logLLMCall(log: LLMCallLog): void {
  if (!CALL_LOG_ENABLED) return;
  appendLine(LOG_FILE, JSON.stringify(log));
}

function truncateString(value: string): { value: string; truncated: boolean } {
  if (value.length <= MAX_DEBUG_FIELD_CHARS) {
    return { value, truncated: false };
  }
  return {
    value: value.slice(0, MAX_DEBUG_FIELD_CHARS) + `\n... [TRUNCATED ${value.length - MAX_DEBUG_FIELD_CHARS} chars]`,
    truncated: true,
  };
}

export function logLLMDebug(entry: LLMDebugLog): void {
  if (!DEBUG_ENABLED) return;

  // Copy and truncate to keep log lines bounded
  const out: LLMDebugLog = { ...entry, truncated: { ...(entry.truncated || {}) } };

  if (typeof out.response === 'string') {
    const { value, truncated } = truncateString(out.response);
    out.response = value;
    if (truncated) out.truncated = { ...(out.truncated || {}), response: true };
  }

  if (typeof out.messages !== 'undefined') {
    const raw = JSON.stringify(out.messages);
    const { value, truncated } = truncateString(raw);
    if (truncated) {
      out.messagesJson = value;
      out.messages = undefined;
      out.truncated = { ...(out.truncated || {}), messages: true };
    }
  }

  appendLine(DEBUG_LOG_FILE, JSON.stringify(out));
}
