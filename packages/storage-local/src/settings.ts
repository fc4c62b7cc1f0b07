import { DEFAULT_CHAT_SETTINGS, type ChatEndpoints, type ChatSettings } from '@datachat/shared-types';

const STORAGE_KEY = 'datachat.settings.v1';

function clampNumber(value: unknown, fallback: number, min: number, max: number): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, value));
}

function clampInteger(value: unknown, fallback: number, min: number, max: number): number {
  return Math.round(clampNumber(value, fallback, min, max));
}

function normalizeUrlString(value: unknown, fallback: string): string {
  if (typeof value !== 'string') return fallback;
  return value.trim().replace(/\/+$/, '');
}

function normalizePath(value: unknown, fallback: string): string {
  if (typeof value !== 'string' || !value.trim()) return fallback;
  const trimmed = value.trim();
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeEndpoints(input: Record<string, unknown> | undefined): ChatEndpoints {
  const base = DEFAULT_CHAT_SETTINGS.endpoints;
  return {
    stream: normalizePath(input?.stream, base.stream),
    stop: normalizePath(input?.stop, base.stop),
    chat: normalizePath(input?.chat, base.chat),
  };
}

export function validateSettings(input: unknown): ChatSettings {
  const base = DEFAULT_CHAT_SETTINGS;
  if (!isRecord(input)) {
    return base;
  }

  const inputEndpoints = isRecord(input.endpoints) ? input.endpoints : undefined;

  return {
    schemaVersion: 1,
    baseUrl: normalizeUrlString(input.baseUrl, base.baseUrl),
    endpoints: normalizeEndpoints(inputEndpoints),
    temperature: clampNumber(input.temperature, base.temperature, 0, 2),
    maxTokens: clampInteger(input.maxTokens, base.maxTokens, 1, 32_768),
    streamingEnabled: typeof input.streamingEnabled === 'boolean' ? input.streamingEnabled : base.streamingEnabled,
    typingDelayMs: clampInteger(input.typingDelayMs, base.typingDelayMs, 0, 1_000),
    typingSliceSize: clampInteger(input.typingSliceSize, base.typingSliceSize, 1, 64),
  };
}

export function loadSettings(storage: Storage = localStorage): ChatSettings {
  const raw = storage.getItem(STORAGE_KEY);
  if (!raw) {
    return DEFAULT_CHAT_SETTINGS;
  }

  try {
    return validateSettings(JSON.parse(raw));
  } catch (error) {
    console.warn('[datachat][settings] ignoring unreadable stored settings', error);
    return DEFAULT_CHAT_SETTINGS;
  }
}

export function saveSettings(patch: Partial<ChatSettings>, storage: Storage = localStorage): ChatSettings {
  const current = loadSettings(storage);
  const merged = validateSettings({ ...current, ...patch });
  storage.setItem(STORAGE_KEY, JSON.stringify(merged));
  return merged;
}

export function resetSettings(storage: Storage = localStorage): void {
  storage.removeItem(STORAGE_KEY);
}
