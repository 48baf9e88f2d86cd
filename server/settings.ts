import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { BackendId, CaptionerSettings, ReasoningEffort, ScanMode, VlmType } from '../src/types';
import { wrapIoError } from './errors';

export const FALLBACK_SYSTEM_PROMPT = 'You are an expert image tagger for anime, illustrations, and photographs.';

const OBFUSCATION_PREFIX = 'b64:';
const API_KEY_FIELDS = ['geminiApiKey', 'xaiApiKey', 'openrouterApiKey'] as const;
const REASONING_EFFORTS: readonly ReasoningEffort[] = ['none', 'minimal', 'low', 'medium', 'high', 'auto'];
const BACKENDS: readonly BackendId[] = ['local', 'gemini', 'xai', 'openrouter'];

export const DEFAULT_SETTINGS: CaptionerSettings = {
  lastFolder: '',
  scanMode: 'top-level',
  backend: 'gemini',
  geminiModel: 'gemini-2.5-flash',
  geminiApiKey: '',
  xaiModel: 'grok-4',
  xaiApiKey: '',
  openrouterModel: 'qwen/qwen-2.5-vl-72b-instruct',
  openrouterApiKey: '',
  localModelPath: '',
  localMmprojPath: '',
  vlmType: 'qwen3vl',
  llamaServerPath: 'llama-server',
  contextSize: 8192,
  gpuLayers: -1,
  temperature: 0.4,
  topK: 40,
  topP: 0.9,
  minP: 0.05,
  repeatPenalty: 1.1,
  maxTokens: 512,
  reasoningEffort: 'none',
  selectedTemplate: 'Natural Caption',
  systemPrompt: FALLBACK_SYSTEM_PROMPT,
  outputDir: '',
  skipExisting: false,
  windowGeometry: '1400x900'
};

function clampNumber(value: unknown, fallback: number, min: number, max: number): number {
  const numeric = typeof value === 'number' ? value : Number(value);
  if (value === null || value === '' || !Number.isFinite(numeric)) {
    return fallback;
  }

  return Math.max(min, Math.min(max, numeric));
}

function clampInteger(value: unknown, fallback: number, min: number, max: number): number {
  return Math.round(clampNumber(value, fallback, min, max));
}

function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function normalizeString(value: unknown, fallback: string): string {
  if (typeof value !== 'string') {
    return fallback;
  }

  const trimmed = value.trim();
  return trimmed ? trimmed : fallback;
}

/** Free text kept as typed, including empty; only a missing or non-string value takes the fallback. */
function normalizeText(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function normalizeOptionalString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function normalizeChoice<T extends string>(value: unknown, choices: readonly T[], fallback: T): T {
  return choices.find((choice) => choice === value) ?? fallback;
}

function normalizeGeometry(value: unknown, fallback: string): string {
  if (typeof value !== 'string') {
    return fallback;
  }

  const match = value.trim().match(/^(\d{2,5})x(\d{2,5})$/);
  return match ? `${match[1]}x${match[2]}` : fallback;
}

export function normalizeSettings(raw: Partial<Record<keyof CaptionerSettings, unknown>>): CaptionerSettings {
  const defaults = DEFAULT_SETTINGS;

  return {
    lastFolder: normalizeOptionalString(raw.lastFolder),
    scanMode: normalizeChoice<ScanMode>(raw.scanMode, ['top-level', 'recursive'], defaults.scanMode),
    backend: normalizeChoice(raw.backend, BACKENDS, defaults.backend),
    geminiModel: normalizeString(raw.geminiModel, defaults.geminiModel),
    geminiApiKey: normalizeOptionalString(raw.geminiApiKey),
    xaiModel: normalizeString(raw.xaiModel, defaults.xaiModel),
    xaiApiKey: normalizeOptionalString(raw.xaiApiKey),
    openrouterModel: normalizeString(raw.openrouterModel, defaults.openrouterModel),
    openrouterApiKey: normalizeOptionalString(raw.openrouterApiKey),
    localModelPath: normalizeOptionalString(raw.localModelPath),
    localMmprojPath: normalizeOptionalString(raw.localMmprojPath),
    vlmType: normalizeChoice<VlmType>(raw.vlmType, ['qwen3vl', 'llava'], defaults.vlmType),
    llamaServerPath: normalizeString(raw.llamaServerPath, defaults.llamaServerPath),
    contextSize: clampInteger(raw.contextSize, defaults.contextSize, 512, 131072),
    gpuLayers: clampInteger(raw.gpuLayers, defaults.gpuLayers, -1, 999),
    temperature: clampNumber(raw.temperature, defaults.temperature, 0, 2),
    topK: clampInteger(raw.topK, defaults.topK, 1, 100),
    topP: clampNumber(raw.topP, defaults.topP, 0, 1),
    minP: clampNumber(raw.minP, defaults.minP, 0, 1),
    repeatPenalty: clampNumber(raw.repeatPenalty, defaults.repeatPenalty, 0, 2),
    maxTokens: clampInteger(raw.maxTokens, defaults.maxTokens, 16, 8192),
    reasoningEffort: normalizeChoice(raw.reasoningEffort, REASONING_EFFORTS, defaults.reasoningEffort),
    selectedTemplate: normalizeString(raw.selectedTemplate, defaults.selectedTemplate),
    systemPrompt: normalizeText(raw.systemPrompt, defaults.systemPrompt),
    outputDir: normalizeOptionalString(raw.outputDir),
    skipExisting: normalizeBoolean(raw.skipExisting, defaults.skipExisting),
    windowGeometry: normalizeGeometry(raw.windowGeometry, defaults.windowGeometry)
  };
}

export function mergeSettings(base: CaptionerSettings, updates: Partial<CaptionerSettings>): CaptionerSettings {
  return normalizeSettings({ ...base, ...updates });
}

/** Fills empty API key and server path fields from the environment. Values already in settings win. */
export function applyEnvironmentDefaults(
  settings: CaptionerSettings,
  env: NodeJS.ProcessEnv = process.env
): CaptionerSettings {
  return normalizeSettings({
    ...settings,
    geminiApiKey: settings.geminiApiKey || env.GEMINI_API_KEY,
    xaiApiKey: settings.xaiApiKey || env.XAI_API_KEY,
    openrouterApiKey: settings.openrouterApiKey || env.OPENROUTER_API_KEY,
    llamaServerPath:
      settings.llamaServerPath === DEFAULT_SETTINGS.llamaServerPath && env.LLAMA_SERVER_PATH
        ? env.LLAMA_SERVER_PATH
        : settings.llamaServerPath
  });
}

// Obfuscation keeps keys out of casual view in the JSON file. It is not encryption.
export function obfuscateSecret(value: string): string {
  if (!value) {
    return '';
  }

  return `${OBFUSCATION_PREFIX}${Buffer.from(value, 'utf8').toString('base64')}`;
}

export function revealSecret(value: unknown): string {
  if (typeof value !== 'string') {
    return '';
  }

  if (!value.startsWith(OBFUSCATION_PREFIX)) {
    return value;
  }

  const encoded = value.slice(OBFUSCATION_PREFIX.length);
  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  return Buffer.from(decoded, 'utf8').toString('base64') === encoded ? decoded : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function serializeSettings(settings: CaptionerSettings): string {
  const stored: Record<string, unknown> = { ...settings };
  for (const field of API_KEY_FIELDS) {
    stored[field] = obfuscateSecret(settings[field]);
  }

  return `${JSON.stringify(stored, null, 2)}\n`;
}

export function parseSettings(content: string): CaptionerSettings {
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) {
    return DEFAULT_SETTINGS;
  }

  const revealed: Record<string, unknown> = { ...parsed };
  for (const field of API_KEY_FIELDS) {
    revealed[field] = revealSecret(parsed[field]);
  }

  return normalizeSettings(revealed);
}

export async function loadSettings(settingsPath: string): Promise<CaptionerSettings> {
  try {
    const content = await fs.readFile(settingsPath, 'utf8');
    return parseSettings(content);
  } catch {
    return DEFAULT_SETTINGS;
  }
}

export async function saveSettings(settingsPath: string, settings: CaptionerSettings): Promise<void> {
  try {
    await fs.mkdir(path.dirname(settingsPath), { recursive: true });
    const tempPath = `${settingsPath}.tmp`;
    await fs.writeFile(tempPath, serializeSettings(settings), 'utf8');
    await fs.rename(tempPath, settingsPath);
  } catch (error) {
    throw wrapIoError(error, 'save settings to', settingsPath);
  }
}
