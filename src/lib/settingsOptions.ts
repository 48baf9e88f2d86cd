import type { BackendId, ReasoningEffort, ScanMode, TemplateFormat, VlmType } from '../types';

export interface Option<T extends string> {
  value: T;
  label: string;
}

export const BACKEND_OPTIONS: readonly Option<BackendId>[] = [
  { value: 'local', label: 'Local (GGUF)' },
  { value: 'gemini', label: 'Gemini' },
  { value: 'xai', label: 'xAI' },
  { value: 'openrouter', label: 'OpenRouter' }
];

export const SCAN_MODE_OPTIONS: readonly Option<ScanMode>[] = [
  { value: 'top-level', label: 'Top-level' },
  { value: 'recursive', label: 'Recursive' }
];

export const VLM_TYPE_OPTIONS: readonly Option<VlmType>[] = [
  { value: 'qwen3vl', label: 'Qwen3-VL' },
  { value: 'llava', label: 'LLaVA' }
];

export const REASONING_OPTIONS: readonly Option<ReasoningEffort>[] = [
  { value: 'none', label: 'None' },
  { value: 'minimal', label: 'Minimal' },
  { value: 'low', label: 'Low' },
  { value: 'medium', label: 'Medium' },
  { value: 'high', label: 'High' },
  { value: 'auto', label: 'Auto' }
];

export const FORMAT_OPTIONS: readonly Option<TemplateFormat>[] = [
  { value: 'captioning', label: 'Captioning' },
  { value: 'tag', label: 'Tags' }
];

/** Maps a raw `<select>` value back onto the option list; unknown values keep the current choice. */
export function pickOption<T extends string>(options: readonly Option<T>[], value: string, fallback: T): T {
  return options.find((option) => option.value === value)?.value ?? fallback;
}

export type SliderKey = 'temperature' | 'topK' | 'topP' | 'minP' | 'repeatPenalty' | 'maxTokens';

export interface SliderSpec {
  key: SliderKey;
  label: string;
  min: number;
  max: number;
  step: number;
  localOnly: boolean;
}

export const GENERATION_SLIDERS: readonly SliderSpec[] = [
  { key: 'temperature', label: 'Temperature', min: 0, max: 2, step: 0.05, localOnly: false },
  { key: 'topK', label: 'Top K', min: 1, max: 100, step: 1, localOnly: false },
  { key: 'topP', label: 'Top P', min: 0, max: 1, step: 0.01, localOnly: false },
  { key: 'minP', label: 'Min P', min: 0, max: 1, step: 0.01, localOnly: true },
  { key: 'repeatPenalty', label: 'Repeat Penalty', min: 0, max: 2, step: 0.01, localOnly: true },
  { key: 'maxTokens', label: 'Max Tokens', min: 16, max: 8192, step: 16, localOnly: false }
];

export function visibleSliders(backend: BackendId): SliderSpec[] {
  return GENERATION_SLIDERS.filter((slider) => backend === 'local' || !slider.localOnly);
}

export function formatSliderValue(slider: SliderSpec, value: number): string {
  return Number.isInteger(slider.step) ? String(Math.round(value)) : value.toFixed(2);
}

export function apiKeyField(backend: BackendId): 'geminiApiKey' | 'xaiApiKey' | 'openrouterApiKey' | null {
  switch (backend) {
    case 'gemini':
      return 'geminiApiKey';
    case 'xai':
      return 'xaiApiKey';
    case 'openrouter':
      return 'openrouterApiKey';
    default:
      return null;
  }
}

export function modelField(backend: BackendId): 'geminiModel' | 'xaiModel' | 'openrouterModel' | null {
  switch (backend) {
    case 'gemini':
      return 'geminiModel';
    case 'xai':
      return 'xaiModel';
    case 'openrouter':
      return 'openrouterModel';
    default:
      return null;
  }
}

export function formatWindowGeometry(width: number, height: number): string {
  return `${Math.round(width)}x${Math.round(height)}`;
}
