import type { BackendModelLists, CaptionerSettings } from '../../src/types';
import { GEMINI_MODELS, GeminiBackend } from './gemini';
import type { GeminiClientFactory } from './gemini';
import { LocalVlmBackend } from './localVlm';
import type { LocalVlmRuntime } from './localVlm';
import {
  OPENROUTER_MODELS,
  OPENROUTER_PROFILE,
  OpenAICompatibleBackend,
  XAI_MODELS,
  XAI_PROFILE
} from './openaiCompatible';
import type { CaptionBackend, GenerationParams } from './types';

export interface BackendFactoryOptions {
  geminiClientFactory?: GeminiClientFactory;
  fetch?: typeof fetch;
}

export function createBackend(
  settings: CaptionerSettings,
  localRuntime: LocalVlmRuntime,
  options: BackendFactoryOptions = {}
): CaptionBackend {
  switch (settings.backend) {
    case 'local':
      return new LocalVlmBackend(localRuntime);
    case 'xai':
      return new OpenAICompatibleBackend(XAI_PROFILE, {
        apiKey: settings.xaiApiKey,
        model: settings.xaiModel,
        fetch: options.fetch
      });
    case 'openrouter':
      return new OpenAICompatibleBackend(OPENROUTER_PROFILE, {
        apiKey: settings.openrouterApiKey,
        model: settings.openrouterModel,
        fetch: options.fetch
      });
    case 'gemini':
      return new GeminiBackend(settings.geminiApiKey, settings.geminiModel, options.geminiClientFactory);
  }
}

export function generationParamsFrom(settings: CaptionerSettings): GenerationParams {
  return {
    temperature: settings.temperature,
    topK: settings.topK,
    topP: settings.topP,
    minP: settings.minP,
    repeatPenalty: settings.repeatPenalty,
    maxTokens: settings.maxTokens,
    reasoningEffort: settings.reasoningEffort
  };
}

export function listBackendModels(): BackendModelLists {
  return {
    gemini: [...GEMINI_MODELS],
    xai: [...XAI_MODELS],
    openrouter: [...OPENROUTER_MODELS]
  };
}

export type { CaptionBackend, CaptionRequest, GenerationParams } from './types';
export { USER_PROMPT } from './types';
