import type { BackendId, ReasoningEffort } from '../../src/types';
import type { EncodedImage } from '../imageEncoder';

export const USER_PROMPT = 'Analyze this image and follow the instructions provided.';

export interface GenerationParams {
  temperature: number;
  topK: number;
  topP: number;
  minP: number;
  repeatPenalty: number;
  maxTokens: number;
  reasoningEffort: ReasoningEffort;
}

export interface CaptionRequest {
  image: EncodedImage;
  systemPrompt: string;
  userPrompt: string;
  params: GenerationParams;
}

export interface CaptionBackend {
  readonly id: BackendId;
  readonly label: string;
  /** Why the backend cannot run right now, or null when it is ready. */
  checkReady(): string | null;
  generate(request: CaptionRequest, signal?: AbortSignal): Promise<string>;
}
