export type ScanMode = 'recursive' | 'top-level';

export type BackendId = 'local' | 'gemini' | 'xai' | 'openrouter';

export type VlmType = 'qwen3vl' | 'llava';

export type ReasoningEffort = 'none' | 'minimal' | 'low' | 'medium' | 'high' | 'auto';

export type TemplateFormat = 'tag' | 'captioning';

export interface CaptionerSettings {
  lastFolder: string;
  scanMode: ScanMode;
  backend: BackendId;
  geminiModel: string;
  geminiApiKey: string;
  xaiModel: string;
  xaiApiKey: string;
  openrouterModel: string;
  openrouterApiKey: string;
  localModelPath: string;
  localMmprojPath: string;
  vlmType: VlmType;
  llamaServerPath: string;
  contextSize: number;
  gpuLayers: number;
  temperature: number;
  topK: number;
  topP: number;
  minP: number;
  repeatPenalty: number;
  maxTokens: number;
  reasoningEffort: ReasoningEffort;
  selectedTemplate: string;
  systemPrompt: string;
  outputDir: string;
  skipExisting: boolean;
  windowGeometry: string;
}

export interface ImageItem {
  id: string;
  sourcePath: string;
  sourceUrl: string;
  thumbUrl: string;
  relDir: string;
  baseName: string;
  ext: string;
  captionPath: string;
  hasCaption: boolean;
}

export interface ScanImagesRequest {
  folder: string;
  mode: ScanMode;
}

export interface DirectoryListing {
  path: string;
  parent: string | null;
  directories: string[];
}

export interface PromptTemplate {
  name: string;
  format: TemplateFormat;
  prompt: string;
}

export interface PromptTemplateSummary extends PromptTemplate {
  builtIn: boolean;
}

export interface SaveTemplateRequest extends PromptTemplate {
  allowOverwrite: boolean;
}

export interface CaptionFileRequest {
  imagePath: string;
}

export interface SaveCaptionRequest {
  imagePath: string;
  text: string;
}

export interface BackendModelLists {
  gemini: string[];
  xai: string[];
  openrouter: string[];
}

export interface LocalModelStatus {
  loaded: boolean;
  loading: boolean;
  modelPath: string | null;
  mmprojPath: string | null;
  vlmType: VlmType | null;
  error?: string;
}

export type JobState = 'idle' | 'running' | 'stopping' | 'completed' | 'stopped' | 'failed';

export interface JobImageError {
  imagePath: string;
  message: string;
}

export interface CaptionJobStatus {
  state: JobState;
  total: number;
  current: number;
  currentFile: string | null;
  processed: number;
  skipped: number;
  failed: number;
  errors: JobImageError[];
  message: string | null;
  startedAt: number | null;
  finishedAt: number | null;
  doneImages: string[];
}

export interface StartJobRequest {
  imagePaths: string[];
  /** Output cleanup to apply; the selected template's format when omitted. */
  format?: TemplateFormat;
}

export type ErrorCode = 'validation' | 'not_found' | 'conflict' | 'auth' | 'backend' | 'model_load' | 'image' | 'io';

export interface ApiErrorPayload {
  code: ErrorCode;
  message: string;
}

export type ApiEnvelope<T> = { ok: true; data: T } | { ok: false; error: ApiErrorPayload };
