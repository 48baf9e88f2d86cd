import type {
  ApiEnvelope,
  ApiErrorPayload,
  BackendModelLists,
  CaptionerSettings,
  CaptionJobStatus,
  DirectoryListing,
  ImageItem,
  LocalModelStatus,
  PromptTemplateSummary,
  SaveCaptionRequest,
  SaveTemplateRequest,
  ScanImagesRequest,
  StartJobRequest
} from '../types';

export class BridgeError extends Error {
  readonly code: ApiErrorPayload['code'];
  readonly status: number;

  constructor(payload: ApiErrorPayload, status: number) {
    super(payload.message);
    this.name = 'BridgeError';
    this.code = payload.code;
    this.status = status;
  }
}

export interface CaptionerBridge {
  getInitialFolder: () => Promise<string | null>;
  listDirectories: (path: string) => Promise<DirectoryListing>;
  getSettings: () => Promise<CaptionerSettings>;
  updateSettings: (updates: Partial<CaptionerSettings>) => Promise<CaptionerSettings>;
  resetSettings: () => Promise<CaptionerSettings>;
  scanImages: (req: ScanImagesRequest) => Promise<ImageItem[]>;
  readCaption: (imagePath: string) => Promise<{ captionPath: string; text: string }>;
  saveCaption: (req: SaveCaptionRequest) => Promise<{ captionPath: string }>;
  deleteCaption: (imagePath: string) => Promise<{ deleted: boolean }>;
  listTemplates: () => Promise<PromptTemplateSummary[]>;
  saveTemplate: (req: SaveTemplateRequest) => Promise<PromptTemplateSummary>;
  deleteTemplate: (name: string) => Promise<PromptTemplateSummary[]>;
  listModels: () => Promise<BackendModelLists>;
  localStatus: () => Promise<LocalModelStatus>;
  loadLocalModel: () => Promise<LocalModelStatus>;
  unloadLocalModel: () => Promise<LocalModelStatus>;
  startJob: (req: StartJobRequest) => Promise<CaptionJobStatus>;
  stopJob: () => Promise<CaptionJobStatus>;
  jobStatus: () => Promise<CaptionJobStatus>;
}

function isEnvelope(value: unknown): value is ApiEnvelope<unknown> {
  return typeof value === 'object' && value !== null && 'ok' in value && typeof value.ok === 'boolean';
}

export function createCaptionerBridge(fetchImpl: typeof fetch = (...args) => fetch(...args), baseUrl = ''): CaptionerBridge {
  // Each channel's result type is fixed by the host handler of the same name.
  const invoke = async <T>(channel: string, payload: object = {}): Promise<T> => {
    const response = await fetchImpl(`${baseUrl}/api/${channel}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload)
    });

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new BridgeError({ code: 'backend', message: `Host returned ${response.status} for ${channel}` }, response.status);
    }

    if (!isEnvelope(body)) {
      throw new BridgeError({ code: 'backend', message: `Malformed response for ${channel}` }, response.status);
    }

    if (!body.ok) {
      throw new BridgeError(body.error, response.status);
    }

    return body.data as T;
  };

  return {
    getInitialFolder: () => invoke('app:get-initial-folder'),
    listDirectories: (path) => invoke('app:list-directories', { path }),
    getSettings: () => invoke('settings:get'),
    updateSettings: (updates) => invoke('settings:update', updates),
    resetSettings: () => invoke('settings:reset'),
    scanImages: (req) => invoke('images:scan', req),
    readCaption: (imagePath) => invoke('caption:read', { imagePath }),
    saveCaption: (req) => invoke('caption:save', req),
    deleteCaption: (imagePath) => invoke('caption:delete', { imagePath }),
    listTemplates: () => invoke('templates:list'),
    saveTemplate: (req) => invoke('templates:save', req),
    deleteTemplate: (name) => invoke('templates:delete', { name }),
    listModels: () => invoke('backends:models'),
    localStatus: () => invoke('local:status'),
    loadLocalModel: () => invoke('local:load'),
    unloadLocalModel: () => invoke('local:unload'),
    startJob: (req) => invoke('job:start', req),
    stopJob: () => invoke('job:stop'),
    jobStatus: () => invoke('job:status')
  };
}

export const captionerApi = createCaptionerBridge();
