import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import net from 'node:net';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { setTimeout as delay } from 'node:timers/promises';
import type { LocalModelStatus, VlmType } from '../../src/types';
import { CaptionerError, toErrorMessage } from '../errors';
import { toDataUri } from '../imageEncoder';
import { logger as rootLogger } from '../logger';
import type { Logger } from '../logger';
import type { CaptionBackend, CaptionRequest } from './types';

const LOCAL_HOST = '127.0.0.1';
const HEALTH_POLL_INTERVAL_MS = 500;
const DEFAULT_LOAD_TIMEOUT_MS = 120_000;
const STDERR_TAIL_LINES = 20;
const QWEN3VL_MIN_CONTEXT = 8192;
const ALL_GPU_LAYERS = 999;

export interface LocalModelConfig {
  modelPath: string;
  mmprojPath: string;
  vlmType: VlmType;
  contextSize: number;
  gpuLayers: number;
  serverPath: string;
}

export interface ServerProcess {
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: (code: number | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnServer = (command: string, args: string[]) => ServerProcess;

export interface LocalVlmRuntimeOptions {
  spawnServer?: SpawnServer;
  fetch?: typeof fetch;
  findPort?: () => Promise<number>;
  loadTimeoutMs?: number;
  logger?: Logger;
}

interface ChatCompletionBody {
  choices?: Array<{ message?: { content?: string | null } }>;
}

const defaultSpawnServer: SpawnServer = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'], windowsHide: true });

export function findFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once('error', reject);
    server.listen(0, LOCAL_HOST, () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      server.close(() => (port ? resolve(port) : reject(new Error('Unable to allocate a local port.'))));
    });
  });
}

export function buildServerArgs(config: LocalModelConfig, port: number): string[] {
  const contextSize =
    config.vlmType === 'qwen3vl' ? Math.max(config.contextSize, QWEN3VL_MIN_CONTEXT) : config.contextSize;
  const gpuLayers = config.gpuLayers < 0 ? ALL_GPU_LAYERS : config.gpuLayers;

  const args = [
    '-m',
    config.modelPath,
    '--mmproj',
    config.mmprojPath,
    '-c',
    String(contextSize),
    '-ngl',
    String(gpuLayers),
    '--host',
    LOCAL_HOST,
    '--port',
    String(port)
  ];

  if (config.vlmType === 'qwen3vl') {
    args.push('--swa-full', '--image-min-tokens', '1024');
  }

  return args;
}

async function assertFile(filePath: string, label: string): Promise<void> {
  if (!filePath) {
    throw new CaptionerError('model_load', `Please select the ${label} file.`);
  }

  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      throw new Error('not a file');
    }
  } catch {
    throw new CaptionerError('model_load', `The ${label} file ${filePath} does not exist.`);
  }
}

interface PendingLoad {
  config: LocalModelConfig;
  process: ServerProcess | null;
  cancelled: boolean;
}

interface RunningServer {
  process: ServerProcess;
  baseUrl: string;
  config: LocalModelConfig;
}

/** Owns the llama.cpp server process that serves the local GGUF model. */
export class LocalVlmRuntime {
  private server: RunningServer | null = null;
  private pending: PendingLoad | null = null;
  private lastError: string | undefined;
  private readonly spawnServer: SpawnServer;
  private readonly fetchImpl: typeof fetch;
  private readonly findPort: () => Promise<number>;
  private readonly loadTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: LocalVlmRuntimeOptions = {}) {
    this.spawnServer = options.spawnServer ?? defaultSpawnServer;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.findPort = options.findPort ?? findFreePort;
    this.loadTimeoutMs = options.loadTimeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS;
    this.log = options.logger ?? rootLogger.child('local');
  }

  isLoaded(): boolean {
    return this.server !== null;
  }

  get baseUrl(): string | null {
    return this.server?.baseUrl ?? null;
  }

  status(): LocalModelStatus {
    const config = this.server?.config ?? this.pending?.config;

    return {
      loaded: this.server !== null,
      loading: this.pending !== null,
      modelPath: config?.modelPath ?? null,
      mmprojPath: config?.mmprojPath ?? null,
      vlmType: config?.vlmType ?? null,
      ...(this.lastError ? { error: this.lastError } : {})
    };
  }

  async load(config: LocalModelConfig): Promise<LocalModelStatus> {
    if (this.pending) {
      throw new CaptionerError('conflict', 'A model is already loading.');
    }

    // Claimed before the first await so a second load cannot slip past the check above.
    const pending: PendingLoad = { config, process: null, cancelled: false };
    this.pending = pending;
    this.lastError = undefined;

    try {
      await assertFile(config.modelPath, 'model');
      await assertFile(config.mmprojPath, 'projector (mmproj)');
      this.throwIfCancelled(pending);

      this.stopServer();
      const port = await this.findPort();
      this.throwIfCancelled(pending);

      const args = buildServerArgs(config, port);
      this.log.info(`Starting ${config.serverPath} for ${path.basename(config.modelPath)} on port ${port}`);

      const child = this.spawnServer(config.serverPath, args);
      pending.process = child;
      const baseUrl = `http://${LOCAL_HOST}:${port}`;
      await this.waitUntilHealthy(child, baseUrl, pending);

      child.once('exit', (code) => {
        if (this.server?.process === child) {
          this.log.warn(`llama-server exited with code ${code ?? 'null'}`);
          this.server = null;
        }
      });

      this.server = { process: child, baseUrl, config };
      this.log.info(`Model ready: ${path.basename(config.modelPath)}`);
      return this.status();
    } catch (error) {
      pending.process?.kill();
      if (pending.cancelled) {
        this.log.info(`Load of ${path.basename(config.modelPath)} cancelled`);
        throw new CaptionerError('model_load', 'Model load was cancelled.', { cause: error });
      }

      this.lastError = toErrorMessage(error);
      this.log.error(`Model load failed: ${this.lastError}`);
      throw error instanceof CaptionerError
        ? error
        : new CaptionerError('model_load', this.lastError, { cause: error });
    } finally {
      if (this.pending === pending) {
        this.pending = null;
      }
    }
  }

  private throwIfCancelled(pending: PendingLoad): void {
    if (pending.cancelled) {
      throw new CaptionerError('model_load', 'Model load was cancelled.');
    }
  }

  private async waitUntilHealthy(child: ServerProcess, baseUrl: string, pending: PendingLoad): Promise<void> {
    const stderrLines: string[] = [];
    const state: { exitReason: string | null } = { exitReason: null };

    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      for (const line of chunk.split(/\r?\n/)) {
        if (line.trim()) {
          stderrLines.push(line.trim());
        }
      }
      stderrLines.splice(0, Math.max(0, stderrLines.length - STDERR_TAIL_LINES));
    });
    child.on('error', (error) => {
      state.exitReason = `Unable to start llama-server: ${error.message}`;
    });
    child.once('exit', (code) => {
      state.exitReason ??= `llama-server exited with code ${code ?? 'null'} while loading`;
    });

    const deadline = Date.now() + this.loadTimeoutMs;
    while (Date.now() < deadline) {
      this.throwIfCancelled(pending);
      if (state.exitReason) {
        break;
      }

      try {
        const response = await this.fetchImpl(`${baseUrl}/health`, { method: 'GET' });
        if (response.ok) {
          this.throwIfCancelled(pending);
          return;
        }
      } catch {
        // Server not listening yet.
      }

      await delay(HEALTH_POLL_INTERVAL_MS);
    }

    this.throwIfCancelled(pending);
    child.kill();
    const tail = stderrLines.length > 0 ? `\n${stderrLines.join('\n')}` : '';
    throw new CaptionerError('model_load', `${state.exitReason ?? 'Timed out waiting for llama-server to become ready'}${tail}`);
  }

  private stopServer(): void {
    if (!this.server) {
      return;
    }

    const { process: child, config } = this.server;
    this.server = null;
    child.kill();
    this.log.info(`Unloaded ${path.basename(config.modelPath)}`);
  }

  /** Stops the running server and cancels a load in progress, killing its process. */
  unload(): void {
    const { pending } = this;
    if (pending) {
      pending.cancelled = true;
      pending.process?.kill();
    }

    this.stopServer();
  }

  buildRequestBody(request: CaptionRequest): Record<string, unknown> {
    const { params } = request;

    return {
      messages: [
        { role: 'system', content: request.systemPrompt },
        {
          role: 'user',
          content: [
            { type: 'image_url', image_url: { url: toDataUri(request.image) } },
            { type: 'text', text: request.userPrompt }
          ]
        }
      ],
      temperature: params.temperature,
      top_k: params.topK,
      top_p: params.topP,
      min_p: params.minP,
      repeat_penalty: params.repeatPenalty,
      max_tokens: params.maxTokens,
      stream: false
    };
  }

  async complete(request: CaptionRequest, signal?: AbortSignal): Promise<string> {
    const baseUrl = this.baseUrl;
    if (!baseUrl) {
      throw new CaptionerError('validation', 'No local model loaded.');
    }

    const response = await this.fetchImpl(`${baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json'
      },
      signal,
      body: JSON.stringify(this.buildRequestBody(request))
    });

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 300);
      throw new CaptionerError('backend', `llama-server responded with HTTP ${response.status}: ${detail}`);
    }

    const body = (await response.json()) as ChatCompletionBody;
    const content = body.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new CaptionerError('backend', 'Local model returned an empty response.');
    }

    return content;
  }
}

export class LocalVlmBackend implements CaptionBackend {
  readonly id = 'local';
  readonly label = 'Local VLM';

  constructor(private readonly runtime: LocalVlmRuntime) {}

  checkReady(): string | null {
    return this.runtime.isLoaded() ? null : 'Please load a local model first.';
  }

  generate(request: CaptionRequest, signal?: AbortSignal): Promise<string> {
    return this.runtime.complete(request, signal);
  }
}
