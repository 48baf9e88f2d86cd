import path from 'node:path';
import type { CaptionJobStatus, JobImageError, TemplateFormat } from '../src/types';
import type { CaptionBackend, GenerationParams } from './backends';
import { USER_PROMPT } from './backends';
import { captionExists, writeCaption } from './captionFiles';
import { cleanCaptionOutput } from './captionOutput';
import { CaptionerError, isAuthError, toErrorMessage } from './errors';
import { encodeImageForInference } from './imageEncoder';
import type { EncodedImage } from './imageEncoder';
import { logger as rootLogger } from './logger';
import type { Logger } from './logger';

const MAX_RECORDED_ERRORS = 200;

export interface CaptionJobOptions {
  imagePaths: string[];
  backend: CaptionBackend;
  systemPrompt: string;
  format: TemplateFormat;
  params: GenerationParams;
  outputDir?: string;
  skipExisting?: boolean;
}

export interface CaptionJobDeps {
  encodeImage?: (imagePath: string) => Promise<EncodedImage>;
  logger?: Logger;
  now?: () => number;
}

export function idleJobStatus(): CaptionJobStatus {
  return {
    state: 'idle',
    total: 0,
    current: 0,
    currentFile: null,
    processed: 0,
    skipped: 0,
    failed: 0,
    errors: [],
    message: null,
    startedAt: null,
    finishedAt: null,
    doneImages: []
  };
}

/**
 * Runs captioning over a list of images one at a time. Only one job runs at once; `stop()` aborts the
 * in-flight request and ends the loop before the next image.
 */
export class CaptionJobRunner {
  private status: CaptionJobStatus = idleJobStatus();
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private readonly encodeImage: (imagePath: string) => Promise<EncodedImage>;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(deps: CaptionJobDeps = {}) {
    this.encodeImage = deps.encodeImage ?? encodeImageForInference;
    this.log = deps.logger ?? rootLogger.child('job');
    this.now = deps.now ?? Date.now;
  }

  isRunning(): boolean {
    return this.status.state === 'running' || this.status.state === 'stopping';
  }

  getStatus(): CaptionJobStatus {
    return {
      ...this.status,
      errors: [...this.status.errors],
      doneImages: [...this.status.doneImages]
    };
  }

  /** Resolves when the current job (if any) has finished. */
  async whenIdle(): Promise<void> {
    await this.running;
  }

  start(options: CaptionJobOptions): CaptionJobStatus {
    if (this.isRunning()) {
      throw new CaptionerError('conflict', 'A captioning job is already running.');
    }

    if (options.imagePaths.length === 0) {
      throw new CaptionerError('validation', 'No images selected for tagging.');
    }

    if (!options.systemPrompt.trim()) {
      throw new CaptionerError('validation', 'The system prompt is empty.');
    }

    const notReady = options.backend.checkReady();
    if (notReady) {
      throw new CaptionerError('validation', notReady);
    }

    this.controller = new AbortController();
    this.status = {
      ...idleJobStatus(),
      state: 'running',
      total: options.imagePaths.length,
      message: 'Starting...',
      startedAt: this.now()
    };

    this.log.info(`Captioning ${options.imagePaths.length} image(s) with ${options.backend.label}`);
    this.running = this.run(options, this.controller.signal).catch((error: unknown) => {
      this.finish('failed', `Error: ${toErrorMessage(error)}`);
      this.log.error('Captioning job crashed', error);
    });

    return this.getStatus();
  }

  stop(): CaptionJobStatus {
    if (this.status.state === 'running') {
      this.status = { ...this.status, state: 'stopping', message: 'Stopping...' };
      this.controller?.abort();
    }

    return this.getStatus();
  }

  private recordError(imagePath: string, message: string): void {
    const entry: JobImageError = { imagePath, message };
    const errors = [...this.status.errors, entry].slice(-MAX_RECORDED_ERRORS);
    this.status = {
      ...this.status,
      failed: this.status.failed + 1,
      errors,
      message: `Error on ${path.basename(imagePath)}: ${message}`
    };
  }

  private finish(state: 'completed' | 'stopped' | 'failed', message: string): void {
    this.status = {
      ...this.status,
      state,
      currentFile: null,
      message,
      finishedAt: this.now()
    };
    this.controller = null;
  }

  private async captionOne(imagePath: string, options: CaptionJobOptions, signal: AbortSignal): Promise<void> {
    const image = await this.encodeImage(imagePath);
    const raw = await options.backend.generate(
      {
        image,
        systemPrompt: options.systemPrompt.trim(),
        userPrompt: USER_PROMPT,
        params: options.params
      },
      signal
    );

    const text = cleanCaptionOutput(raw, options.format);
    if (!text) {
      throw new CaptionerError('backend', 'The model returned no usable text.');
    }

    await writeCaption(imagePath, text, options.outputDir);
  }

  private async run(options: CaptionJobOptions, signal: AbortSignal): Promise<void> {
    const total = options.imagePaths.length;

    for (const [index, imagePath] of options.imagePaths.entries()) {
      if (signal.aborted) {
        break;
      }

      const fileName = path.basename(imagePath);
      this.status = {
        ...this.status,
        current: index + 1,
        currentFile: imagePath,
        message: `Processing (${index + 1}/${total}): ${fileName}`
      };

      if (options.skipExisting && (await captionExists(imagePath, options.outputDir))) {
        this.status = { ...this.status, skipped: this.status.skipped + 1 };
        continue;
      }

      try {
        await this.captionOne(imagePath, options, signal);
        this.status = {
          ...this.status,
          processed: this.status.processed + 1,
          doneImages: [...this.status.doneImages, imagePath]
        };
        this.log.debug(`Captioned ${fileName}`);
      } catch (error) {
        if (signal.aborted) {
          break;
        }

        const message = toErrorMessage(error);
        this.recordError(imagePath, message);
        this.log.warn(`Failed on ${fileName}: ${message}`);

        if (isAuthError(error)) {
          this.finish('failed', `Authentication failed: ${message}`);
          return;
        }
      }
    }

    const { processed, skipped, failed } = this.status;
    const summary = `Processed ${processed} image(s)${skipped ? `, skipped ${skipped}` : ''}${failed ? `, ${failed} failed` : ''}.`;

    if (signal.aborted) {
      this.finish('stopped', `Stopped. ${summary}`);
    } else {
      this.finish('completed', `Complete! ${summary}`);
    }

    this.log.info(this.status.message ?? summary);
  }
}
