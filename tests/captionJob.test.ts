import { afterEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { CaptionBackend, CaptionRequest, GenerationParams } from '../server/backends';
import { CaptionJobRunner, idleJobStatus } from '../server/captionJob';
import type { CaptionJobOptions } from '../server/captionJob';
import { CaptionerError } from '../server/errors';
import { createLogger } from '../server/logger';

const tempRoots: string[] = [];

async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'captioner-job-test-'));
  tempRoots.push(dir);
  return dir;
}

afterEach(async () => {
  await Promise.all(tempRoots.splice(0).map((entry) => rm(entry, { recursive: true, force: true })));
});

const params: GenerationParams = {
  temperature: 0.4,
  topK: 40,
  topP: 0.9,
  minP: 0.05,
  repeatPenalty: 1.1,
  maxTokens: 512,
  reasoningEffort: 'none'
};

type Generate = (request: CaptionRequest, signal?: AbortSignal) => Promise<string>;

function fakeBackend(generate: Generate, notReady: string | null = null): CaptionBackend {
  return {
    id: 'gemini',
    label: 'Fake backend',
    checkReady: () => notReady,
    generate
  };
}

function makeRunner() {
  let clock = 1000;
  return new CaptionJobRunner({
    encodeImage: async () => ({ data: Buffer.from('png'), mimeType: 'image/png', width: 1, height: 1 }),
    logger: createLogger({ sink: () => undefined }),
    now: () => {
      clock += 1;
      return clock;
    }
  });
}

function jobOptions(
  imagePaths: string[],
  backend: CaptionBackend,
  overrides: Partial<CaptionJobOptions> = {}
): CaptionJobOptions {
  return {
    imagePaths,
    backend,
    systemPrompt: '  Describe the image.  ',
    format: 'captioning',
    params,
    ...overrides
  };
}

describe('CaptionJobRunner', () => {
  it('starts idle', () => {
    expect(makeRunner().getStatus()).toEqual(idleJobStatus());
  });

  it('captions every image in order and writes sidecar files', async () => {
    const root = await makeTempDir();
    const images = ['a.png', 'b.png', 'c.png'].map((name) => path.join(root, name));
    const generate = vi.fn<Generate>(async () => ' A small   test image. ');
    const runner = makeRunner();

    const started = runner.start(jobOptions(images, fakeBackend(generate)));
    expect(started).toMatchObject({ state: 'running', total: 3, message: 'Starting...', startedAt: 1001 });

    await runner.whenIdle();
    const status = runner.getStatus();

    expect(status).toMatchObject({
      state: 'completed',
      total: 3,
      current: 3,
      currentFile: null,
      processed: 3,
      skipped: 0,
      failed: 0,
      message: 'Complete! Processed 3 image(s).',
      doneImages: images
    });
    expect(await readFile(path.join(root, 'b.txt'), 'utf8')).toBe('A small test image.');
    expect(generate).toHaveBeenCalledTimes(3);
    expect(generate.mock.calls[0]?.[0]).toMatchObject({
      systemPrompt: 'Describe the image.',
      userPrompt: 'Analyze this image and follow the instructions provided.',
      params
    });
  });

  it('normalizes tag output and honors the output folder', async () => {
    const root = await makeTempDir();
    const outputDir = path.join(root, 'captions');
    const runner = makeRunner();

    runner.start(
      jobOptions([path.join(root, 'a.png')], fakeBackend(async () => '<think>hmm</think>1girl, long_hair, 1girl'), {
        format: 'tag',
        outputDir
      })
    );
    await runner.whenIdle();

    expect(await readFile(path.join(outputDir, 'a.txt'), 'utf8')).toBe('1girl, long hair');
  });

  it('skips images that already have captions when asked', async () => {
    const root = await makeTempDir();
    const images = ['a.png', 'b.png', 'c.png'].map((name) => path.join(root, name));
    await writeFile(path.join(root, 'b.txt'), 'keep me', 'utf8');
    const generate = vi.fn<Generate>(async () => 'new caption');
    const runner = makeRunner();

    runner.start(jobOptions(images, fakeBackend(generate), { skipExisting: true }));
    await runner.whenIdle();

    expect(runner.getStatus()).toMatchObject({
      processed: 2,
      skipped: 1,
      message: 'Complete! Processed 2 image(s), skipped 1.'
    });
    expect(await readFile(path.join(root, 'b.txt'), 'utf8')).toBe('keep me');
    expect(generate).toHaveBeenCalledTimes(2);
  });

  it('records a failed image and moves on', async () => {
    const root = await makeTempDir();
    const images = ['a.png', 'b.png', 'c.png'].map((name) => path.join(root, name));
    const runner = makeRunner();
    let call = 0;

    runner.start(
      jobOptions(
        images,
        fakeBackend(async () => {
          call += 1;
          if (call === 2) {
            throw new CaptionerError('backend', 'rate limited');
          }

          return 'fine';
        })
      )
    );
    await runner.whenIdle();

    const status = runner.getStatus();
    expect(status).toMatchObject({
      state: 'completed',
      processed: 2,
      failed: 1,
      message: 'Complete! Processed 2 image(s), 1 failed.'
    });
    expect(status.errors).toEqual([{ imagePath: images[1], message: 'rate limited' }]);
    expect(status.doneImages).toEqual([images[0], images[2]]);
  });

  it('treats an empty cleaned reply as a failure', async () => {
    const root = await makeTempDir();
    const runner = makeRunner();

    runner.start(jobOptions([path.join(root, 'a.png')], fakeBackend(async () => '<think>only thoughts</think>')));
    await runner.whenIdle();

    expect(runner.getStatus().errors).toEqual([
      { imagePath: path.join(root, 'a.png'), message: 'The model returned no usable text.' }
    ]);
  });

  it('aborts the whole batch on authentication errors', async () => {
    const root = await makeTempDir();
    const images = ['a.png', 'b.png'].map((name) => path.join(root, name));
    const generate = vi.fn<Generate>(async () => {
      throw Object.assign(new Error('Incorrect API key provided'), { status: 401 });
    });
    const runner = makeRunner();

    runner.start(jobOptions(images, fakeBackend(generate)));
    await runner.whenIdle();

    expect(runner.getStatus()).toMatchObject({
      state: 'failed',
      processed: 0,
      failed: 1,
      message: 'Authentication failed: Incorrect API key provided'
    });
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('stops between images when asked', async () => {
    const root = await makeTempDir();
    const images = ['a.png', 'b.png'].map((name) => path.join(root, name));
    const generate = vi.fn<Generate>(
      (_request, signal) =>
        new Promise<string>((_resolve, reject) => {
          if (signal?.aborted) {
            reject(new Error('aborted'));
            return;
          }

          signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const runner = makeRunner();

    runner.start(jobOptions(images, fakeBackend(generate)));
    expect(runner.stop()).toMatchObject({ state: 'stopping', message: 'Stopping...' });
    await runner.whenIdle();

    expect(runner.getStatus()).toMatchObject({
      state: 'stopped',
      processed: 0,
      failed: 0,
      message: 'Stopped. Processed 0 image(s).'
    });
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('refuses to start an invalid job', () => {
    const runner = makeRunner();
    const backend = fakeBackend(async () => 'x');

    expect(() => runner.start(jobOptions([], backend))).toThrow('No images selected for tagging.');
    expect(() => runner.start(jobOptions(['/a.png'], backend, { systemPrompt: '  ' }))).toThrow(
      'The system prompt is empty.'
    );
    expect(() => runner.start(jobOptions(['/a.png'], fakeBackend(async () => 'x', 'Please load a local model first.')))).toThrow(
      'Please load a local model first.'
    );
    expect(runner.getStatus().state).toBe('idle');
  });

  it('allows only one job at a time', async () => {
    const root = await makeTempDir();
    const runner = makeRunner();
    const backend = fakeBackend(async () => 'x');

    runner.start(jobOptions([path.join(root, 'a.png')], backend));
    expect(() => runner.start(jobOptions([path.join(root, 'b.png')], backend))).toThrow(
      'A captioning job is already running.'
    );
    await runner.whenIdle();
  });

  it('returns status snapshots that callers cannot mutate', async () => {
    const root = await makeTempDir();
    const runner = makeRunner();
    runner.start(jobOptions([path.join(root, 'a.png')], fakeBackend(async () => 'x')));
    await runner.whenIdle();

    const snapshot = runner.getStatus();
    snapshot.doneImages.push('/elsewhere.png');
    expect(runner.getStatus().doneImages).toEqual([path.join(root, 'a.png')]);
  });
});
