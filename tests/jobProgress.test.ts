import { describe, expect, it } from 'vitest';
import { applyJobProgress, describeJobProgress, isJobActive } from '../src/lib/jobProgress';
import type { CaptionJobStatus, ImageItem } from '../src/types';

function status(overrides: Partial<CaptionJobStatus> = {}): CaptionJobStatus {
  return {
    state: 'running',
    total: 4,
    current: 1,
    currentFile: null,
    processed: 0,
    skipped: 0,
    failed: 0,
    errors: [],
    message: null,
    startedAt: 1,
    finishedAt: null,
    doneImages: [],
    ...overrides
  };
}

function item(sourcePath: string, hasCaption = false): ImageItem {
  const baseName = sourcePath.replace(/^.*\//, '').replace(/\.[^.]+$/, '');
  return {
    id: sourcePath,
    sourcePath,
    sourceUrl: `/dataset/image?path=${encodeURIComponent(sourcePath)}`,
    thumbUrl: `/dataset/image?path=${encodeURIComponent(sourcePath)}&thumb=1`,
    relDir: '',
    baseName,
    ext: '.png',
    captionPath: sourcePath.replace(/\.png$/, '.txt'),
    hasCaption
  };
}

describe('isJobActive', () => {
  it('is true while running or stopping', () => {
    expect(isJobActive(status({ state: 'running' }))).toBe(true);
    expect(isJobActive(status({ state: 'stopping' }))).toBe(true);
    expect(isJobActive(status({ state: 'stopped' }))).toBe(false);
    expect(isJobActive(status({ state: 'idle' }))).toBe(false);
  });
});

describe('applyJobProgress', () => {
  it('marks captioned images', () => {
    const items = [item('/data/a.png'), item('/data/b.png'), item('/data/c.png', true)];
    const next = applyJobProgress(items, status({ doneImages: ['/data/b.png', '/data/c.png'] }));

    expect(next.map((entry) => entry.hasCaption)).toEqual([false, true, true]);
    expect(next[0]).toBe(items[0]);
    expect(next[2]).toBe(items[2]);
  });

  it('returns the same array when nothing changed', () => {
    const items = [item('/data/a.png', true)];

    expect(applyJobProgress(items, status())).toBe(items);
    expect(applyJobProgress(items, status({ doneImages: ['/data/a.png', '/elsewhere/x.png'] }))).toBe(items);
  });
});

describe('describeJobProgress', () => {
  it('reports percent and the latest message', () => {
    expect(describeJobProgress(status({ state: 'idle' }))).toEqual({ percent: 0, line: 'Idle' });
    expect(describeJobProgress(status({ current: 1, total: 3 }))).toEqual({ percent: 33, line: '1/3' });
    expect(describeJobProgress(status({ current: 2, total: 4, message: 'Processing (2/4): b.png' }))).toEqual({
      percent: 50,
      line: 'Processing (2/4): b.png'
    });
    expect(describeJobProgress(status({ state: 'completed', current: 2, total: 4 }))).toEqual({
      percent: 100,
      line: 'Complete!'
    });
    expect(describeJobProgress(status({ state: 'stopped', current: 0, total: 0, message: 'Stopped.' }))).toEqual({
      percent: 0,
      line: 'Stopped.'
    });
  });
});
