import type { CaptionJobStatus, ImageItem } from '../types';

export function isJobActive(status: CaptionJobStatus): boolean {
  return status.state === 'running' || status.state === 'stopping';
}

/** Marks images the job has written captions for. Returns the same array when nothing changed. */
export function applyJobProgress(items: ImageItem[], status: CaptionJobStatus): ImageItem[] {
  if (status.doneImages.length === 0) {
    return items;
  }

  const done = new Set(status.doneImages);
  let changed = false;
  const next = items.map((item) => {
    if (item.hasCaption || !done.has(item.sourcePath)) {
      return item;
    }

    changed = true;
    return { ...item, hasCaption: true };
  });

  return changed ? next : items;
}

export function describeJobProgress(status: CaptionJobStatus): { percent: number; line: string } {
  const percent = status.total > 0 ? Math.round((status.current / status.total) * 100) : 0;

  if (status.state === 'idle') {
    return { percent: 0, line: 'Idle' };
  }

  if (status.state === 'completed') {
    return { percent: 100, line: status.message ?? 'Complete!' };
  }

  return { percent, line: status.message ?? `${status.current}/${status.total}` };
}
