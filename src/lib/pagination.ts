const PAGE_STEP = 10;

export function clampIndex(value: number, total: number): number {
  if (total <= 0 || !Number.isFinite(value)) {
    return 0;
  }

  return Math.max(0, Math.min(total - 1, Math.trunc(value)));
}

/** Turns the pager's one-based input into an index; anything unparseable goes to the first image. */
export function parseOneBasedJump(input: string, total: number): number {
  const parsed = Number.parseInt(input.trim(), 10);
  return Number.isNaN(parsed) ? 0 : clampIndex(parsed - 1, total);
}

/** Index offset for a navigation key, or null when the key does not move through the list. */
export function navigationOffset(key: string): number | null {
  switch (key) {
    case 'ArrowDown':
    case 'ArrowRight':
      return 1;
    case 'ArrowUp':
    case 'ArrowLeft':
      return -1;
    case 'PageDown':
      return PAGE_STEP;
    case 'PageUp':
      return -PAGE_STEP;
    default:
      return null;
  }
}

export function formatPosition(index: number, total: number): string {
  return total > 0 ? `${clampIndex(index, total) + 1}/${total}` : '0/0';
}
