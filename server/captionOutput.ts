import type { TemplateFormat } from '../src/types';

function stripReasoning(raw: string): string {
  const withoutBlocks = raw.replace(/<think>[\s\S]*?<\/think>/gi, ' ');
  if (withoutBlocks.includes('</think>')) {
    return withoutBlocks.split('</think>').at(-1) ?? withoutBlocks;
  }

  return withoutBlocks.replace(/<think>/gi, ' ');
}

function stripWrapping(text: string): string {
  let result = text.trim();

  // Truncated replies can open a fence without ever closing it.
  const opening = result.match(/^```[\w-]*[^\S\n]*\n/);
  if (opening) {
    result = result.slice(opening[0].length).replace(/\n?```\s*$/, '').trim();
  }

  const quoted = result.match(/^(["'`])([\s\S]*)\1$/);
  if (quoted) {
    result = (quoted[2] ?? '').trim();
  }

  return result;
}

export function normalizeTags(text: string): string {
  const seen = new Set<string>();
  const tags: string[] = [];

  for (const piece of text.split(/[,\n]/)) {
    const tag = piece.replace(/_/g, ' ').replace(/\s+/g, ' ').trim();
    if (!tag) {
      continue;
    }

    const key = tag.toLowerCase();
    if (seen.has(key)) {
      continue;
    }

    seen.add(key);
    tags.push(tag);
  }

  return tags.join(', ');
}

export function normalizeCaption(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function cleanCaptionOutput(raw: string, format: TemplateFormat): string {
  const text = stripWrapping(stripReasoning(raw));
  return format === 'tag' ? normalizeTags(text) : normalizeCaption(text);
}
