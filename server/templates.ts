import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { PromptTemplate, PromptTemplateSummary, SaveTemplateRequest, TemplateFormat } from '../src/types';
import { BUILT_IN_TEMPLATES } from './defaultTemplates';
import { CaptionerError, toErrorMessage, wrapIoError } from './errors';

const collator = new Intl.Collator(undefined, {
  numeric: true,
  sensitivity: 'base'
});

const BUILT_IN_NAMES = new Set(BUILT_IN_TEMPLATES.map((template) => template.name));

export function isBuiltInTemplate(name: string): boolean {
  return BUILT_IN_NAMES.has(name);
}

export function sanitizeTemplateName(name: string): string {
  return name.trim().replace(/[/\\:]/g, '_');
}

function normalizeFormat(value: unknown): TemplateFormat {
  return value === 'tag' ? 'tag' : 'captioning';
}

function parseTemplateEntry(entry: unknown): PromptTemplate | null {
  if (typeof entry !== 'object' || entry === null) {
    return null;
  }

  const record: Record<string, unknown> = { ...entry };
  if (typeof record.name !== 'string' || typeof record.prompt !== 'string') {
    return null;
  }

  const name = sanitizeTemplateName(record.name);
  if (!name || !record.prompt.trim()) {
    return null;
  }

  return { name, format: normalizeFormat(record.format), prompt: record.prompt };
}

export function parseTemplates(content: string): PromptTemplate[] {
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new Error('Templates file must contain a JSON array.');
  }

  const byName = new Map<string, PromptTemplate>();
  for (const entry of parsed) {
    const template = parseTemplateEntry(entry);
    if (template) {
      byName.set(template.name, template);
    }
  }

  return Array.from(byName.values());
}

function sortTemplates(templates: PromptTemplate[]): PromptTemplate[] {
  return [...templates].sort((a, b) => collator.compare(a.name, b.name));
}

export class TemplateStore {
  private templates: PromptTemplate[] | null = null;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  private async load(): Promise<PromptTemplate[]> {
    if (this.templates) {
      return this.templates;
    }

    let content: string | null = null;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw wrapIoError(error, 'read templates from', this.filePath);
      }
    }

    let templates: PromptTemplate[] = [];
    if (content !== null) {
      try {
        templates = parseTemplates(content);
      } catch (error) {
        throw new CaptionerError('io', `Templates file ${this.filePath} is corrupt: ${toErrorMessage(error)}`, {
          cause: error
        });
      }
    }

    if (templates.length === 0) {
      templates = BUILT_IN_TEMPLATES.map((template) => ({ ...template }));
      await this.persist(templates);
    }

    this.templates = sortTemplates(templates);
    return this.templates;
  }

  private async persist(templates: PromptTemplate[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.tmp`;
      await fs.writeFile(tempPath, `${JSON.stringify(templates, null, 2)}\n`, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      throw wrapIoError(error, 'save templates to', this.filePath);
    }
  }

  async list(): Promise<PromptTemplateSummary[]> {
    const templates = await this.load();
    return templates.map((template) => ({ ...template, builtIn: isBuiltInTemplate(template.name) }));
  }

  async get(name: string): Promise<PromptTemplate | null> {
    const templates = await this.load();
    return templates.find((template) => template.name === name) ?? null;
  }

  async save(request: SaveTemplateRequest): Promise<PromptTemplateSummary> {
    const name = sanitizeTemplateName(request.name);
    const prompt = request.prompt.trim();

    if (!name) {
      throw new CaptionerError('validation', 'Template name is required.');
    }

    if (!prompt) {
      throw new CaptionerError('validation', 'Template prompt is empty.');
    }

    if (isBuiltInTemplate(name)) {
      throw new CaptionerError('conflict', `"${name}" is a built-in template. Use Save As to create a copy.`);
    }

    const templates = await this.load();
    const existing = templates.find((template) => template.name === name);
    if (existing && !request.allowOverwrite) {
      throw new CaptionerError('conflict', `A template named "${name}" already exists.`);
    }

    const saved: PromptTemplate = { name, format: normalizeFormat(request.format), prompt };
    const next = sortTemplates([...templates.filter((template) => template.name !== name), saved]);
    await this.persist(next);
    this.templates = next;

    return { ...saved, builtIn: false };
  }

  async delete(name: string): Promise<void> {
    if (isBuiltInTemplate(name)) {
      throw new CaptionerError('conflict', `Built-in template "${name}" cannot be deleted.`);
    }

    const templates = await this.load();
    if (!templates.some((template) => template.name === name)) {
      throw new CaptionerError('not_found', `Template "${name}" does not exist.`);
    }

    const next = templates.filter((template) => template.name !== name);
    await this.persist(next);
    this.templates = next;
  }
}
