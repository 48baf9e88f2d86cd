import { afterEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { BUILT_IN_TEMPLATES } from '../server/defaultTemplates';
import { CaptionerError } from '../server/errors';
import { TemplateStore, isBuiltInTemplate, parseTemplates, sanitizeTemplateName } from '../server/templates';

const tempRoots: string[] = [];

async function makeStore(): Promise<{ store: TemplateStore; filePath: string }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'captioner-templates-test-'));
  tempRoots.push(dir);
  const filePath = path.join(dir, 'templates.json');
  return { store: new TemplateStore(filePath), filePath };
}

afterEach(async () => {
  await Promise.all(tempRoots.splice(0).map((entry) => rm(entry, { recursive: true, force: true })));
});

describe('sanitizeTemplateName', () => {
  it('trims and replaces path separators', () => {
    expect(sanitizeTemplateName('  portraits/close:up\\v2 ')).toBe('portraits_close_up_v2');
  });
});

describe('parseTemplates', () => {
  it('drops invalid entries and keeps the last entry per name', () => {
    const templates = parseTemplates(
      JSON.stringify([
        { name: 'A', format: 'tag', prompt: 'first' },
        { name: 'B', prompt: '   ' },
        { prompt: 'nameless' },
        'junk',
        { name: 'A', format: 'weird', prompt: 'second' }
      ])
    );

    expect(templates).toEqual([{ name: 'A', format: 'captioning', prompt: 'second' }]);
  });

  it('rejects content that is not an array', () => {
    expect(() => parseTemplates('{}')).toThrow('Templates file must contain a JSON array.');
  });
});

describe('TemplateStore', () => {
  it('seeds the built-in templates into a missing file', async () => {
    const { store, filePath } = await makeStore();

    const templates = await store.list();

    expect(templates.map((template) => template.name)).toEqual(['Danbooru Tag', 'Natural Caption']);
    expect(templates.every((template) => template.builtIn)).toBe(true);
    const stored: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    expect(stored).toHaveLength(BUILT_IN_TEMPLATES.length);
  });

  it('saves, overwrites on request and sorts naturally', async () => {
    const { store } = await makeStore();

    await store.save({ name: 'Style 10', format: 'tag', prompt: ' ten ', allowOverwrite: false });
    await store.save({ name: 'Style 2', format: 'captioning', prompt: 'two', allowOverwrite: false });

    await expect(
      store.save({ name: 'Style 2', format: 'captioning', prompt: 'again', allowOverwrite: false })
    ).rejects.toMatchObject({ code: 'conflict' });

    const saved = await store.save({ name: 'Style 2', format: 'tag', prompt: 'again', allowOverwrite: true });
    expect(saved).toEqual({ name: 'Style 2', format: 'tag', prompt: 'again', builtIn: false });

    const names = (await store.list()).map((template) => template.name);
    expect(names).toEqual(['Danbooru Tag', 'Natural Caption', 'Style 2', 'Style 10']);
    expect(await store.get('Style 10')).toEqual({ name: 'Style 10', format: 'tag', prompt: 'ten' });
  });

  it('persists across store instances', async () => {
    const { store, filePath } = await makeStore();
    await store.save({ name: 'Mine', format: 'tag', prompt: 'tags please', allowOverwrite: false });

    const reopened = new TemplateStore(filePath);
    expect(await reopened.get('Mine')).toEqual({ name: 'Mine', format: 'tag', prompt: 'tags please' });
  });

  it('refuses to overwrite or delete built-in templates', async () => {
    const { store } = await makeStore();

    await expect(
      store.save({ name: 'Natural Caption', format: 'captioning', prompt: 'x', allowOverwrite: true })
    ).rejects.toMatchObject({ code: 'conflict' });
    await expect(store.delete('Danbooru Tag')).rejects.toMatchObject({ code: 'conflict' });
    expect(isBuiltInTemplate('Danbooru Tag')).toBe(true);
  });

  it('validates names and prompts', async () => {
    const { store } = await makeStore();

    await expect(store.save({ name: '  ', format: 'tag', prompt: 'x', allowOverwrite: false })).rejects.toThrow(
      'Template name is required.'
    );
    await expect(store.save({ name: 'Empty', format: 'tag', prompt: ' ', allowOverwrite: false })).rejects.toThrow(
      'Template prompt is empty.'
    );
  });

  it('deletes user templates and reports unknown names', async () => {
    const { store } = await makeStore();
    await store.save({ name: 'Temp', format: 'tag', prompt: 'x', allowOverwrite: false });

    await store.delete('Temp');

    expect(await store.get('Temp')).toBeNull();
    await expect(store.delete('Temp')).rejects.toMatchObject({ code: 'not_found' });
  });

  it('reports a corrupt file as an io error', async () => {
    const { store, filePath } = await makeStore();
    await writeFile(filePath, '{ broken', 'utf8');

    const error = await store.list().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(CaptionerError);
    expect(error).toMatchObject({ code: 'io' });
  });
});
