import path from 'node:path';
import type { CaptionerSettings, ScanMode, TemplateFormat } from '../src/types';
import { createBackend, generationParamsFrom, listBackendModels } from './backends';
import type { BackendFactoryOptions } from './backends';
import type { LocalVlmRuntime } from './backends/localVlm';
import { deleteCaption, getCaptionPath, readCaption, writeCaption } from './captionFiles';
import type { CaptionJobRunner } from './captionJob';
import { isDirectory, listDirectories } from './directories';
import { CaptionerError } from './errors';
import { isSupportedImageExtension, scanImageFolder } from './imageScanner';
import {
  DEFAULT_SETTINGS,
  applyEnvironmentDefaults,
  normalizeSettings,
  saveSettings
} from './settings';
import type { TemplateStore } from './templates';

export type ChannelHandler = (payload: Record<string, unknown>) => Promise<unknown> | unknown;

export interface HostContext {
  settingsPath: string;
  settings: CaptionerSettings;
  initialFolder: string | null;
  templates: TemplateStore;
  localRuntime: LocalVlmRuntime;
  jobRunner: CaptionJobRunner;
  backendOptions?: BackendFactoryOptions;
  env?: NodeJS.ProcessEnv;
}

function readString(payload: Record<string, unknown>, key: string, message: string): string {
  const value = payload[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw new CaptionerError('validation', message);
  }

  return value.trim();
}

function readImagePath(payload: Record<string, unknown>): string {
  const imagePath = readString(payload, 'imagePath', 'No image path provided.');
  if (!path.isAbsolute(imagePath) || !isSupportedImageExtension(path.extname(imagePath))) {
    throw new CaptionerError('validation', `Not a supported image path: ${imagePath}`);
  }

  return imagePath;
}

function readScanMode(value: unknown, fallback: ScanMode): ScanMode {
  return value === 'recursive' || value === 'top-level' ? value : fallback;
}

function readFormat(value: unknown): TemplateFormat {
  return value === 'tag' ? 'tag' : 'captioning';
}

function readOptionalFormat(value: unknown): TemplateFormat | undefined {
  return value === 'tag' || value === 'captioning' ? value : undefined;
}

function outputDirOf(settings: CaptionerSettings): string | undefined {
  return settings.outputDir || undefined;
}

async function persistSettings(ctx: HostContext, next: CaptionerSettings): Promise<CaptionerSettings> {
  ctx.settings = next;
  await saveSettings(ctx.settingsPath, next);
  return next;
}

export function createChannelHandlers(ctx: HostContext): Map<string, ChannelHandler> {
  const handlers = new Map<string, ChannelHandler>();

  handlers.set('app:get-initial-folder', async () => {
    if (ctx.initialFolder) {
      return ctx.initialFolder;
    }

    return (await isDirectory(ctx.settings.lastFolder)) ? ctx.settings.lastFolder : null;
  });

  handlers.set('app:list-directories', (payload) => {
    const target = typeof payload.path === 'string' ? payload.path : '';
    return listDirectories(target);
  });

  handlers.set('settings:get', () => ctx.settings);

  handlers.set('settings:update', (payload) => {
    return persistSettings(ctx, normalizeSettings({ ...ctx.settings, ...payload }));
  });

  handlers.set('settings:reset', () => {
    return persistSettings(ctx, applyEnvironmentDefaults(DEFAULT_SETTINGS, ctx.env));
  });

  handlers.set('images:scan', async (payload) => {
    const folder = path.resolve(readString(payload, 'folder', 'No folder provided for image scan.'));
    const mode = readScanMode(payload.mode, ctx.settings.scanMode);
    const items = await scanImageFolder(folder, mode, outputDirOf(ctx.settings));

    if (ctx.settings.lastFolder !== folder || ctx.settings.scanMode !== mode) {
      await persistSettings(ctx, { ...ctx.settings, lastFolder: folder, scanMode: mode });
    }

    return items;
  });

  handlers.set('caption:read', async (payload) => {
    const imagePath = readImagePath(payload);
    const outputDir = outputDirOf(ctx.settings);
    return {
      captionPath: getCaptionPath(imagePath, outputDir),
      text: await readCaption(imagePath, outputDir)
    };
  });

  handlers.set('caption:save', async (payload) => {
    const imagePath = readImagePath(payload);
    const text = typeof payload.text === 'string' ? payload.text : '';
    const captionPath = await writeCaption(imagePath, text, outputDirOf(ctx.settings));
    return { captionPath };
  });

  handlers.set('caption:delete', async (payload) => {
    const imagePath = readImagePath(payload);
    return { deleted: await deleteCaption(imagePath, outputDirOf(ctx.settings)) };
  });

  handlers.set('templates:list', () => ctx.templates.list());

  handlers.set('templates:save', (payload) => {
    return ctx.templates.save({
      name: readString(payload, 'name', 'Template name is required.'),
      prompt: readString(payload, 'prompt', 'Template prompt is empty.'),
      format: readFormat(payload.format),
      allowOverwrite: payload.allowOverwrite === true
    });
  });

  handlers.set('templates:delete', async (payload) => {
    await ctx.templates.delete(readString(payload, 'name', 'Template name is required.'));
    return ctx.templates.list();
  });

  handlers.set('backends:models', () => listBackendModels());

  handlers.set('local:status', () => ctx.localRuntime.status());

  handlers.set('local:load', () => {
    const { settings } = ctx;
    return ctx.localRuntime.load({
      modelPath: settings.localModelPath,
      mmprojPath: settings.localMmprojPath,
      vlmType: settings.vlmType,
      contextSize: settings.contextSize,
      gpuLayers: settings.gpuLayers,
      serverPath: settings.llamaServerPath
    });
  });

  handlers.set('local:unload', () => {
    ctx.localRuntime.unload();
    return ctx.localRuntime.status();
  });

  handlers.set('job:start', async (payload) => {
    const rawPaths = Array.isArray(payload.imagePaths) ? payload.imagePaths : [];
    const imagePaths = rawPaths.filter(
      (entry): entry is string =>
        typeof entry === 'string' && path.isAbsolute(entry) && isSupportedImageExtension(path.extname(entry))
    );

    const { settings } = ctx;
    const template = await ctx.templates.get(settings.selectedTemplate);

    return ctx.jobRunner.start({
      imagePaths,
      backend: createBackend(settings, ctx.localRuntime, ctx.backendOptions),
      systemPrompt: settings.systemPrompt,
      format: readOptionalFormat(payload.format) ?? template?.format ?? 'captioning',
      params: generationParamsFrom(settings),
      outputDir: outputDirOf(settings),
      skipExisting: settings.skipExisting
    });
  });

  handlers.set('job:stop', () => ctx.jobRunner.stop());

  handlers.set('job:status', () => ctx.jobRunner.getStatus());

  return handlers;
}
