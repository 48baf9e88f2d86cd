import 'dotenv/config';
import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import http from 'node:http';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { LocalVlmRuntime } from './backends/localVlm';
import { CaptionJobRunner } from './captionJob';
import { createChannelHandlers } from './channels';
import type { HostContext } from './channels';
import { isDirectory } from './directories';
import { toErrorMessage } from './errors';
import { createRequestListener } from './http';
import { logger } from './logger';
import { resolveConfigDir, settingsFilePath, templatesFilePath } from './paths';
import { applyEnvironmentDefaults, loadSettings } from './settings';
import { TemplateStore } from './templates';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DEFAULT_PORT = 4178;
const DEFAULT_HOST = '127.0.0.1';

export interface CliOptions {
  folder: string | null;
  port: number;
  open: boolean;
}

function parsePort(value: string | undefined, fallback: number): number {
  const port = Number(value);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : fallback;
}

export function parseCliArgs(args: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const options: CliOptions = { folder: null, port: parsePort(env.PORT, DEFAULT_PORT), open: true };

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (!arg) {
      continue;
    }

    if (arg === '--no-open') {
      options.open = false;
    } else if (arg === '--port') {
      options.port = parsePort(args[index + 1], options.port);
      index += 1;
    } else if (arg.startsWith('--port=')) {
      options.port = parsePort(arg.slice('--port='.length), options.port);
    } else if (!arg.startsWith('-') && options.folder === null) {
      options.folder = path.resolve(arg);
    }
  }

  return options;
}

export async function resolveInitialFolder(candidate: string | null): Promise<string | null> {
  if (!candidate) {
    return null;
  }

  return (await isDirectory(candidate)) ? candidate : null;
}

function openInBrowser(url: string): void {
  const command = process.platform === 'win32' ? 'cmd' : process.platform === 'darwin' ? 'open' : 'xdg-open';
  const args = process.platform === 'win32' ? ['/c', 'start', '', url] : [url];

  const child = spawn(command, args, { stdio: 'ignore', detached: true });
  child.on('error', (error) => {
    logger.warn(`Unable to open a browser: ${toErrorMessage(error)}. Visit ${url} instead.`);
  });
  child.unref();
}

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));
  const host = process.env.HOST?.trim() || DEFAULT_HOST;
  const configDir = resolveConfigDir();
  const settingsPath = settingsFilePath(configDir);
  const log = logger.child('http');

  const localRuntime = new LocalVlmRuntime();
  const context: HostContext = {
    settingsPath,
    settings: applyEnvironmentDefaults(await loadSettings(settingsPath)),
    initialFolder: await resolveInitialFolder(cli.folder),
    templates: new TemplateStore(templatesFilePath(configDir)),
    localRuntime,
    jobRunner: new CaptionJobRunner()
  };

  const distDir = path.resolve(__dirname, '..', 'dist');
  const staticRoot = existsSync(path.join(distDir, 'index.html')) ? distDir : null;

  const server = http.createServer(createRequestListener({ handlers: createChannelHandlers(context), staticRoot, logger: log }));

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    context.jobRunner.stop();
    localRuntime.unload();
    server.close(() => process.exit(0));
    server.closeAllConnections();
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  server.listen(cli.port, host, () => {
    const url = `http://${host}:${cli.port}/`;
    logger.info(`Config directory: ${configDir}`);
    logger.info(staticRoot ? `Serving renderer at ${url}` : `API listening at ${url} (renderer not built)`);

    if (cli.open && staticRoot) {
      openInBrowser(url);
    }
  });
}

const entryScript = process.argv[1];
const isEntryPoint = entryScript !== undefined && path.resolve(entryScript) === __filename;

if (isEntryPoint) {
  main().catch((error: unknown) => {
    logger.error(`Failed to start: ${toErrorMessage(error)}`);
    process.exitCode = 1;
  });
}
