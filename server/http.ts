import { promises as fs } from 'node:fs';
import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from 'node:http';
import path from 'node:path';
import type { ApiEnvelope } from '../src/types';
import type { ChannelHandler } from './channels';
import { CaptionerError, errorCodeOf, statusForError, toErrorMessage } from './errors';
import { renderThumbnail } from './imageEncoder';
import { isSupportedImageExtension } from './imageScanner';
import type { Logger } from './logger';

const MAX_BODY_BYTES = 10 * 1024 * 1024;
const THUMBNAIL_SIZE = 160;
const LOOPBACK_HOSTNAMES = new Set(['127.0.0.1', 'localhost', '[::1]']);

export interface HttpResult {
  status: number;
  headers: Record<string, string>;
  body: string | Uint8Array;
}

export function getContentTypeForExtension(extension: string): string {
  switch (extension) {
    case '.png':
      return 'image/png';
    case '.jpg':
    case '.jpeg':
      return 'image/jpeg';
    case '.gif':
      return 'image/gif';
    case '.webp':
      return 'image/webp';
    case '.html':
      return 'text/html; charset=utf-8';
    case '.js':
      return 'text/javascript; charset=utf-8';
    case '.css':
      return 'text/css; charset=utf-8';
    case '.svg':
      return 'image/svg+xml';
    case '.json':
      return 'application/json; charset=utf-8';
    default:
      return 'application/octet-stream';
  }
}

function jsonResult<T>(status: number, envelope: ApiEnvelope<T>): HttpResult {
  return {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8', 'cache-control': 'no-store' },
    body: JSON.stringify(envelope)
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseChannelPayload(rawBody: string): Record<string, unknown> {
  if (!rawBody.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch {
    throw new CaptionerError('validation', 'Request body is not valid JSON.');
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isRecord(parsed)) {
    throw new CaptionerError('validation', 'Request body must be a JSON object.');
  }

  return parsed;
}

export async function dispatchChannel(
  handlers: Map<string, ChannelHandler>,
  channel: string,
  rawBody: string,
  log?: Logger
): Promise<HttpResult> {
  const handler = handlers.get(channel);
  if (!handler) {
    return jsonResult(404, { ok: false, error: { code: 'not_found', message: `Unknown channel: ${channel}` } });
  }

  try {
    const payload = parseChannelPayload(rawBody);
    const data = await handler(payload);
    return jsonResult(200, { ok: true, data: data ?? null });
  } catch (error) {
    const status = statusForError(error);
    if (status >= 500) {
      log?.error(`${channel} failed: ${toErrorMessage(error)}`);
    } else {
      log?.debug(`${channel} rejected: ${toErrorMessage(error)}`);
    }

    return jsonResult(status, { ok: false, error: { code: errorCodeOf(error), message: toErrorMessage(error) } });
  }
}

function textResult(status: number, message: string): HttpResult {
  return { status, headers: { 'content-type': 'text/plain; charset=utf-8' }, body: message };
}

function safeDecode(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

function isLoopbackAuthority(value: string, scheme: string): boolean {
  try {
    return LOOPBACK_HOSTNAMES.has(new URL(`${scheme}${value}`).hostname);
  } catch {
    return false;
  }
}

/** The channel named by an `/api/<channel>` path, or null when the name is not valid percent-encoding. */
export function channelFromPath(pathname: string): string | null {
  return safeDecode(pathname.slice('/api/'.length));
}

/**
 * Channel calls must come from a page served on this machine as JSON. Browsers cannot send
 * `application/json` cross-origin without a preflight, and the Host check stops DNS rebinding.
 */
export function checkApiRequest(headers: IncomingHttpHeaders): HttpResult | null {
  const host = headers.host ?? '';
  if (!isLoopbackAuthority(host, 'http://')) {
    return jsonResult(403, { ok: false, error: { code: 'validation', message: 'Requests must be addressed to localhost.' } });
  }

  const origin = headers.origin;
  if (origin !== undefined && !isLoopbackAuthority(origin, '')) {
    return jsonResult(403, { ok: false, error: { code: 'validation', message: `Origin ${origin} is not allowed.` } });
  }

  const contentType = (headers['content-type'] ?? '').split(';')[0]?.trim().toLowerCase();
  if (contentType !== 'application/json') {
    return jsonResult(415, {
      ok: false,
      error: { code: 'validation', message: 'Channel requests must be sent as application/json.' }
    });
  }

  return null;
}

export async function serveDatasetImage(url: URL): Promise<HttpResult> {
  const imagePath = url.searchParams.get('path') ?? '';
  const thumb = url.searchParams.get('thumb') === '1';
  const extension = path.extname(imagePath).toLowerCase();

  if (!path.isAbsolute(imagePath) || !isSupportedImageExtension(extension)) {
    return textResult(400, 'Invalid dataset path');
  }

  try {
    if (thumb) {
      const buffer = await renderThumbnail(imagePath, THUMBNAIL_SIZE);
      return {
        status: 200,
        headers: { 'content-type': 'image/webp', 'cache-control': 'no-cache' },
        body: new Uint8Array(buffer)
      };
    }

    const buffer = await fs.readFile(imagePath);
    return {
      status: 200,
      headers: { 'content-type': getContentTypeForExtension(extension), 'cache-control': 'no-cache' },
      body: new Uint8Array(buffer)
    };
  } catch {
    return textResult(404, 'Unable to read dataset image');
  }
}

export async function serveStatic(staticRoot: string, pathname: string): Promise<HttpResult> {
  const decoded = safeDecode(pathname);
  if (decoded === null) {
    return textResult(404, 'Not found');
  }

  const relative = decoded.replace(/^\/+/, '') || 'index.html';
  const resolved = path.resolve(staticRoot, relative);

  if (resolved !== staticRoot && !resolved.startsWith(`${staticRoot}${path.sep}`)) {
    return textResult(403, 'Forbidden');
  }

  const candidates = [resolved, path.join(staticRoot, 'index.html')];
  for (const candidate of candidates) {
    try {
      const body = await fs.readFile(candidate);
      return {
        status: 200,
        headers: { 'content-type': getContentTypeForExtension(path.extname(candidate).toLowerCase()) },
        body: new Uint8Array(body)
      };
    } catch {
      continue;
    }
  }

  return textResult(404, 'Renderer not built. Run `npm run build` or use `npm run dev`.');
}

function readBody(request: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    request.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new CaptionerError('validation', 'Request body is too large.'));
        request.destroy();
        return;
      }

      chunks.push(chunk);
    });
    request.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    request.on('error', reject);
  });
}

function send(response: ServerResponse, result: HttpResult): void {
  response.writeHead(result.status, result.headers);
  response.end(result.body);
}

export interface RequestListenerOptions {
  handlers: Map<string, ChannelHandler>;
  staticRoot: string | null;
  logger: Logger;
}

export function createRequestListener(options: RequestListenerOptions) {
  const { handlers, staticRoot, logger } = options;

  const route = async (request: IncomingMessage): Promise<HttpResult> => {
    const url = new URL(request.url ?? '/', 'http://localhost');

    if (url.pathname.startsWith('/api/')) {
      if (request.method !== 'POST') {
        return textResult(405, 'Method not allowed');
      }

      const rejected = checkApiRequest(request.headers);
      if (rejected) {
        return rejected;
      }

      const channel = channelFromPath(url.pathname);
      if (channel === null) {
        return jsonResult(400, { ok: false, error: { code: 'validation', message: 'Malformed channel name.' } });
      }

      let rawBody: string;
      try {
        rawBody = await readBody(request);
      } catch (error) {
        return jsonResult(statusForError(error), {
          ok: false,
          error: { code: errorCodeOf(error), message: toErrorMessage(error) }
        });
      }

      return dispatchChannel(handlers, channel, rawBody, logger);
    }

    if (url.pathname === '/dataset/image') {
      return serveDatasetImage(url);
    }

    if (staticRoot && (request.method === 'GET' || request.method === 'HEAD')) {
      return serveStatic(staticRoot, url.pathname);
    }

    return textResult(404, 'Not found');
  };

  return (request: IncomingMessage, response: ServerResponse): void => {
    route(request)
      .then((result) => send(response, result))
      .catch((error: unknown) => {
        logger.error(`Unhandled error for ${request.method ?? 'GET'} ${request.url ?? '/'}`, error);
        send(response, textResult(500, 'Internal error'));
      });
  };
}
