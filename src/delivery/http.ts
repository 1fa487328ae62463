/**
 * HTTP surface
 *
 *   POST /translate-srt   multipart form or raw SRT body → translated SRT
 *   GET  /health          liveness probe
 */

import http from 'http';
import type { AddressInfo } from 'net';
import { v4 as uuidv4 } from 'uuid';
import { t } from '@/i18n';
import { InvalidRequestError, getReadableErrorMessage } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';
import type { BackendResolver } from '@/services/translator/TranslatorService';
import type { TranslatorSettings } from '@/types/settings';
import type { FailurePolicy, TranslationMode } from '@/types/translation';
import { toDeliveryError, translateSubtitle, type SubtitleRequest } from './translateSubtitle';

export interface TranslationServerOptions {
  resolver: BackendResolver;
  settings: TranslatorSettings;
}

const TRANSLATE_PATH = '/translate-srt';
const HEALTH_PATH = '/health';

const MODES: readonly TranslationMode[] = ['api', 'offline'];
const POLICIES: readonly FailurePolicy[] = ['strict', 'lenient'];

function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer> {
  const tooLarge = () => new InvalidRequestError(t('errors.request.tooLarge', { limit }), 413);

  return new Promise((resolve, reject) => {
    const declared = Number(req.headers['content-length']);
    if (Number.isFinite(declared) && declared > limit) {
      req.resume();
      reject(tooLarge());
      return;
    }

    const chunks: Buffer[] = [];
    let size = 0;
    let exceeded = false;
    req.on('data', (chunk: Buffer) => {
      if (exceeded) return;
      size += chunk.length;
      if (size > limit) {
        exceeded = true;
        chunks.length = 0;
        reject(tooLarge());
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!exceeded) resolve(Buffer.concat(chunks));
    });
    req.on('error', reject);
  });
}

function pickEnum<T extends string>(field: string, value: string | undefined, allowed: readonly T[]): T | undefined {
  if (value === undefined || value === '') return undefined;
  const match = allowed.find((option) => option === value);
  if (!match) {
    throw new InvalidRequestError(t('errors.request.invalidField', { field, value }));
  }
  return match;
}

interface ParsedUpload {
  content: Uint8Array;
  fileName?: string;
  fields: Map<string, string>;
}

async function parseUpload(req: http.IncomingMessage, body: Buffer, url: URL): Promise<ParsedUpload> {
  const contentType = req.headers['content-type'] ?? '';

  if (contentType.toLowerCase().startsWith('multipart/form-data')) {
    let form: FormData;
    try {
      form = await new Response(new Uint8Array(body), {
        headers: { 'content-type': contentType },
      }).formData();
    } catch (error) {
      throw new InvalidRequestError(t('errors.request.malformedForm', { detail: getReadableErrorMessage(error) }));
    }

    const fields = new Map<string, string>();
    for (const [name, value] of form.entries()) {
      if (typeof value === 'string') fields.set(name, value);
    }
    const file = form.get('file');
    if (file === null || typeof file === 'string') {
      throw new InvalidRequestError(t('errors.request.missingFile'));
    }
    return { content: new Uint8Array(await file.arrayBuffer()), fileName: file.name, fields };
  }

  if (body.length === 0) {
    throw new InvalidRequestError(t('errors.request.missingFile'));
  }
  return {
    content: body,
    fileName: url.searchParams.get('filename') ?? undefined,
    fields: new Map(url.searchParams),
  };
}

/** ASCII fallback plus RFC 5987 form for names outside it */
function contentDisposition(fileName: string): string {
  const ascii = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown, headers: http.OutgoingHttpHeaders = {}) {
  res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8', ...headers });
  res.end(JSON.stringify(body));
}

export function createTranslationServer(options: TranslationServerOptions): http.Server {
  const { resolver, settings } = options;

  const handleTranslate = async (
    req: http.IncomingMessage,
    res: http.ServerResponse,
    url: URL,
    signal: AbortSignal
  ) => {
    const body = await readBody(req, settings.maxUploadBytes);
    const upload = await parseUpload(req, body, url);
    const field = (name: string) => upload.fields.get(name)?.trim() || undefined;

    const request: SubtitleRequest = {
      content: upload.content,
      fileName: upload.fileName,
      source: field('source_lang') ?? settings.sourceLanguage,
      target: field('target_lang') ?? settings.targetLanguage,
      mode: pickEnum('mode', field('mode'), MODES) ?? settings.mode,
      policy: pickEnum('policy', field('policy'), POLICIES),
      apiUrl: field('api_url'),
      signal,
    };

    const result = await translateSubtitle(request, { resolver, settings });
    res.writeHead(200, {
      'Content-Type': 'text/plain; charset=utf-8',
      'Content-Disposition': contentDisposition(result.fileName),
      'X-Translation-Backend': result.report.servedBy,
      'X-Translation-Fallback': String(result.report.fellBack),
    });
    res.end(result.content);
  };

  return http.createServer((req, res) => {
    const requestId = uuidv4();
    const startTime = Date.now();
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        logger.info(`[HTTP] ${requestId} client disconnected, cancelling`);
        controller.abort();
      }
    });

    const route = async () => {
      if (url.pathname === HEALTH_PATH) {
        if (method !== 'GET') {
          throw new InvalidRequestError(t('errors.request.methodNotAllowed', { method, path: url.pathname }), 405);
        }
        sendJson(res, 200, { status: 'ok' });
        return;
      }
      if (url.pathname === TRANSLATE_PATH) {
        if (method !== 'POST') {
          throw new InvalidRequestError(t('errors.request.methodNotAllowed', { method, path: url.pathname }), 405);
        }
        await handleTranslate(req, res, url, controller.signal);
        return;
      }
      throw new InvalidRequestError(t('errors.request.notFound', { method, path: url.pathname }), 404);
    };

    void route()
      .catch((error: unknown) => {
        const failure = toDeliveryError(error);
        if (res.headersSent || res.destroyed) return;
        const { kind, message, block, line } = failure;
        const allow = failure.status === 405 ? { Allow: url.pathname === HEALTH_PATH ? 'GET' : 'POST' } : {};
        sendJson(res, failure.status, { error: { kind, message, block, line } }, allow);
      })
      .finally(() => {
        logger.info(`[HTTP] ${requestId} ${method} ${url.pathname} → ${res.statusCode} in ${Date.now() - startTime}ms`);
      });
  });
}

/**
 * Starts listening and resolves with the bound address (useful with port 0).
 */
export function listen(server: http.Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error(`Unexpected server address: ${String(address)}`));
        return;
      }
      resolve(address);
    });
  });
}
