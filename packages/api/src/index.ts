#!/usr/bin/env node

/**
 * REST API server for yomikata
 * Exposes furigana highlighting and word alignment via HTTP endpoints
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import {
  alignReading,
  checkWordReadingType,
  createContext,
  createKuromojiAnalyzer,
  getConnectionFromEnv,
  highlightText,
  isKana,
  JsonKanjiSource,
  PostgresKanjiSource,
  setConnection,
  closeConnection,
  type FuriganaMode,
  type HighlightContext,
  type HighlightOptions,
  type MorphAnalyzer,
  wordHighlight
} from '@yomikata/core';
import { config } from 'dotenv';

const MAX_JSON_BODY_SIZE = 1 * 1024 * 1024; // 1 MiB
const MODES: readonly FuriganaMode[] = ['furigana', 'furikanji', 'kana_only'];

export class JsonBodyError extends Error {
  status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = 'JsonBodyError';
    this.status = status;
  }
}

/**
 * Parse JSON body from request
 */
export async function parseJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    const contentLengthHeader = req.headers['content-length'];
    if (contentLengthHeader) {
      const contentLength = Number(contentLengthHeader);
      if (Number.isFinite(contentLength) && contentLength > MAX_JSON_BODY_SIZE) {
        reject(new JsonBodyError('Payload too large', 413));
        return;
      }
    }

    const abort = (error: JsonBodyError) => {
      req.destroy();
      reject(error);
    };

    req.on('data', (chunk: Buffer) => {
      received += chunk.length;
      if (received > MAX_JSON_BODY_SIZE) {
        abort(new JsonBodyError('Payload too large', 413));
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      // Decode once so a character split across chunks survives
      const body = Buffer.concat(chunks).toString('utf8');
      if (!body) {
        reject(new JsonBodyError('Empty body'));
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch {
        reject(new JsonBodyError('Invalid JSON'));
      }
    });

    req.on('error', (err) => {
      reject(err instanceof JsonBodyError ? err : new JsonBodyError(String(err), 400));
    });
  });
}

export interface ApiRequest {
  method: string;
  pathname: string;
  /** Parsed JSON body, POST only */
  body?: unknown;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || !value) {
    throw new JsonBodyError(`Missing required field: ${field}`);
  }
  return value;
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new JsonBodyError(`Field ${field} must be a string`);
  return value;
}

function optionalBoolean(body: Record<string, unknown>, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw new JsonBodyError(`Field ${field} must be a boolean`);
  return value;
}

export function parseHighlightBody(body: unknown): { text: string; options: HighlightOptions } {
  if (!isRecord(body)) throw new JsonBodyError('Body must be a JSON object');

  const mode = optionalString(body, 'mode');
  const returnType = mode === undefined ? undefined : MODES.find((candidate) => candidate === mode);
  if (mode !== undefined && !returnType) {
    throw new JsonBodyError(`Unknown mode: ${mode} (expected ${MODES.join(', ')})`);
  }

  return {
    text: requireString(body, 'text'),
    options: {
      kanjiToHighlight: optionalString(body, 'kanji') ?? null,
      returnType,
      withTags: optionalBoolean(body, 'tags'),
      mergeConsecutive: optionalBoolean(body, 'merge'),
      onyomiToKatakana: optionalBoolean(body, 'katakana'),
      includeSuruOkuri: optionalBoolean(body, 'includeSuruOkuri')
    }
  };
}

const API_DOCS = {
  name: 'yomikata REST API',
  version: '0.1.0',
  endpoints: {
    'GET /health': 'Health check',
    'POST /api/highlight': 'Align and highlight furigana (body: {text: string, kanji?: string, mode?: "furigana"|"furikanji"|"kana_only", tags?: boolean, merge?: boolean, katakana?: boolean, includeSuruOkuri?: boolean})',
    'POST /api/align': 'Align one word\'s reading to its kanji (body: {word: string, reading: string, okurigana?: string})',
    'POST /api/word-highlight': 'Bold a dictionary-form word and its inflections (body: {text: string, word: string})'
  },
  examples: {
    highlight: {
      url: '/api/highlight',
      body: { text: '漢字[かんじ]を 書[か]く', kanji: '字' }
    },
    align: {
      url: '/api/align',
      body: { word: '食', reading: 'た', okurigana: 'べる' }
    },
    wordHighlight: {
      url: '/api/word-highlight',
      body: { text: '私は 食[た]べている', word: '食[た]べる' }
    }
  }
};

/**
 * Route a request with an already parsed body. Errors other than bad input
 * propagate to the caller.
 */
export async function routeRequest(request: ApiRequest, context: HighlightContext): Promise<ApiResponse> {
  const { method, pathname } = request;

  if (pathname === '/health' && method === 'GET') {
    return { status: 200, body: { status: 'ok', timestamp: new Date().toISOString() } };
  }

  if (pathname === '/api' && method === 'GET') {
    return { status: 200, body: API_DOCS };
  }

  try {
    if (pathname === '/api/highlight' && method === 'POST') {
      const { text, options } = parseHighlightBody(request.body);
      const result = await highlightText(text, options, context);
      return { status: 200, body: { text, result, readingType: checkWordReadingType(result) } };
    }

    if (pathname === '/api/align' && method === 'POST') {
      if (!isRecord(request.body)) throw new JsonBodyError('Body must be a JSON object');
      const word = requireString(request.body, 'word');
      const reading = requireString(request.body, 'reading');
      if (!isKana(reading)) throw new JsonBodyError('Field reading must be kana');
      const okurigana = optionalString(request.body, 'okurigana') ?? '';
      const aligned = await alignReading(word, reading, okurigana, context);
      return { status: 200, body: { input: { word, reading, okurigana }, ...aligned } };
    }

    if (pathname === '/api/word-highlight' && method === 'POST') {
      if (!isRecord(request.body)) throw new JsonBodyError('Body must be a JSON object');
      const text = requireString(request.body, 'text');
      const word = requireString(request.body, 'word');
      const result = await wordHighlight(text, word, context);
      return { status: 200, body: { text, word, result } };
    }
  } catch (error) {
    if (error instanceof JsonBodyError) {
      return { status: error.status, body: { error: error.message } };
    }
    throw error;
  }

  return { status: 404, body: { error: 'Not found' } };
}

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

/**
 * Send error response
 */
function sendError(res: ServerResponse, message: string, status = 400): void {
  sendJson(res, { error: message }, status);
}

/**
 * Main request handler
 */
export async function handleRequest(req: IncomingMessage, res: ServerResponse, context: HighlightContext): Promise<void> {
  const requestId = Math.random().toString(36).substring(7);
  const startTime = Date.now();
  const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
  const method = req.method ?? 'GET';

  // CORS headers
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

  // Handle OPTIONS for CORS preflight
  if (method === 'OPTIONS') {
    res.writeHead(204);
    res.end();
    console.log(`[api] ${requestId} OPTIONS ${url.pathname} -> 204 (${Date.now() - startTime}ms)`);
    return;
  }

  let status = 500;
  try {
    const body = method === 'POST' ? await parseJsonBody(req) : undefined;
    const response = await routeRequest({ method, pathname: url.pathname, body }, context);
    status = response.status;
    sendJson(res, response.body, status);
  } catch (error) {
    if (error instanceof JsonBodyError) {
      status = error.status;
      sendError(res, error.message, status);
    } else {
      console.error(`[api] ${requestId} Request error:`, error);
      sendError(res, error instanceof Error ? error.message : 'Internal server error', 500);
    }
  }
  console.log(`[api] ${requestId} ${method} ${url.pathname} -> ${status} (${Date.now() - startTime}ms)`);
}

async function loadAnalyzer(): Promise<MorphAnalyzer | null> {
  try {
    return await createKuromojiAnalyzer();
  } catch (error) {
    console.warn('kuromoji unavailable, okurigana from conjugation tables only:', error instanceof Error ? error.message : error);
    return null;
  }
}

/**
 * Start the server
 */
async function main(): Promise<void> {
  config();
  const port = parseInt(process.env.PORT || '3000', 10);
  const host = process.env.HOST || '0.0.0.0';

  // PostgreSQL when configured, the bundled JSON otherwise
  const connSpec = getConnectionFromEnv();
  if (connSpec) {
    setConnection(connSpec);
    console.log('Database connection configured');
  }
  const context = createContext({
    source: connSpec ? new PostgresKanjiSource() : new JsonKanjiSource(),
    analyzer: await loadAnalyzer()
  });

  const server = createServer((req, res) => {
    handleRequest(req, res, context).catch((error) => {
      console.error('Unhandled request failure:', error);
    });
  });

  server.listen(port, host, () => {
    console.log(`yomikata API server listening on http://${host}:${port}`);
    console.log(`Health check: http://${host}:${port}/health`);
    console.log(`API docs: http://${host}:${port}/api`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      closeConnection()
        .catch((error) => console.error('Failed to close database connection:', error))
        .finally(() => {
          console.log('Server closed');
          process.exit(0);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Run server if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(2);
  });
}
