import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { randomUUID } from 'node:crypto';
import { parseAnalyzeRequest, formatValidationErrors } from '../api/payload.js';
import { toFeedbackBody, type DeskSetupBody } from '../api/response.js';
import { analyzePosture } from '../engine/index.js';
import { getDeskSetupTips } from '../engine/content.js';
import { getLogger, toErrorContext, type LogWriter } from '../observability/logger.js';
import type { ValidationError } from '../config/schema.js';

export const MAX_BODY_BYTES = 1024 * 1024;

export interface ServerConfig {
  host: string;
  port: number;
  corsOrigins: readonly string[];
}

class RequestBodyError extends Error {
  constructor(
    readonly statusCode: number,
    readonly errors: ValidationError[]
  ) {
    super(formatValidationErrors(errors));
    this.name = 'RequestBodyError';
  }
}

type Route = (req: http.IncomingMessage, res: http.ServerResponse, log: LogWriter) => Promise<void>;

export class PostureServer {
  private server: http.Server | null = null;
  private config: ServerConfig;
  private routes: Map<string, Map<string, Route>>;

  constructor(config: ServerConfig) {
    this.config = config;
    this.routes = new Map([
      ['/', new Map<string, Route>([['GET', (_req, res) => this.handleRoot(res)]])],
      ['/favicon.ico', new Map<string, Route>([['GET', (_req, res) => this.handleFavicon(res)]])],
      ['/analyze_posture', new Map<string, Route>([['POST', (req, res, log) => this.handleAnalyze(req, res, log)]])],
      ['/desk_setup', new Map<string, Route>([['GET', (_req, res, log) => this.handleDeskSetup(res, log)]])],
    ]);
  }

  async start(): Promise<void> {
    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch(err => {
        getLogger().error('Request handler error', toErrorContext(err));
        if (!res.headersSent) {
          sendJson(res, 500, { detail: 'Internal Server Error' });
        }
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        const { port } = this.address();
        getLogger().info('Server listening', { url: `http://${this.config.host}:${port}` });
        getLogger().info('Allowed CORS origins', { origins: this.config.corsOrigins });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    return new Promise((resolve, reject) => {
      server.close(err => {
        if (err) {
          reject(err);
          return;
        }
        this.server = null;
        resolve();
      });
    });
  }

  address(): AddressInfo {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    return address;
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const method = req.method ?? 'GET';
    const log = getLogger().child({ requestId: randomUUID(), method, path: url.pathname });

    this.applyCors(req, res);

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const byMethod = this.routes.get(url.pathname);
    if (!byMethod) {
      sendJson(res, 404, { detail: 'Not Found' });
      return;
    }

    const route = byMethod.get(method);
    if (!route) {
      res.setHeader('Allow', [...byMethod.keys()].join(', '));
      sendJson(res, 405, { detail: 'Method Not Allowed' });
      return;
    }

    log.debug('Handling request');
    await route(req, res, log);
  }

  private applyCors(req: http.IncomingMessage, res: http.ServerResponse): void {
    const origin = req.headers.origin;
    if (origin === undefined) return;

    const allowed = this.config.corsOrigins.includes('*') || this.config.corsOrigins.includes(origin);
    if (!allowed) return;

    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Access-Control-Allow-Credentials', 'true');
    res.setHeader('Vary', 'Origin');

    if (req.method === 'OPTIONS') {
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', req.headers['access-control-request-headers'] ?? '*');
    }
  }

  private async handleRoot(res: http.ServerResponse): Promise<void> {
    sendJson(res, 200, { message: 'Posture Assistant API is running!' });
  }

  private async handleFavicon(res: http.ServerResponse): Promise<void> {
    res.writeHead(204);
    res.end();
  }

  private async handleDeskSetup(res: http.ServerResponse, log: LogWriter): Promise<void> {
    log.info('Desk setup tips requested');
    const body: DeskSetupBody = { tips: getDeskSetupTips() };
    sendJson(res, 200, body);
  }

  private async handleAnalyze(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    log: LogWriter
  ): Promise<void> {
    let body: unknown;
    try {
      body = await readJsonBody(req);
    } catch (error) {
      if (error instanceof RequestBodyError) {
        log.warn('Rejected request body', { status: error.statusCode, reason: error.message });
        sendJson(res, error.statusCode, { detail: error.errors });
        return;
      }
      throw error;
    }

    const parsed = parseAnalyzeRequest(body);
    if (!parsed.ok) {
      log.warn('Invalid analysis payload', { errors: formatValidationErrors(parsed.errors) });
      sendJson(res, 422, { detail: parsed.errors });
      return;
    }

    const { metrics, issues } = parsed.value;
    log.info('Received posture analysis request', {
      metrics,
      issues: issues.map(issue => issue.text),
    });

    try {
      const done = getLogger().time('Posture analysis');
      const result = analyzePosture(metrics, issues);
      done();
      sendJson(res, 200, toFeedbackBody(result));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('Internal error during analysis', toErrorContext(error));
      sendJson(res, 500, { detail: `Internal error during analysis: ${message}` });
    }
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  // Oversized bodies are drained before the 413 goes out.
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size <= MAX_BODY_BYTES) {
      chunks.push(buffer);
    }
  }

  if (size > MAX_BODY_BYTES) {
    throw new RequestBodyError(413, [{ path: 'body', message: `Exceeds ${MAX_BODY_BYTES} bytes` }]);
  }

  const text = Buffer.concat(chunks).toString('utf-8');
  if (text.trim() === '') {
    throw new RequestBodyError(422, [{ path: 'body', message: 'Field required' }]);
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new RequestBodyError(422, [{ path: 'body', message: 'Invalid JSON' }]);
  }
}
