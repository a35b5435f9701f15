import http, { IncomingMessage, ServerResponse, STATUS_CODES } from 'http';
import type { AddressInfo } from 'net';
import type { Duplex } from 'stream';
import { MAX_TIMER_DELAY_MS } from '../config';
import { BindError, RequestError, handleError, toError } from '../utils/errors';
import { log } from '../utils/logger';
import type { ApplicationHandle, HeaderValue, HttpRequest } from '../types';

export interface HttpServerOptions {
  host: string;
  port: number;
  maxBodyBytes: number;
}

export interface CloseResult {
  /** True when connections were still open at the end of the grace period */
  forced: boolean;
}

// 这些状态码不允许带响应体
const BODILESS_STATUSES = new Set([204, 304]);

interface OutgoingResponse {
  status: number;
  headers: Record<string, HeaderValue>;
  body: Buffer;
}

function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > limit) {
    req.resume();
    return Promise.reject(new RequestError(`Request body exceeds ${limit} bytes`, 413));
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;

    req.on('data', (chunk: Buffer) => {
      if (settled) {
        return;
      }
      size += chunk.length;
      if (size > limit) {
        settled = true;
        reject(new RequestError(`Request body exceeds ${limit} bytes`, 413));
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      if (!settled) {
        settled = true;
        resolve(Buffer.concat(chunks));
      }
    });

    req.on('error', (error) => {
      if (!settled) {
        settled = true;
        reject(new RequestError(`Failed to read request body: ${error.message}`, 400, error));
      }
    });
  });
}

function toHttpRequest(req: IncomingMessage, body: Buffer): HttpRequest {
  const url = req.url ?? '/';
  const queryStart = url.indexOf('?');

  return {
    method: req.method ?? 'GET',
    url,
    path: queryStart === -1 ? url : url.slice(0, queryStart),
    query: new URLSearchParams(queryStart === -1 ? '' : url.slice(queryStart + 1)),
    headers: req.headers,
    body,
    remoteAddress: req.socket.remoteAddress
  };
}

function isHeaderValue(value: unknown): value is HeaderValue {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    (Array.isArray(value) && value.every((item) => typeof item === 'string'))
  );
}

function invalidResponse(reason: string): RequestError {
  return new RequestError(`Application returned an invalid response: ${reason}`, 500);
}

/**
 * Validates what the application returned and encodes the body. Throws a
 * RequestError for anything that cannot be written as an HTTP response.
 */
export function normalizeResponse(result: unknown): OutgoingResponse {
  if (typeof result !== 'object' || result === null) {
    throw invalidResponse('expected an object with a status');
  }

  const status: unknown = Reflect.get(result, 'status');
  if (typeof status !== 'number' || !Number.isInteger(status) || status < 200 || status > 599) {
    throw invalidResponse(`status ${String(status)} is not a final HTTP status code`);
  }

  const headers: Record<string, HeaderValue> = {};
  const rawHeaders: unknown = Reflect.get(result, 'headers');
  if (rawHeaders !== undefined) {
    if (typeof rawHeaders !== 'object' || rawHeaders === null) {
      throw invalidResponse('headers must be an object');
    }
    for (const [name, value] of Object.entries(rawHeaders)) {
      if (!isHeaderValue(value)) {
        throw invalidResponse(`header ${name} has an unsupported value`);
      }
      headers[name.toLowerCase()] = value;
    }
  }

  const rawBody: unknown = Reflect.get(result, 'body');
  let body: Buffer;
  let contentType: string;
  if (rawBody === undefined || rawBody === null) {
    body = Buffer.alloc(0);
    contentType = 'text/plain; charset=utf-8';
  } else if (Buffer.isBuffer(rawBody)) {
    body = rawBody;
    contentType = 'application/octet-stream';
  } else if (typeof rawBody === 'string') {
    body = Buffer.from(rawBody, 'utf8');
    contentType = 'text/plain; charset=utf-8';
  } else if (typeof rawBody === 'object') {
    body = Buffer.from(JSON.stringify(rawBody), 'utf8');
    contentType = 'application/json; charset=utf-8';
  } else {
    throw invalidResponse(`unsupported body type ${typeof rawBody}`);
  }

  if (BODILESS_STATUSES.has(status)) {
    delete headers['content-length'];
    return { status, headers, body: Buffer.alloc(0) };
  }

  if (body.length > 0 && headers['content-type'] === undefined) {
    headers['content-type'] = contentType;
  }
  headers['content-length'] = body.length;

  return { status, headers, body };
}

function errorResponse(statusCode: number): OutgoingResponse {
  const body = Buffer.from(JSON.stringify({ statusCode, message: STATUS_CODES[statusCode] ?? 'Error' }), 'utf8');
  return {
    status: statusCode,
    headers: {
      'content-type': 'application/json; charset=utf-8',
      'content-length': body.length
    },
    body
  };
}

/**
 * HTTP/1.1 server that hands every request to an application handle.
 * Failures inside a request are answered and logged; they never reach the
 * process.
 */
export class HttpServer {
  private readonly server: http.Server;
  private activeRequests = 0;
  private draining = false;
  private closing?: Promise<CloseResult>;

  constructor(
    private readonly application: ApplicationHandle,
    private readonly options: HttpServerOptions
  ) {
    this.server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        handleError(toError(error), 'http');
      });
    });
    this.server.on('clientError', (error: NodeJS.ErrnoException, socket: Duplex) => this.handleClientError(error, socket));
  }

  get inFlight(): number {
    return this.activeRequests;
  }

  get listening(): boolean {
    return this.server.listening;
  }

  address(): AddressInfo | null {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address : null;
  }

  /**
   * Binds the listening socket. Rejects with a BindError when the address is
   * in use or not permitted.
   */
  listen(): Promise<AddressInfo> {
    const { host, port } = this.options;

    return new Promise((resolve, reject) => {
      const onError = (error: NodeJS.ErrnoException) => {
        this.server.off('listening', onListening);
        reject(new BindError(host, port, error));
      };
      const onListening = () => {
        this.server.off('error', onError);
        this.server.on('error', (error) => handleError(error, 'http'));

        const address = this.address();
        if (!address) {
          reject(new Error(`Server bound to an unexpected address on ${host}:${port}`));
          return;
        }
        resolve(address);
      };

      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen(port, host);
    });
  }

  /**
   * Stops accepting connections and waits for in-flight requests. Connections
   * still open after `gracePeriodMs` are reset.
   */
  close(gracePeriodMs: number): Promise<CloseResult> {
    if (this.closing) {
      return this.closing;
    }
    this.draining = true;

    if (!this.server.listening) {
      this.closing = Promise.resolve({ forced: false });
      return this.closing;
    }

    this.closing = new Promise((resolve) => {
      let forced = false;
      const timer = setTimeout(() => {
        forced = true;
        log.warn('Graceful shutdown period elapsed, resetting open connections', {
          inFlight: this.activeRequests,
          gracePeriodMs
        });
        this.server.closeAllConnections();
      }, Math.min(gracePeriodMs, MAX_TIMER_DELAY_MS));

      this.server.close((error) => {
        clearTimeout(timer);
        if (error) {
          handleError(error, 'http');
        }
        resolve({ forced });
      });
      this.server.closeIdleConnections();
    });

    return this.closing;
  }

  /**
   * Resets every open connection. Used when a second termination signal
   * arrives while draining.
   */
  terminate(): void {
    this.draining = true;
    this.server.closeAllConnections();
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const started = Date.now();
    this.activeRequests++;

    try {
      const body = await readBody(req, this.options.maxBodyBytes);
      const result = await this.application.handle(toHttpRequest(req, body));
      this.writeResponse(res, normalizeResponse(result));
    } catch (error) {
      const failure =
        error instanceof RequestError
          ? error
          : new RequestError(`Unhandled error in ${this.application.target}: ${toError(error).message}`, 500, error);
      handleError(failure, `${req.method} ${req.url}`);
      this.writeFailure(res, failure.statusCode);
    } finally {
      this.activeRequests--;
      log.http(`${req.method} ${req.url} ${res.statusCode} - ${Date.now() - started}ms`);
    }
  }

  private writeResponse(res: ServerResponse, response: OutgoingResponse): void {
    if (this.draining) {
      res.setHeader('connection', 'close');
    }
    res.writeHead(response.status, response.headers);
    res.end(response.body);
  }

  private writeFailure(res: ServerResponse, statusCode: number): void {
    if (res.headersSent) {
      res.destroy();
      return;
    }
    if (statusCode === 413) {
      // 请求体未读完，响应后关闭连接
      res.setHeader('connection', 'close');
    }
    this.writeResponse(res, errorResponse(statusCode));
  }

  private handleClientError(error: NodeJS.ErrnoException, socket: Duplex): void {
    if (error.code === 'ECONNRESET' || !socket.writable) {
      socket.destroy();
      return;
    }
    log.warn('Malformed request from client', { code: error.code, message: error.message });
    socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\nContent-Length: 0\r\n\r\n');
  }
}
