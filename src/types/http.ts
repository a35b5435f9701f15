/**
 * Request/response contract between the server and the application it hosts.
 */
import type { IncomingHttpHeaders } from 'http';

// 传给应用的请求
export interface HttpRequest {
  method: string;
  /** Raw request target, path plus query string */
  url: string;
  path: string;
  query: URLSearchParams;
  headers: IncomingHttpHeaders;
  body: Buffer;
  remoteAddress?: string;
}

export type HeaderValue = string | number | string[];

// 对象和数组按 JSON 编码
export type ResponseBody = string | Buffer | object;

// 应用返回的响应
export interface HttpResponse {
  status: number;
  headers?: Record<string, HeaderValue>;
  body?: ResponseBody | null;
}

export type RequestHandler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/**
 * An application object. `startup` runs before the socket is bound and
 * `shutdown` after in-flight requests have drained.
 */
export interface Application {
  handle: RequestHandler;
  startup?(): void | Promise<void>;
  shutdown?(): void | Promise<void>;
}

// 应用模块可以导出一个处理函数或一个应用对象
export type ApplicationExport = RequestHandler | Application;

/**
 * Normalised view of whatever the application module exported.
 * `handle` resolves with the raw value the application produced; the server
 * validates it before writing.
 */
export interface ApplicationHandle {
  readonly target: string;
  handle(request: HttpRequest): Promise<unknown>;
  startup(): Promise<void>;
  shutdown(): Promise<void>;
}
