import http from 'http';
import path from 'path';
import axios, { AxiosInstance } from 'axios';
import type { ServiceConfig } from '../src/config';
import type { HttpRequest } from '../src/types';

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

export function testConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    appTarget: 'app:app',
    appDir: FIXTURES_DIR,
    environment: 'test',
    logLevel: 'error',
    gracefulShutdownTimeout: 1000,
    maxBodyBytes: 1024,
    ...overrides
  };
}

/**
 * Client that never reuses connections, so each request opens its own.
 */
export function createClient(baseURL: string): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: 5000,
    validateStatus: () => true,
    httpAgent: new http.Agent({ keepAlive: false })
  });
}

export function buildRequest(overrides: Partial<HttpRequest> = {}): HttpRequest {
  return {
    method: 'GET',
    url: '/',
    path: '/',
    query: new URLSearchParams(),
    headers: {},
    body: Buffer.alloc(0),
    ...overrides
  };
}

export class Deferred<T = void> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolve = resolve;
    });
  }
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
