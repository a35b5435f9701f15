import net from 'net';
import type { AxiosInstance } from 'axios';
import { createApplicationHandle } from '../../src/core/ApplicationLoader';
import { HttpServer, HttpServerOptions, normalizeResponse } from '../../src/core/HttpServer';
import { BindError, RequestError } from '../../src/utils/errors';
import type { HttpRequest, HttpResponse } from '../../src/types';
import { captureError, createClient, Deferred } from '../helpers';

type Handler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

describe('HttpServer', () => {
  const servers: HttpServer[] = [];

  async function startServer(
    handler: Handler,
    overrides: Partial<HttpServerOptions> = {}
  ): Promise<{ server: HttpServer; client: AxiosInstance; port: number }> {
    const server = new HttpServer(createApplicationHandle(handler, 'test:app'), {
      host: '127.0.0.1',
      port: 0,
      maxBodyBytes: 1024,
      ...overrides
    });
    servers.push(server);
    const address = await server.listen();
    return { server, client: createClient(`http://127.0.0.1:${address.port}`), port: address.port };
  }

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.close(0)));
  });

  describe('request handling', () => {
    it('should pass method, path, query, headers and body to the application', async () => {
      const { client } = await startServer((request) => ({
        status: 200,
        body: {
          method: request.method,
          url: request.url,
          path: request.path,
          name: request.query.get('name'),
          header: request.headers['x-test'],
          body: request.body.toString('utf8')
        }
      }));

      const response = await client.post('/echo?name=test', 'hello', {
        headers: { 'content-type': 'text/plain', 'x-test': 'yes' }
      });

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
      expect(response.data).toEqual({
        method: 'POST',
        url: '/echo?name=test',
        path: '/echo',
        name: 'test',
        header: 'yes',
        body: 'hello'
      });
    });

    it('should send string bodies as text', async () => {
      const { client } = await startServer(() => ({ status: 200, body: 'plain text' }));

      const response = await client.get('/');

      expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
      expect(response.headers['content-length']).toBe('10');
      expect(response.data).toBe('plain text');
    });

    it('should keep a content type set by the application', async () => {
      const { client } = await startServer(() => ({
        status: 200,
        headers: { 'Content-Type': 'image/x-portable-bitmap' },
        body: Buffer.from([0x50, 0x34, 0x0a])
      }));

      const response = await client.get('/page', { responseType: 'arraybuffer' });

      expect(response.headers['content-type']).toBe('image/x-portable-bitmap');
      expect(Buffer.from(response.data).toString('latin1')).toBe('P4\n');
    });

    it('should serve async handlers', async () => {
      const { client } = await startServer(async (request) => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        return { status: 202, body: { accepted: request.path } };
      });

      const response = await client.put('/jobs/1', {});

      expect(response.status).toBe(202);
      expect(response.data).toEqual({ accepted: '/jobs/1' });
    });
  });

  describe('request errors', () => {
    it('should answer 500 when the application throws and keep serving', async () => {
      const { client } = await startServer((request) => {
        if (request.path === '/boom') {
          throw new Error('handler exploded');
        }
        return { status: 200, body: 'still here' };
      });

      const failed = await client.get('/boom');
      const next = await client.get('/ok');

      expect(failed.status).toBe(500);
      expect(failed.data).toEqual({ statusCode: 500, message: 'Internal Server Error' });
      expect(next.status).toBe(200);
      expect(next.data).toBe('still here');
    });

    it('should answer 500 when the application rejects', async () => {
      const { client } = await startServer(async () => {
        throw new Error('async failure');
      });

      const response = await client.get('/');

      expect(response.status).toBe(500);
      expect(response.data).toEqual({ statusCode: 500, message: 'Internal Server Error' });
    });

    it('should answer 500 when the application returns an invalid response', async () => {
      const { client } = await startServer(() => ({ status: 42 }));

      const response = await client.get('/');

      expect(response.status).toBe(500);
    });

    it('should answer 413 when the body exceeds the limit', async () => {
      const { client } = await startServer(() => ({ status: 200 }), { maxBodyBytes: 8 });

      const response = await client.post('/upload', 'x'.repeat(64), {
        headers: { 'content-type': 'text/plain' }
      });

      expect(response.status).toBe(413);
      expect(response.data).toEqual({ statusCode: 413, message: 'Payload Too Large' });
    });

    it('should answer 400 to malformed HTTP', async () => {
      const { port } = await startServer(() => ({ status: 200 }));

      const reply = await new Promise<string>((resolve, reject) => {
        const socket = net.connect(port, '127.0.0.1', () => {
          socket.write('NOT HTTP AT ALL\r\n\r\n');
        });
        let data = '';
        socket.on('data', (chunk) => {
          data += chunk.toString('latin1');
        });
        socket.on('end', () => resolve(data));
        socket.on('error', reject);
      });

      expect(reply.split('\r\n')[0]).toBe('HTTP/1.1 400 Bad Request');
    });
  });

  describe('listen', () => {
    it('should report the bound address', async () => {
      const { server, port } = await startServer(() => ({ status: 200 }));

      expect(server.listening).toBe(true);
      expect(server.address()).toMatchObject({ address: '127.0.0.1', port });
    });

    it('should reject with BindError when the port is taken', async () => {
      const { port } = await startServer(() => ({ status: 200 }));
      const second = new HttpServer(createApplicationHandle(() => ({ status: 200 }), 'test:app'), {
        host: '127.0.0.1',
        port,
        maxBodyBytes: 1024
      });

      const listening = second.listen();

      await expect(listening).rejects.toBeInstanceOf(BindError);
      await expect(listening).rejects.toMatchObject({
        code: 'EADDRINUSE',
        port,
        message: `Address 127.0.0.1:${port} is already in use`
      });
      expect(second.listening).toBe(false);
    });
  });

  describe('close', () => {
    it('should let an in-flight request finish and refuse new connections', async () => {
      const entered = new Deferred();
      const release = new Deferred();
      const { server, client } = await startServer(async () => {
        entered.resolve();
        await release.promise;
        return { status: 200, body: 'finished' };
      });

      const pending = client.get('/slow');
      await entered.promise;
      expect(server.inFlight).toBe(1);

      const closing = server.close(5000);
      expect(server.listening).toBe(false);
      await expect(client.get('/late')).rejects.toMatchObject({ code: 'ECONNREFUSED' });

      release.resolve();
      const response = await pending;

      expect(response.status).toBe(200);
      expect(response.data).toBe('finished');
      await expect(closing).resolves.toEqual({ forced: false });
      expect(server.inFlight).toBe(0);
    });

    it('should reset connections still open after the grace period', async () => {
      const entered = new Deferred();
      const release = new Deferred();
      const { server, client } = await startServer(async () => {
        entered.resolve();
        await release.promise;
        return { status: 200 };
      });

      const pending = client.get('/stuck');
      await entered.promise;

      const result = await server.close(50);

      expect(result).toEqual({ forced: true });
      await expect(pending).rejects.toMatchObject({ code: 'ECONNRESET' });
      release.resolve();
    });

    it('should not cut a grace period longer than the timer limit short', async () => {
      const entered = new Deferred();
      const release = new Deferred();
      const { server, client } = await startServer(async () => {
        entered.resolve();
        await release.promise;
        return { status: 200, body: 'finished' };
      });

      const pending = client.get('/slow');
      await entered.promise;
      const closing = server.close(3_000_000_000);
      await new Promise((resolve) => setTimeout(resolve, 50));
      release.resolve();

      const response = await pending;

      expect(response.data).toBe('finished');
      await expect(closing).resolves.toEqual({ forced: false });
    });

    it('should resolve at once when never bound', async () => {
      const server = new HttpServer(createApplicationHandle(() => ({ status: 200 }), 'test:app'), {
        host: '127.0.0.1',
        port: 0,
        maxBodyBytes: 1024
      });

      await expect(server.close(1000)).resolves.toEqual({ forced: false });
    });
  });

  describe('normalizeResponse', () => {
    it('should encode objects as JSON and set the length', () => {
      const response = normalizeResponse({ status: 201, body: { id: 7 } });

      expect(response.status).toBe(201);
      expect(response.body.toString('utf8')).toBe('{"id":7}');
      expect(response.headers).toEqual({
        'content-type': 'application/json; charset=utf-8',
        'content-length': 8
      });
    });

    it('should leave the content type out of empty responses', () => {
      expect(normalizeResponse({ status: 200 }).headers).toEqual({ 'content-length': 0 });
    });

    it.each([204, 304])('should send neither a body nor a length with %i', (status) => {
      const response = normalizeResponse({
        status,
        headers: { ETag: '"v1"', 'Content-Length': 7 },
        body: 'ignored'
      });

      expect(response.headers).toEqual({ etag: '"v1"' });
      expect(response.body.length).toBe(0);
    });

    it('should lower-case header names', () => {
      const response = normalizeResponse({ status: 200, headers: { 'X-Request-Id': 'abc' }, body: 'ok' });

      expect(response.headers['x-request-id']).toBe('abc');
    });

    it.each([
      ['a non-object', 'ok'],
      ['a missing status', { body: 'ok' }],
      ['an out-of-range status', { status: 600 }],
      ['an informational status', { status: 101 }],
      ['a status below 200', { status: 199 }],
      ['a fractional status', { status: 200.5 }],
      ['invalid headers', { status: 200, headers: { 'x-flag': true } }],
      ['an unsupported body', { status: 200, body: 12 }]
    ])('should reject %s', (_label, value) => {
      const error = captureError(() => normalizeResponse(value));

      expect(error).toBeInstanceOf(RequestError);
      expect(error).toMatchObject({ statusCode: 500 });
    });
  });
});
