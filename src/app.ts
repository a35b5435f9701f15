import type { Application, HttpRequest, HttpResponse } from './types';
import { getHealthStatus } from './utils/health';

/**
 * Default application served when no other `app` module is deployed. It
 * only answers the root and health endpoints used by container probes.
 */
export const app: Application = {
  handle(request: HttpRequest): HttpResponse {
    if (request.method !== 'GET' && request.method !== 'HEAD') {
      return {
        status: 405,
        headers: { allow: 'GET, HEAD' },
        body: { statusCode: 405, message: 'Method Not Allowed' }
      };
    }

    switch (request.path) {
      case '/':
        return { status: 200, body: { status: 'ok' } };
      case '/health': {
        const health = getHealthStatus();
        return { status: health.status === 'healthy' ? 200 : 503, body: health };
      }
      default:
        return { status: 404, body: { statusCode: 404, message: 'Not Found' } };
    }
  }
};
