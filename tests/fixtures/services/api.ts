import type { RequestHandler } from '../../../src/types';

export const app: RequestHandler = () => ({ status: 200, body: 'services api' });
