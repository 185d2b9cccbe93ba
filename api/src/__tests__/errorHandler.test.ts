import http from 'http';
import express, { Express } from 'express';
import axios from 'axios';
import { createErrorHandler, notFoundHandler } from '../middleware/errorHandler';
import { ErrorFactory } from '../utils/errors';

function buildApp(production: boolean): Express {
  const app = express();
  app.get('/boom', () => {
    throw new Error('database exploded');
  });
  app.get('/missing', (_req, _res, next) => next(ErrorFactory.missingParameter('email')));
  app.use(notFoundHandler);
  app.use(createErrorHandler({ production }));
  return app;
}

async function request(app: Express, path: string): Promise<{ status: number; data: unknown; code: unknown }> {
  const server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  try {
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('No address');
    }
    const response = await axios.get(`http://127.0.0.1:${address.port}${path}`, {
      validateStatus: () => true,
    });
    return { status: response.status, data: response.data, code: response.headers['x-error-code'] };
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

describe('errorHandler', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('exposes unexpected error messages outside production', async () => {
    const response = await request(buildApp(false), '/boom');

    expect(response.status).toBe(500);
    expect(response.data).toEqual({ detail: 'database exploded' });
    expect(response.code).toBe('INTERNAL_ERROR');
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('[HIGH] INTERNAL_ERROR: database exploded'),
      expect.objectContaining({ path: '/boom', method: 'GET' })
    );
  });

  it('hides unexpected error messages in production', async () => {
    const response = await request(buildApp(true), '/boom');

    expect(response.status).toBe(500);
    expect(response.data).toEqual({ detail: 'Internal Server Error' });
  });

  it('keeps operational error messages in production', async () => {
    const response = await request(buildApp(true), '/missing');

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ detail: 'Missing required parameter: email' });
    expect(response.code).toBe('MISSING_PARAMETER');
  });

  it('turns unmatched routes into 404', async () => {
    const response = await request(buildApp(false), '/nowhere');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ detail: 'Not Found' });
    expect(response.code).toBe('NOT_FOUND');
  });
});
