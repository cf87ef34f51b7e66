import express from 'express';
import request from 'supertest';
import { AuthenticatedRequest, clientIdFor, createApiKeyAuth } from '../../src/middleware/auth';

function appWith(apiKeys: string[]): express.Express {
  const app = express();
  app.use(createApiKeyAuth(apiKeys));
  app.get('/whoami', (req: AuthenticatedRequest, res) => {
    res.json({ clientId: req.clientId });
  });
  return app;
}

describe('createApiKeyAuth', () => {
  it('should let a configured key through with its client id', async () => {
    const response = await request(appWith(['key-one'])).get('/whoami').set('X-API-Key', 'key-one');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ clientId: 'client_key-one' });
  });

  it('should refuse a request without a key', async () => {
    const response = await request(appWith(['key-one'])).get('/whoami');

    expect(response.status).toBe(401);
    expect(response.body.error.code).toBe('MISSING_API_KEY');
  });

  it('should refuse an unknown key', async () => {
    const response = await request(appWith(['key-one'])).get('/whoami').set('X-API-Key', 'key-two');

    expect(response.status).toBe(401);
    expect(response.body.error.code).toBe('INVALID_API_KEY');
  });

  it('should refuse every key when none is configured', async () => {
    const response = await request(appWith([])).get('/whoami').set('X-API-Key', 'dev-key-1');

    expect(response.status).toBe(401);
    expect(response.body.error.code).toBe('INVALID_API_KEY');
  });

  it('should derive the client id from the key prefix', () => {
    expect(clientIdFor('master-dev-key')).toBe('client_master-d');
  });
});
