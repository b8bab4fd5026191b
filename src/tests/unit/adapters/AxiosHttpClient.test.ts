import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { AxiosHttpClient } from '@/adapters/http/AxiosHttpClient';

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

function handle(req: IncomingMessage, res: ServerResponse): void {
  if (req.url === '/api/status/500') {
    sendJson(res, 500, { error: 'upstream failure' });
    return;
  }
  if (req.url === '/api/hang') {
    // Never answers; the client timeout has to end the request
    return;
  }

  let body = '';
  req.on('data', (chunk: Buffer) => {
    body += chunk.toString('utf8');
  });
  req.on('end', () => {
    sendJson(res, 200, {
      method: req.method,
      url: req.url,
      trId: req.headers['tr_id'],
      body,
    });
  });
}

describe('AxiosHttpClient', () => {
  let server: Server;
  let baseURL: string;

  beforeAll(async () => {
    server = createServer(handle);
    await new Promise<void>((resolve) => {
      server.listen(0, '127.0.0.1', resolve);
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Test server has no TCP address');
    }
    baseURL = `http://127.0.0.1:${address.port}/api`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  });

  it('should resolve an error status instead of rejecting', async () => {
    const client = new AxiosHttpClient(baseURL, 1_000);

    const response = await client.get('/status/500');

    expect(response).toEqual({ status: 500, data: { error: 'upstream failure' } });
  });

  it('should apply the base URL, query params and headers', async () => {
    const client = new AxiosHttpClient(baseURL, 1_000);

    const response = await client.get('/quote', {
      headers: { tr_id: 'FHKST01010100' },
      params: { fid_cond_mrkt_div_code: 'J', fid_input_iscd: '005930' },
    });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({
      method: 'GET',
      url: '/api/quote?fid_cond_mrkt_div_code=J&fid_input_iscd=005930',
      trId: 'FHKST01010100',
      body: '',
    });
  });

  it('should send a POST body as JSON', async () => {
    const client = new AxiosHttpClient(baseURL, 1_000);

    const response = await client.post('/token', { grant_type: 'client_credentials' });

    expect(response.data).toMatchObject({
      method: 'POST',
      url: '/api/token',
      body: '{"grant_type":"client_credentials"}',
    });
  });

  it('should reject once the timeout elapses without a response', async () => {
    const client = new AxiosHttpClient(baseURL, 50);

    await expect(client.get('/hang')).rejects.toThrow('timeout of 50ms exceeded');
  });
});
