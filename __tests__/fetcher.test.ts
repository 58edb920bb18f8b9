import http from 'node:http';
import { gotTransport, requestJson } from '../src/providers/fetcher';
import { closeServer, listenOnLoopback } from './helpers/localServer';
import { captureApiError, silenceConsole } from './helpers/stubTransport';

describe('gotTransport', () => {
  let server: http.Server;
  let baseUrl: string;
  let hits: number;

  beforeEach(async () => {
    silenceConsole();
    hits = 0;
    server = http.createServer((req, res) => {
      hits += 1;
      if (req.url === '/hang') return;
      res.statusCode = req.url?.startsWith('/down') ? 503 : 418;
      res.setHeader('content-type', 'application/json');
      res.end(JSON.stringify({ url: req.url, key: req.headers['x-rapidapi-key'] }));
    });
    baseUrl = await listenOnLoopback(server);
  });

  afterEach(async () => {
    await closeServer(server);
    jest.restoreAllMocks();
  });

  it('serializes query params, forwards headers and hands back non-2xx replies', async () => {
    const response = await gotTransport(`${baseUrl}/x`, {
      searchParams: { a: 1, 'tweet.fields': 'created_at,public_metrics' },
      headers: { 'X-RapidAPI-Key': 'test-rapid-key' },
      timeoutMs: 15000
    });

    expect(response.statusCode).toBe(418);
    expect(JSON.parse(response.body)).toEqual({
      url: '/x?a=1&tweet.fields=created_at%2Cpublic_metrics',
      key: 'test-rapid-key'
    });
  });

  it('sends a bare request when no params or headers are given', async () => {
    const response = await gotTransport(`${baseUrl}/y`, { timeoutMs: 15000 });

    expect(response.statusCode).toBe(418);
    expect(JSON.parse(response.body)).toEqual({ url: '/y' });
  });

  it('makes a single attempt on a server error', async () => {
    const error = await captureApiError(requestJson(gotTransport, `${baseUrl}/down`, { timeoutMs: 15000 }));

    expect(error.kind).toBe('UpstreamError');
    expect(error.status).toBe(503);
    expect(JSON.parse(error.detail)).toEqual({ url: '/down' });
    expect(hits).toBe(1);
  });

  it('gives up once the request timeout elapses', async () => {
    const error = await captureApiError(requestJson(gotTransport, `${baseUrl}/hang`, { timeoutMs: 100 }));

    expect(error.kind).toBe('UpstreamUnreachable');
    expect(error.status).toBe(500);
    expect(hits).toBe(1);
  });
});
