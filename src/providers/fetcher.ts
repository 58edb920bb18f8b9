import got from 'got';
import { ApiError, describeError } from '../api/errors';

export type QueryParams = Record<string, string | number>;

export interface TransportRequest {
  searchParams?: QueryParams;
  headers?: Record<string, string>;
  timeoutMs: number;
}

export interface TransportResponse {
  statusCode: number;
  body: string;
}

/** Única porta de saída para a rede. Os testes trocam por um stub em memória. */
export type HttpTransport = (url: string, request: TransportRequest) => Promise<TransportResponse>;

export const gotTransport: HttpTransport = async (url, request) =>
{
  const response = await got(url,
  {
    searchParams: request.searchParams,
    headers: request.headers,
    timeout: { request: request.timeoutMs },
    throwHttpErrors: false,
    followRedirect: true,
    decompress: true,
    retry: 0
  });

  return { statusCode: response.statusCode, body: response.body };
};

export function isSuccessStatus(statusCode: number): boolean
{
  return statusCode >= 200 && statusCode < 300;
}

function parseJsonBody(url: string, body: string): unknown
{
  try
  {
    return JSON.parse(body);
  }
  catch (error)
  {
    console.error({ url, err: describeError(error) }, 'Resposta não é JSON');
    throw ApiError.unreachable(`Invalid JSON from upstream: ${describeError(error)}`);
  }
}

/**
 * Uma tentativa, sem retry. Status fora de 2xx vira `UpstreamError` com o corpo
 * original; falha de rede (timeout, DNS, reset) vira `UpstreamUnreachable`.
 */
export async function requestJson(
  transport: HttpTransport,
  url: string,
  request: TransportRequest
): Promise<unknown>
{
  let response: TransportResponse;

  try
  {
    response = await transport(url, request);
  }
  catch (error)
  {
    console.error({ url, err: describeError(error) }, 'Erro fetch');
    throw ApiError.unreachable(describeError(error));
  }

  if (!isSuccessStatus(response.statusCode))
  {
    console.warn({ url, status: response.statusCode }, 'Provedor respondeu com erro');
    throw ApiError.upstream(response.statusCode, response.body);
  }

  return parseJsonBody(url, response.body);
}
