import type { ProviderId } from '../config';
import type { MatchCategory, MatchDetail, MatchSummary } from '../types';
import { joinUrl } from '../utils/url';
import { ApiError } from '../api/errors';
import { requestJson, type HttpTransport, type QueryParams } from './fetcher';
import type { MatchProvider } from './types';

export interface AuthorizedRequest {
  searchParams: QueryParams;
  headers: Record<string, string>;
}

export abstract class BaseMatchProvider implements MatchProvider 
{
  abstract readonly id: ProviderId;
  protected abstract readonly baseUrl: string;
  protected abstract readonly missingCredentialMessage: string;

  constructor(
    protected readonly transport: HttpTransport,
    protected readonly timeoutMs: number
  ) {}

  abstract isConfigured(): boolean;
  abstract listMatches(category: MatchCategory): Promise<MatchSummary[]>;
  abstract getMatchDetail(matchId: string): Promise<MatchDetail>;

  /** Como cada provedor se autentica: token na query ou par de headers. */
  protected abstract authorize(params: QueryParams): AuthorizedRequest;

  /** Sem credencial não há chamada de rede: falha direto com 501. */
  protected async get(resourcePath: string, params: QueryParams = {}): Promise<unknown> 
  {
    if (!this.isConfigured()) 
    {
      throw ApiError.providerNotConfigured(this.missingCredentialMessage);
    }

    const { searchParams, headers } = this.authorize({ ...params });

    return requestJson(this.transport, joinUrl(this.baseUrl, resourcePath), {
      searchParams,
      headers,
      timeoutMs: this.timeoutMs
    });
  }
}
