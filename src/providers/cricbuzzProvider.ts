import type { AppConfig } from '../config';
import type { MatchCategory, MatchDetail, MatchSummary } from '../types';
import {
  ALTERNATE_MATCH_PATHS,
  extractAlternateMatches,
  normalizeAlternateMatch
} from '../normalizers/matchNormalizer';
import { BaseMatchProvider, type AuthorizedRequest } from './baseProvider';
import type { HttpTransport, QueryParams } from './fetcher';

/** Provedor alternativo (Cricbuzz via RapidAPI): exige chave e host nos headers. */
export class CricbuzzProvider extends BaseMatchProvider {
  readonly id = 'alt_stats' as const;
  protected readonly baseUrl: string;
  protected readonly missingCredentialMessage = 'RAPIDAPI_KEY or RAPIDAPI_HOST not configured';
  private readonly apiKey?: string;
  private readonly host?: string;

  constructor(config: AppConfig, transport: HttpTransport) {
    super(transport, config.requestTimeoutMs);
    this.baseUrl = config.alternate.baseUrl;
    this.apiKey = config.alternate.apiKey;
    this.host = config.alternate.host;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey && this.host);
  }

  protected authorize(params: QueryParams): AuthorizedRequest {
    return {
      searchParams: params,
      headers: {
        'X-RapidAPI-Key': this.apiKey ?? '',
        'X-RapidAPI-Host': this.host ?? ''
      }
    };
  }

  async listMatches(category: MatchCategory): Promise<MatchSummary[]> {
    const payload = await this.get(ALTERNATE_MATCH_PATHS[category]);
    return extractAlternateMatches(payload).map(match => normalizeAlternateMatch(match, category));
  }

  async getMatchDetail(matchId: string): Promise<MatchDetail> {
    return this.get(`mcenter/v1/${encodeURIComponent(matchId)}`);
  }
}
