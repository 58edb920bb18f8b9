import type { AppConfig } from '../config';
import type { MatchCategory, MatchDetail, MatchSummary } from '../types';
import {
  extractPrimaryMatches,
  normalizePrimaryMatch,
  PRIMARY_MATCH_PATHS
} from '../normalizers/matchNormalizer';
import { BaseMatchProvider, type AuthorizedRequest } from './baseProvider';
import type { HttpTransport, QueryParams } from './fetcher';

const LIST_INCLUDES = 'localteam,visitorteam,venue,season';

const DETAIL_INCLUDES = [
  'localteam,visitorteam,venue',
  'runs,batting,bowling,manofmatch,manofseries',
  'lineup,balls,scoreboards'
].join(',');

/** Provedor principal (SportMonks v2): token em `api_token`, lista em `data`. */
export class SportmonksProvider extends BaseMatchProvider {
  readonly id = 'primary_stats' as const;
  protected readonly baseUrl: string;
  protected readonly missingCredentialMessage = 'CRICKET_API_KEY not set for SportMonks';
  private readonly apiKey?: string;

  constructor(config: AppConfig, transport: HttpTransport) {
    super(transport, config.requestTimeoutMs);
    this.baseUrl = config.primary.baseUrl;
    this.apiKey = config.primary.apiKey;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  protected authorize(params: QueryParams): AuthorizedRequest {
    return {
      searchParams: { ...params, api_token: this.apiKey ?? '' },
      headers: {}
    };
  }

  async listMatches(category: MatchCategory): Promise<MatchSummary[]> {
    const payload = await this.get(PRIMARY_MATCH_PATHS[category], { include: LIST_INCLUDES });
    return extractPrimaryMatches(payload).map(match => normalizePrimaryMatch(match, category));
  }

  async getMatchDetail(matchId: string): Promise<MatchDetail> {
    return this.get(`fixtures/${encodeURIComponent(matchId)}`, { include: DETAIL_INCLUDES });
  }
}
