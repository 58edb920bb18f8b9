import { DateTime } from 'luxon';
import { hasProviderCredential, type AppConfig, type ProviderId } from '../config';
import { TRENDING_PLAYERS } from '../data/trendingPlayers';
import { createMatchProvider, type MatchProvider } from '../providers';
import { gotTransport, type HttpTransport } from '../providers/fetcher';
import { NewsSource } from '../sources/newsSource';
import { RankingsSource } from '../sources/rankingsSource';
import { TweetSource } from '../sources/tweetSource';
import {
  MATCH_CATEGORIES,
  RANKING_FORMATS,
  type MatchCategory,
  type MatchDetail,
  type MatchListResponse,
  type NewsItem,
  type RankingFormat,
  type RankingsResult,
  type TrendingPlayer,
  type TweetSearchResponse
} from '../types';
import { ApiError, toApiError } from './errors';

export interface CricketServiceOptions {
  transport?: HttpTransport;
  matchProvider?: MatchProvider;
  now?: () => DateTime;
}

export interface ServiceStatus {
  backend: string;
  external_api: string;
  provider: ProviderId;
  time: number;
}

function parseEnum<T extends string>(
  value: unknown,
  allowed: readonly T[],
  fallback: T,
  field: string
): T {
  if (value === undefined || value === '') return fallback;
  const match = allowed.find(option => option === value);
  if (!match) {
    throw ApiError.badRequest(`${field} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

export function parseMatchCategory(value: unknown): MatchCategory {
  return parseEnum(value, MATCH_CATEGORIES, 'live', 'type');
}

export function parseRankingFormat(value: unknown): RankingFormat {
  return parseEnum(value, RANKING_FORMATS, 'odi', 'format');
}

export class CricketService {
  private readonly matchProvider: MatchProvider;
  private readonly rankingsSource: RankingsSource;
  private readonly newsSource: NewsSource;
  private readonly tweetSource: TweetSource;
  private readonly now: () => DateTime;

  constructor(private readonly config: AppConfig, options: CricketServiceOptions = {}) {
    const transport = options.transport ?? gotTransport;
    this.matchProvider = options.matchProvider ?? createMatchProvider(config, transport);
    this.rankingsSource = new RankingsSource(config, transport);
    this.newsSource = new NewsSource(config, transport);
    this.tweetSource = new TweetSource(config, transport);
    this.now = options.now ?? (() => DateTime.now());
  }

  root(): { message: string; provider: ProviderId } {
    return { message: 'Cricket Backend Running', provider: this.config.provider };
  }

  hello(): { message: string } {
    return { message: 'Hello from the backend API!' };
  }

  status(): ServiceStatus {
    return {
      backend: '✅ Running',
      external_api: hasProviderCredential(this.config) ? '✅ Configured' : '⚠️ Not Configured',
      provider: this.config.provider,
      time: this.now().toUnixInteger()
    };
  }

  /** Falhas já classificadas passam intactas; o resto vira 500 com mensagem curta. */
  async listMatches(type?: unknown): Promise<MatchListResponse> {
    const category = parseMatchCategory(type);
    try {
      const matches = await this.matchProvider.listMatches(category);
      return { type: category, matches };
    } catch (error) {
      throw toApiError(error);
    }
  }

  /** Detalhe sai como o provedor mandou; quem consome lida com a estrutura rica. */
  async getMatchDetail(matchId: string): Promise<MatchDetail> {
    if (!matchId.trim()) {
      throw ApiError.badRequest('match_id is required');
    }
    try {
      return await this.matchProvider.getMatchDetail(matchId);
    } catch (error) {
      throw toApiError(error);
    }
  }

  async getRankings(format?: unknown): Promise<RankingsResult> {
    return this.rankingsSource.getRankings(parseRankingFormat(format));
  }

  async getNews(): Promise<{ items: NewsItem[] }> {
    return { items: await this.newsSource.getNews() };
  }

  getTrendingPlayers(): { players: TrendingPlayer[] } {
    return { players: [...TRENDING_PLAYERS] };
  }

  async searchTweets(query: unknown): Promise<TweetSearchResponse> {
    if (typeof query !== 'string' || !query.trim()) {
      throw ApiError.badRequest('query is required');
    }
    return this.tweetSource.search(query);
  }
}
