import type { Identifier } from './utils/records';

export type MatchCategory = 'live' | 'upcoming' | 'completed';
export type RankingFormat = 'test' | 'odi' | 't20';
export type PlayerRankingCategory = 'batting' | 'bowling' | 'allrounder';

export const MATCH_CATEGORIES: readonly MatchCategory[] = ['live', 'upcoming', 'completed'];
export const RANKING_FORMATS: readonly RankingFormat[] = ['test', 'odi', 't20'];
export const PLAYER_RANKING_CATEGORIES: readonly PlayerRankingCategory[] = ['batting', 'bowling', 'allrounder'];

export interface TeamRef {
  id: Identifier;
  name: string | null;
  code: string | null;
}

export interface VenueRef {
  name: string | null;
  city: string | null;
}

export interface MatchSummary {
  id: Identifier;
  /** LIVE, UPCOMING, COMPLETED ou o status do provedor em maiúsculas. */
  status: string;
  note: string | null;
  runs: unknown;
  league_id: Identifier;
  localteam: TeamRef;
  visitorteam: TeamRef;
  venue: VenueRef;
  /** Repassado como o provedor enviou, sem ajuste de fuso. */
  starting_at: string | null;
}

/** Payload nativo do provedor ativo, sem normalização. */
export type MatchDetail = unknown;

export type RankingRow = unknown;

export interface RankingsResult {
  format: RankingFormat;
  teams: RankingRow[];
  players: Record<PlayerRankingCategory, RankingRow[]>;
}

export interface NewsItem {
  title: string | null;
  link: string | null;
  summary: string;
  published: string | null;
  source: string;
  image: string | null;
}

export interface TrendingPlayer {
  name: string;
  country: string;
  handle: string;
  image: string;
}

export interface Tweet {
  id: string | null;
  text: string | null;
  created_at: string | null;
  metrics: Record<string, number>;
}

export interface MatchListResponse {
  type: MatchCategory;
  matches: MatchSummary[];
}

export interface TweetSearchResponse {
  tweets: Tweet[];
  note?: string;
}
