import type { ProviderId } from '../config';
import type { MatchCategory, MatchDetail, MatchSummary } from '../types';

export interface MatchListFetcher {
  listMatches(category: MatchCategory): Promise<MatchSummary[]>;
}

export interface MatchDetailFetcher {
  getMatchDetail(matchId: string): Promise<MatchDetail>;
}

/** Capacidades que o provedor ativo precisa oferecer. Escolhido uma vez, na montagem do serviço. */
export interface MatchProvider extends MatchListFetcher, MatchDetailFetcher {
  readonly id: ProviderId;
  isConfigured(): boolean;
}
