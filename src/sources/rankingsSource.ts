import type { AppConfig } from '../config';
import {
  PLAYER_RANKING_CATEGORIES,
  type PlayerRankingCategory,
  type RankingFormat,
  type RankingRow,
  type RankingsResult
} from '../types';
import { describeError } from '../api/errors';
import { requestJson, type HttpTransport } from '../providers/fetcher';
import { isRecord } from '../utils/records';
import { joinUrl } from '../utils/url';

/**
 * Rankings da ICC. Não depende do provedor ativo e não tem autenticação.
 * Cada sub-requisição que falhar (status, rede ou JSON inválido) vira lista
 * vazia; o resultado sempre tem as três categorias de jogadores.
 */
export class RankingsSource {
  constructor(
    private readonly config: AppConfig,
    private readonly transport: HttpTransport
  ) {}

  async getRankings(format: RankingFormat): Promise<RankingsResult> {
    const [teams, ...playerLists] = await Promise.all([
      this.fetchRows(format, 'teams'),
      ...PLAYER_RANKING_CATEGORIES.map(category => this.fetchRows(format, category))
    ]);

    const players: Record<PlayerRankingCategory, RankingRow[]> = { batting: [], bowling: [], allrounder: [] };
    PLAYER_RANKING_CATEGORIES.forEach((category, index) => {
      players[category] = playerLists[index] ?? [];
    });

    return { format, teams, players };
  }

  private async fetchRows(format: RankingFormat, segment: 'teams' | PlayerRankingCategory): Promise<RankingRow[]> {
    const url = joinUrl(this.config.rankingsBaseUrl, `${format}/men/${segment}`);
    try {
      const payload = await requestJson(this.transport, url, { timeoutMs: this.config.requestTimeoutMs });
      const rows = toRows(payload);
      if (!rows) {
        console.warn({ url }, 'Ranking respondeu sem lista reconhecível, descartando corpo');
        return [];
      }
      return rows;
    } catch (error) {
      console.warn({ url, err: describeError(error) }, 'Ranking indisponível, usando lista vazia');
      return [];
    }
  }
}

/**
 * Array é repassado como veio; objetos com `data` ou `rankings` em array são
 * desembrulhados. `null` quando o corpo não tem lista alguma.
 */
export function toRows(payload: unknown): RankingRow[] | null {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload)) {
    if (Array.isArray(payload.data)) return payload.data;
    if (Array.isArray(payload.rankings)) return payload.rankings;
  }
  return null;
}
