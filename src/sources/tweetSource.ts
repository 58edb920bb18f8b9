import type { AppConfig } from '../config';
import type { Tweet, TweetSearchResponse } from '../types';
import { requestJson, type HttpTransport } from '../providers/fetcher';
import { isRecord, recordOrEmpty, stringOrNull, type JsonRecord } from '../utils/records';

export const MAX_TWEET_RESULTS = 10;
export const MISSING_TOKEN_NOTE = 'X_BEARER_TOKEN not configured';

function toMetrics(value: unknown): Record<string, number> {
  const metrics: Record<string, number> = {};
  for (const [key, count] of Object.entries(recordOrEmpty(value))) {
    if (typeof count === 'number') metrics[key] = count;
  }
  return metrics;
}

export function normalizeTweet(raw: JsonRecord): Tweet {
  return {
    id: stringOrNull(raw.id),
    text: stringOrNull(raw.text),
    created_at: stringOrNull(raw.created_at),
    metrics: toMetrics(raw.public_metrics)
  };
}

export class TweetSource {
  constructor(
    private readonly config: AppConfig,
    private readonly transport: HttpTransport
  ) {}

  /** Sem token não é erro: devolve lista vazia com a nota explicando o motivo. */
  async search(query: string): Promise<TweetSearchResponse> {
    const token = this.config.social.bearerToken;
    if (!token) {
      return { tweets: [], note: MISSING_TOKEN_NOTE };
    }

    const payload = await requestJson(this.transport, this.config.social.searchUrl, {
      headers: { Authorization: `Bearer ${token}` },
      searchParams: {
        query,
        'tweet.fields': 'created_at,public_metrics',
        max_results: MAX_TWEET_RESULTS
      },
      timeoutMs: this.config.requestTimeoutMs
    });

    const data = recordOrEmpty(payload).data;
    const tweets = Array.isArray(data) ? data.filter(isRecord).map(normalizeTweet) : [];
    return { tweets };
  }
}
