import type { AppConfig } from '../config';
import type { NewsItem } from '../types';
import { describeError } from '../api/errors';
import { isSuccessStatus, type HttpTransport } from '../providers/fetcher';
import { parseFeed } from '../normalizers/feedNormalizer';

export const MAX_NEWS_ITEMS = 50;

const FEED_HEADERS = {
  accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8'
};

export class NewsSource {
  constructor(
    private readonly config: AppConfig,
    private readonly transport: HttpTransport
  ) {}

  /**
   * Busca os feeds em paralelo, mas monta o resultado na ordem configurada
   * (feed, depois entrada). Feed que falhar é só registrado e pulado.
   */
  async getNews(): Promise<NewsItem[]> {
    const perFeed = await Promise.all(this.config.newsFeeds.map(feedUrl => this.fetchFeed(feedUrl)));
    return perFeed.flat().slice(0, MAX_NEWS_ITEMS);
  }

  private async fetchFeed(feedUrl: string): Promise<NewsItem[]> {
    try {
      const response = await this.transport(feedUrl, {
        headers: FEED_HEADERS,
        timeoutMs: this.config.requestTimeoutMs
      });

      if (!isSuccessStatus(response.statusCode)) {
        throw new Error(`HTTP ${response.statusCode}`);
      }

      return parseFeed(response.body).items;
    } catch (error) {
      console.warn({ feedUrl, err: describeError(error) }, 'Feed ignorado');
      return [];
    }
  }
}
