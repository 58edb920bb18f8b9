import type { AppConfig } from '../config';
import { gotTransport, type HttpTransport } from './fetcher';
import { CricbuzzProvider } from './cricbuzzProvider';
import { SportmonksProvider } from './sportmonksProvider';
import type { MatchProvider } from './types';

export function createMatchProvider(config: AppConfig, transport: HttpTransport = gotTransport): MatchProvider {
  switch (config.provider) {
    case 'alt_stats':
      return new CricbuzzProvider(config, transport);
    case 'primary_stats':
      return new SportmonksProvider(config, transport);
  }
}

export type { MatchProvider, MatchListFetcher, MatchDetailFetcher } from './types';
