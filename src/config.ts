import 'dotenv/config';
import { isHttpOrHttpsUrl } from './utils/url';

export type ProviderId = 'primary_stats' | 'alt_stats';

export interface AppConfig {
  readonly provider: ProviderId;
  readonly port: number;
  readonly requestTimeoutMs: number;
  readonly primary: {
    readonly apiKey?: string;
    readonly baseUrl: string;
  };
  readonly alternate: {
    readonly apiKey?: string;
    readonly host?: string;
    readonly baseUrl: string;
  };
  readonly social: {
    readonly bearerToken?: string;
    readonly searchUrl: string;
  };
  readonly rankingsBaseUrl: string;
  readonly newsFeeds: readonly string[];
}

export const DEFAULT_PRIMARY_BASE = 'https://cricket.sportmonks.com/api/v2.0';
export const DEFAULT_ALTERNATE_BASE = 'https://cricbuzz-cricket.p.rapidapi.com';
export const SOCIAL_SEARCH_URL = 'https://api.twitter.com/2/tweets/search/recent';
export const RANKINGS_BASE = 'https://www.icc-cricket.com/iccrankings/api';
export const UPSTREAM_TIMEOUT_MS = 15000;

export const DEFAULT_NEWS_FEEDS = [
  'https://www.espncricinfo.com/rss/content/story/feeds/0.xml',
  'https://www.icc-cricket.com/rss/news'
];

const PROVIDER_ALIASES: Record<string, ProviderId> = {
  primary_stats: 'primary_stats',
  sportmonks: 'primary_stats',
  alt_stats: 'alt_stats',
  rapidapi: 'alt_stats',
  cricbuzz: 'alt_stats'
};

type EnvSource = Record<string, string | undefined>;

function readOptional(env: EnvSource, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function parseProvider(input: string | undefined): ProviderId {
  if (!input) return 'primary_stats';
  const resolved = PROVIDER_ALIASES[input.toLowerCase()];
  if (!resolved) {
    console.warn({ provider: input }, 'Provedor desconhecido, usando primary_stats');
    return 'primary_stats';
  }
  return resolved;
}

function parseFeedList(input: string | undefined, fallback: string[]): string[] {
  if (!input) return fallback;
  const feeds = input
    .split(',')
    .map(item => item.trim())
    .filter(item => isHttpOrHttpsUrl(item));
  return feeds.length ? Array.from(new Set(feeds)) : fallback;
}

function parsePort(input: string | undefined): number {
  const port = Number(input);
  return Number.isInteger(port) && port > 0 ? port : 8000;
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  return Object.freeze({
    provider: parseProvider(readOptional(env, 'CRICKET_API_PROVIDER')),
    port: parsePort(readOptional(env, 'PORT')),
    requestTimeoutMs: UPSTREAM_TIMEOUT_MS,
    primary: Object.freeze({
      apiKey: readOptional(env, 'CRICKET_API_KEY'),
      baseUrl: readOptional(env, 'SPORTMONKS_BASE') ?? DEFAULT_PRIMARY_BASE
    }),
    alternate: Object.freeze({
      apiKey: readOptional(env, 'RAPIDAPI_KEY'),
      host: readOptional(env, 'RAPIDAPI_HOST'),
      baseUrl: readOptional(env, 'RAPIDAPI_BASE') ?? DEFAULT_ALTERNATE_BASE
    }),
    social: Object.freeze({
      bearerToken: readOptional(env, 'X_BEARER_TOKEN'),
      searchUrl: SOCIAL_SEARCH_URL
    }),
    rankingsBaseUrl: RANKINGS_BASE,
    newsFeeds: Object.freeze(parseFeedList(readOptional(env, 'NEWS_FEEDS'), DEFAULT_NEWS_FEEDS))
  });
}

export function hasProviderCredential(config: AppConfig): boolean {
  return Boolean(config.primary.apiKey || config.alternate.apiKey);
}

export const APP_CONFIG = loadConfig();
