import {
  DEFAULT_ALTERNATE_BASE,
  DEFAULT_NEWS_FEEDS,
  DEFAULT_PRIMARY_BASE,
  hasProviderCredential,
  loadConfig
} from '../src/config';
import { silenceConsole } from './helpers/stubTransport';

describe('loadConfig', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  it('applies defaults when nothing is set', () => {
    const config = loadConfig({});

    expect(config.provider).toBe('primary_stats');
    expect(config.port).toBe(8000);
    expect(config.requestTimeoutMs).toBe(15000);
    expect(config.primary).toEqual({ apiKey: undefined, baseUrl: DEFAULT_PRIMARY_BASE });
    expect(config.alternate).toEqual({ apiKey: undefined, host: undefined, baseUrl: DEFAULT_ALTERNATE_BASE });
    expect(config.social.bearerToken).toBeUndefined();
    expect(config.newsFeeds).toEqual(DEFAULT_NEWS_FEEDS);
  });

  it.each([
    ['primary_stats', 'primary_stats'],
    ['ALT_STATS', 'alt_stats'],
    ['sportmonks', 'primary_stats'],
    ['RapidAPI', 'alt_stats'],
    ['cricbuzz', 'alt_stats']
  ])('resolves provider %s to %s', (input, expected) => {
    expect(loadConfig({ CRICKET_API_PROVIDER: input }).provider).toBe(expected);
  });

  it('falls back to primary_stats and warns on an unknown provider', () => {
    const config = loadConfig({ CRICKET_API_PROVIDER: 'scorecards-r-us' });

    expect(config.provider).toBe('primary_stats');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('treats blank credentials as unset', () => {
    const config = loadConfig({ CRICKET_API_KEY: '   ', RAPIDAPI_KEY: '', X_BEARER_TOKEN: ' ' });

    expect(config.primary.apiKey).toBeUndefined();
    expect(config.alternate.apiKey).toBeUndefined();
    expect(config.social.bearerToken).toBeUndefined();
  });

  it('reads credentials, base urls and port', () => {
    const config = loadConfig({
      CRICKET_API_KEY: 'test-key',
      SPORTMONKS_BASE: 'https://stats.test/v2',
      RAPIDAPI_KEY: 'test-rapid-key',
      RAPIDAPI_HOST: 'cricbuzz.test',
      RAPIDAPI_BASE: 'https://alt.test',
      X_BEARER_TOKEN: 'test-token',
      PORT: '3001'
    });

    expect(config.primary).toEqual({ apiKey: 'test-key', baseUrl: 'https://stats.test/v2' });
    expect(config.alternate).toEqual({ apiKey: 'test-rapid-key', host: 'cricbuzz.test', baseUrl: 'https://alt.test' });
    expect(config.social.bearerToken).toBe('test-token');
    expect(config.port).toBe(3001);
  });

  it('ignores an invalid port', () => {
    expect(loadConfig({ PORT: 'eighty' }).port).toBe(8000);
  });

  it('parses NEWS_FEEDS, dropping invalid and duplicate urls', () => {
    const config = loadConfig({
      NEWS_FEEDS: 'https://a.test/rss, not-a-url, https://a.test/rss, https://b.test/feed'
    });

    expect(config.newsFeeds).toEqual(['https://a.test/rss', 'https://b.test/feed']);
  });

  it('keeps the default feeds when NEWS_FEEDS has no valid url', () => {
    expect(loadConfig({ NEWS_FEEDS: 'ftp://nope, ,' }).newsFeeds).toEqual(DEFAULT_NEWS_FEEDS);
  });

  it('returns a frozen object', () => {
    const config = loadConfig({ CRICKET_API_KEY: 'test-key' });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.primary)).toBe(true);
    expect(Object.isFrozen(config.newsFeeds)).toBe(true);
  });
});

describe('hasProviderCredential', () => {
  it('is false without any provider key', () => {
    expect(hasProviderCredential(loadConfig({ X_BEARER_TOKEN: 'test-token' }))).toBe(false);
  });

  it('is true with either provider key', () => {
    expect(hasProviderCredential(loadConfig({ CRICKET_API_KEY: 'test-key' }))).toBe(true);
    expect(hasProviderCredential(loadConfig({ RAPIDAPI_KEY: 'test-rapid-key' }))).toBe(true);
  });
});
