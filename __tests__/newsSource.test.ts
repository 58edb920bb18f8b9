import { loadConfig } from '../src/config';
import { MAX_NEWS_ITEMS, NewsSource } from '../src/sources/newsSource';
import { createStubTransport, rssFeed, silenceConsole, textReply } from './helpers/stubTransport';

const FEEDS = ['https://feeds.test/a', 'https://feeds.test/b', 'https://feeds.test/c'];
const config = loadConfig({ NEWS_FEEDS: FEEDS.join(',') });

describe('NewsSource', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  it('caps the combined list at 50 items in feed-then-entry order', async () => {
    const { transport, calls } = createStubTransport({
      'https://feeds.test/a': textReply(rssFeed('Feed A', 25, 'a')),
      'https://feeds.test/b': textReply(rssFeed('Feed B', 25, 'b')),
      'https://feeds.test/c': textReply(rssFeed('Feed C', 25, 'c'))
    });

    const items = await new NewsSource(config, transport).getNews();

    expect(items).toHaveLength(MAX_NEWS_ITEMS);
    expect(items[0].title).toBe('a item 1');
    expect(items[19].title).toBe('a item 20');
    expect(items[20].title).toBe('b item 1');
    expect(items[40].title).toBe('c item 1');
    expect(items[49].title).toBe('c item 10');
    expect(items[49].source).toBe('Feed C');
    expect(calls.map(call => call.url)).toEqual(FEEDS);
  });

  it('skips feeds that fail and keeps the rest', async () => {
    const { transport } = createStubTransport({
      'https://feeds.test/a': textReply('Service Unavailable', 503),
      'https://feeds.test/b': new Error('socket hang up'),
      'https://feeds.test/c': textReply(rssFeed('Feed C', 2, 'c'))
    });

    const items = await new NewsSource(config, transport).getNews();

    expect(items.map(item => item.title)).toEqual(['c item 1', 'c item 2']);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('returns an empty list when every feed fails', async () => {
    const { transport } = createStubTransport();

    await expect(new NewsSource(config, transport).getNews()).resolves.toEqual([]);
  });
});
