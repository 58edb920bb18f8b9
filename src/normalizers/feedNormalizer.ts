import * as cheerio from 'cheerio';
import { isTag, type Element } from 'domhandler';
import type { NewsItem } from '../types';

export const ENTRIES_PER_FEED = 20;

export interface ParsedFeed {
  title: string;
  items: NewsItem[];
}

function childElements(element: Element, tagName: string): Element[] {
  return element.children.filter((child): child is Element => isTag(child) && child.name === tagName);
}

function firstChildText(dom: cheerio.CheerioAPI, element: Element, ...tagNames: string[]): string | null {
  for (const tagName of tagNames) {
    const [child] = childElements(element, tagName);
    if (!child) continue;
    const text = dom(child).text().trim();
    if (text) return text;
  }
  return null;
}

/** Atom guarda o link em atributo; prefere rel="alternate" quando existir. */
function entryLink(dom: cheerio.CheerioAPI, element: Element): string | null {
  const links = childElements(element, 'link');
  if (links.length === 0) return null;

  const withHref = links.filter(link => Boolean(link.attribs.href));
  if (withHref.length > 0) {
    const alternate = withHref.find(link => !link.attribs.rel || link.attribs.rel === 'alternate');
    return (alternate ?? withHref[0]).attribs.href;
  }

  return firstChildText(dom, element, 'link');
}

function entryImage(element: Element): string | null {
  for (const tagName of ['media:thumbnail', 'media:content']) {
    const [media] = childElements(element, tagName);
    if (media) return media.attribs.url || null;
  }
  return null;
}

function normalizeEntry(dom: cheerio.CheerioAPI, element: Element, source: string): NewsItem {
  return {
    title: firstChildText(dom, element, 'title'),
    link: entryLink(dom, element),
    summary: firstChildText(dom, element, 'description', 'summary', 'content') ?? '',
    published: firstChildText(dom, element, 'pubDate', 'published', 'dc:date', 'updated'),
    source,
    image: entryImage(element)
  };
}

/**
 * Lê RSS 2.0 (`<item>`) ou Atom (`<entry>`) e devolve no máximo `limit` itens,
 * na ordem do documento.
 */
export function parseFeed(xml: string, limit = ENTRIES_PER_FEED): ParsedFeed {
  const dom = cheerio.load(xml, { xml: true });
  if (dom('channel, feed').length === 0) {
    throw new Error('Documento não é um feed RSS/Atom');
  }

  const title = dom('channel > title').first().text().trim()
    || dom('feed > title').first().text().trim()
    || 'RSS';

  const rssItems = dom('item').toArray();
  const entries = rssItems.length > 0 ? rssItems : dom('entry').toArray();

  return {
    title,
    items: entries.slice(0, limit).map(entry => normalizeEntry(dom, entry, title))
  };
}
