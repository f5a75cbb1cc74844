import type { AppConfig } from '../../shared/config';
import type { FeedEntry } from '../reading/types';
import { decodeEntities, escapeRegExp, stripTags } from '../utils/text';
import { fetchText } from './http';

const FEED_ACCEPT = 'application/rss+xml, application/xml, text/xml;q=0.9, */*;q=0.1';

interface TagValue {
  value: string;
  cdata: boolean;
}

const extractTag = (xml: string, tag: string): TagValue | null => {
  const name = escapeRegExp(tag);
  const cdata = new RegExp(`<${name}(?:\\s[^>]*)?>\\s*<!\\[CDATA\\[([\\s\\S]*?)\\]\\]>\\s*</${name}>`, 'i');
  const m1 = xml.match(cdata);
  if (m1) return { value: m1[1].trim(), cdata: true };
  const plain = new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)</${name}>`, 'i');
  const m2 = xml.match(plain);
  if (m2) return { value: m2[1].trim(), cdata: false };
  return null;
};

// CDATA already holds markup; an escaped body needs one round of decoding to become markup.
const markupOf = (tag: TagValue | null): string | undefined => {
  if (!tag || !tag.value) return undefined;
  return tag.cdata ? tag.value : decodeEntities(tag.value);
};

// CDATA text carries its own entities; an escaped body is decoded exactly once, before tags come off.
const textOf = (tag: TagValue | null): string | undefined => {
  if (!tag || !tag.value) return undefined;
  const text = tag.cdata ? decodeEntities(stripTags(tag.value)) : stripTags(decodeEntities(tag.value));
  return text || undefined;
};

const AUTHOR_TAGS = ['author_name', 'dc:creator', 'author'];

/** Reads the `<item>` blocks of an RSS document in document order. Items without a title are skipped. */
export const parseFeed = (xml: string): FeedEntry[] => {
  const parts = xml.split(/<item\b[^>]*>/i);
  const entries: FeedEntry[] = [];

  for (let i = 1; i < parts.length; i += 1) {
    const chunk = parts[i];
    const end = chunk.search(/<\/item>/i);
    if (end < 0) continue;
    const itemXml = chunk.slice(0, end);

    const title = textOf(extractTag(itemXml, 'title'));
    if (!title) continue;

    const entry: FeedEntry = { title };
    const published = textOf(extractTag(itemXml, 'pubDate'));
    if (published) entry.published = published;
    const description = markupOf(extractTag(itemXml, 'description'));
    if (description) entry.description = description;
    for (const tag of AUTHOR_TAGS) {
      const author = markupOf(extractTag(itemXml, tag));
      if (author) {
        entry.author = author;
        break;
      }
    }

    entries.push(entry);
  }

  return entries;
};

export const fetchFeed = async (config: AppConfig): Promise<FeedEntry[]> => {
  const url = config.sources.feedUrl;
  if (!url) return [];
  const xml = await fetchText(url, {
    timeoutMs: config.sources.fetchTimeoutMs,
    userAgent: config.sources.userAgent,
    accept: FEED_ACCEPT,
  });
  return parseFeed(xml);
};
