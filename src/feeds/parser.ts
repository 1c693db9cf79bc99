/**
 * FeedRelay — Feed Parser
 *
 * Turns RSS 2.0, Atom 1.0 and RSS 1.0 (RDF) documents into a uniform
 * list of entries. Field cleaning and filtering happen in the fetcher.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { FeedParseError } from '../lib/errors';
import type { FeedFormat, ParsedFeed, ParsedFeedEntry } from '../types/feed';

// ============================================================
// XML NODE HELPERS
// ============================================================

export type XmlNode = Record<string, unknown>;

export function isRecord(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Text of a node, whether it is a plain value, a CDATA section or an
 * element with attributes.
 */
export function textOf(node: unknown): string | null {
  if (node === null || node === undefined) return null;
  if (typeof node === 'string') return node;
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (Array.isArray(node)) return textOf(node[0]);
  if (!isRecord(node)) return null;

  if (node.__cdata !== undefined) return textOf(node.__cdata);
  if (node['#text'] !== undefined) return textOf(node['#text']);
  return null;
}

export function attrOf(node: unknown, name: string): string | null {
  if (!isRecord(node)) return null;
  const value = node[`@_${name}`];
  if (value === undefined || value === null) return null;
  return String(value);
}

// ============================================================
// PARSER
// ============================================================

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  cdataPropName: '__cdata',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  removeNSPrefix: false,
  htmlEntities: true,
});

function firstText(entry: XmlNode, fields: string[]): string | null {
  for (const field of fields) {
    const text = textOf(entry[field]);
    if (text && text.trim()) return text.trim();
  }
  return null;
}

/**
 * Atom entries may carry several <link> elements; prefer rel="alternate".
 */
function extractLink(node: unknown): string | null {
  if (typeof node === 'string') return node.trim() || null;

  const links = asArray(node);
  let fallback: string | null = null;

  for (const link of links) {
    if (typeof link === 'string') {
      if (link.trim()) return link.trim();
      continue;
    }
    const href = attrOf(link, 'href') ?? textOf(link);
    if (!href) continue;

    const rel = attrOf(link, 'rel') ?? 'alternate';
    if (rel === 'alternate') return href.trim();
    fallback ??= href.trim();
  }

  return fallback;
}

function detectFormat(document: XmlNode): { format: FeedFormat; channel: XmlNode; items: unknown[] } | null {
  const rss = document.rss;
  if (isRecord(rss)) {
    const channel = isRecord(rss.channel) ? rss.channel : {};
    return { format: 'rss', channel, items: asArray(channel.item) };
  }

  const feed = document.feed;
  if (isRecord(feed)) {
    return { format: 'atom', channel: feed, items: asArray(feed.entry) };
  }

  const rdf = document['rdf:RDF'];
  if (isRecord(rdf)) {
    const channel = isRecord(rdf.channel) ? rdf.channel : {};
    return { format: 'rdf', channel, items: asArray(rdf.item) };
  }

  return null;
}

function permalinkGuid(node: unknown): string | null {
  if (attrOf(node, 'isPermaLink') === 'false') return null;
  const guid = textOf(node)?.trim();
  return guid && /^https?:\/\//i.test(guid) ? guid : null;
}

function toEntry(node: XmlNode): ParsedFeedEntry {
  return {
    title: firstText(node, ['title']) ?? '',
    body: firstText(node, ['content:encoded', 'content', 'description', 'summary']) ?? '',
    link: extractLink(node.link) ?? permalinkGuid(node.guid),
    published: firstText(node, ['pubDate', 'published', 'updated', 'dc:date']),
    node,
  };
}

/**
 * Parse a feed document. Throws FeedParseError for malformed XML or an
 * unrecognised root element.
 */
export function parseFeedDocument(xml: string, url: string): ParsedFeed {
  const source = xml.replace(/^\uFEFF/, '').trim();
  if (!source) {
    throw new FeedParseError(url, 'empty document');
  }

  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    throw new FeedParseError(url, `${validation.err.msg} (line ${validation.err.line})`);
  }

  let document: unknown;
  try {
    document = parser.parse(source);
  } catch (error) {
    throw new FeedParseError(url, error instanceof Error ? error.message : String(error), error);
  }

  if (!isRecord(document)) {
    throw new FeedParseError(url, 'unexpected document shape');
  }

  const detected = detectFormat(document);
  if (!detected) {
    throw new FeedParseError(url, 'unrecognized feed format');
  }

  return {
    format: detected.format,
    title: firstText(detected.channel, ['title']),
    entries: detected.items.filter(isRecord).map(toEntry),
  };
}

/**
 * Parse the published timestamp of an entry. Returns null when missing or
 * unparseable.
 */
export function parsePublished(value: string | null): Date | null {
  if (!value) return null;
  const time = Date.parse(value.trim());
  return Number.isNaN(time) ? null : new Date(time);
}
