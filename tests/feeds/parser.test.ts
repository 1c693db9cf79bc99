/**
 * Tests for the RSS / Atom / RDF parser
 */

import { describe, it, expect } from 'vitest';
import { parseFeedDocument, parsePublished } from '../../src/feeds/parser';
import { FeedParseError } from '../../src/lib/errors';

const FEED_URL = 'https://example.org/feed.xml';

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/">
  <channel>
    <title>Example News</title>
    <item>
      <title>First story about compilers</title>
      <link>https://example.org/first</link>
      <description>Short summary</description>
      <content:encoded><![CDATA[<p>Full <b>body</b> text</p>]]></content:encoded>
      <pubDate>Tue, 10 Jun 2025 04:00:00 GMT</pubDate>
    </item>
    <item>
      <title>Second</title>
      <guid>https://example.org/second</guid>
      <description>Only a description</description>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Example</title>
  <entry>
    <title type="html">Atom entry title here</title>
    <link rel="self" href="https://example.org/self"/>
    <link rel="alternate" href="https://example.org/atom-1"/>
    <summary>Summary text</summary>
    <updated>2025-06-10T04:00:00Z</updated>
  </entry>
</feed>`;

const RDF = `<?xml version="1.0"?>
<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#" xmlns="http://purl.org/rss/1.0/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel rdf:about="https://example.org/"><title>RDF Example</title></channel>
  <item rdf:about="https://example.org/rdf-1">
    <title>RDF item title</title>
    <link>https://example.org/rdf-1</link>
    <description>RDF description</description>
    <dc:date>2025-06-10T04:00:00Z</dc:date>
  </item>
</rdf:RDF>`;

describe('parseFeedDocument', () => {
  describe('RSS 2.0', () => {
    const parsed = parseFeedDocument(RSS, FEED_URL);

    it('should detect the format and channel title', () => {
      expect(parsed.format).toBe('rss');
      expect(parsed.title).toBe('Example News');
      expect(parsed.entries).toHaveLength(2);
    });

    it('should prefer content:encoded over description', () => {
      const [first] = parsed.entries;
      expect(first?.title).toBe('First story about compilers');
      expect(first?.body).toBe('<p>Full <b>body</b> text</p>');
      expect(first?.link).toBe('https://example.org/first');
      expect(first?.published).toBe('Tue, 10 Jun 2025 04:00:00 GMT');
    });

    it('should fall back to a permalink guid', () => {
      const second = parsed.entries[1];
      expect(second?.link).toBe('https://example.org/second');
      expect(second?.body).toBe('Only a description');
      expect(second?.published).toBeNull();
    });
  });

  describe('Atom', () => {
    const parsed = parseFeedDocument(ATOM, FEED_URL);

    it('should read the alternate link and updated date', () => {
      expect(parsed.format).toBe('atom');
      expect(parsed.title).toBe('Atom Example');
      expect(parsed.entries[0]).toMatchObject({
        title: 'Atom entry title here',
        body: 'Summary text',
        link: 'https://example.org/atom-1',
        published: '2025-06-10T04:00:00Z',
      });
    });
  });

  describe('RDF', () => {
    it('should read items outside the channel and dc:date', () => {
      const parsed = parseFeedDocument(RDF, FEED_URL);
      expect(parsed.format).toBe('rdf');
      expect(parsed.title).toBe('RDF Example');
      expect(parsed.entries[0]).toMatchObject({
        title: 'RDF item title',
        link: 'https://example.org/rdf-1',
        published: '2025-06-10T04:00:00Z',
      });
    });
  });

  it('should ignore a byte order mark', () => {
    expect(parseFeedDocument(`\uFEFF${RSS}`, FEED_URL).entries).toHaveLength(2);
  });

  it('should reject empty documents', () => {
    expect(() => parseFeedDocument('   ', FEED_URL)).toThrow(
      'Failed to parse https://example.org/feed.xml: empty document'
    );
  });

  it('should reject malformed XML', () => {
    expect(() => parseFeedDocument('<rss><channel></rss>', FEED_URL)).toThrow(FeedParseError);
  });

  it('should reject documents that are not feeds', () => {
    expect(() => parseFeedDocument('<html><body><p>hi</p></body></html>', FEED_URL)).toThrow(
      'Failed to parse https://example.org/feed.xml: unrecognized feed format'
    );
  });
});

describe('parsePublished', () => {
  it('should parse RFC 822 and ISO dates', () => {
    expect(parsePublished('Tue, 10 Jun 2025 04:00:00 GMT')?.getTime()).toBe(Date.UTC(2025, 5, 10, 4));
    expect(parsePublished('2025-06-10T04:00:00Z')?.getTime()).toBe(Date.UTC(2025, 5, 10, 4));
  });

  it('should return null for missing or invalid values', () => {
    expect(parsePublished(null)).toBeNull();
    expect(parsePublished('yesterday-ish')).toBeNull();
  });
});
