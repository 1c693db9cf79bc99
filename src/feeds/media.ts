/**
 * FeedRelay — Media Extractor
 *
 * Picks a representative image and an optional video out of a parsed
 * entry. Pure: no network access, no storage.
 */

import { asArray, attrOf, isRecord, textOf, type XmlNode } from './parser';
import { isHttpUrl } from './text';

export interface MediaOptions {
  /** Declared video sizes above this are skipped */
  maxVideoBytes: number;
}

export interface ExtractedMedia {
  imageUrl: string | null;
  videoUrl: string | null;
}

interface MediaCandidate {
  url: string;
  type: string | null;
  medium: string | null;
  length: number | null;
}

const DEFAULT_OPTIONS: MediaOptions = {
  maxVideoBytes: 50 * 1024 * 1024,
};

const IMAGE_EXTENSIONS = /\.(jpe?g|png|gif|webp|avif)(\?|$)/i;
const VIDEO_EXTENSIONS = /\.(mp4|webm|mov|m4v)(\?|$)/i;

// ============================================================
// CANDIDATES
// ============================================================

function toCandidate(node: unknown, urlAttr = 'url'): MediaCandidate | null {
  const url = attrOf(node, urlAttr);
  if (!url || !isHttpUrl(url)) return null;

  const rawLength = attrOf(node, 'length') ?? attrOf(node, 'fileSize');
  const length = rawLength !== null && /^\d+$/.test(rawLength) ? Number(rawLength) : null;

  return {
    url,
    type: attrOf(node, 'type')?.toLowerCase() ?? null,
    medium: attrOf(node, 'medium')?.toLowerCase() ?? null,
    length,
  };
}

/**
 * media:content may sit directly on the item or inside media:group.
 */
function mediaContents(entry: XmlNode): MediaCandidate[] {
  const nodes = [
    ...asArray(entry['media:content']),
    ...asArray(entry['media:group']).flatMap((group) =>
      isRecord(group) ? asArray(group['media:content']) : []
    ),
  ];
  return nodes.map((node) => toCandidate(node)).filter((c): c is MediaCandidate => c !== null);
}

function enclosures(entry: XmlNode): MediaCandidate[] {
  return asArray(entry.enclosure)
    .map((node) => toCandidate(node))
    .filter((c): c is MediaCandidate => c !== null);
}

function isImage(candidate: MediaCandidate): boolean {
  if (candidate.medium === 'image') return true;
  if (candidate.type) return candidate.type.startsWith('image/');
  return candidate.medium === null && IMAGE_EXTENSIONS.test(candidate.url);
}

function isVideo(candidate: MediaCandidate): boolean {
  if (candidate.medium === 'video') return true;
  if (candidate.type) return candidate.type.startsWith('video/');
  return candidate.medium === null && VIDEO_EXTENSIONS.test(candidate.url);
}

function firstInlineImage(html: string): string | null {
  const match = /<img\b[^>]*?\bsrc\s*=\s*["']([^"']+)["']/i.exec(html);
  if (!match?.[1]) return null;
  return isHttpUrl(match[1]) ? match[1] : null;
}

// ============================================================
// EXTRACTION
// ============================================================

export function extractImage(entry: XmlNode): string | null {
  const thumbnail = asArray(entry['media:thumbnail'])
    .map((node) => toCandidate(node))
    .find((c): c is MediaCandidate => c !== null);
  if (thumbnail) return thumbnail.url;

  const fromMedia = mediaContents(entry).find(isImage);
  if (fromMedia) return fromMedia.url;

  const fromEnclosure = enclosures(entry).find(isImage);
  if (fromEnclosure) return fromEnclosure.url;

  const itunes = toCandidate(entry['itunes:image'], 'href');
  if (itunes) return itunes.url;

  for (const field of ['content:encoded', 'description', 'content', 'summary']) {
    const html = textOf(entry[field]);
    const inline = html ? firstInlineImage(html) : null;
    if (inline) return inline;
  }

  return null;
}

export function extractVideo(entry: XmlNode, options: MediaOptions = DEFAULT_OPTIONS): string | null {
  const candidates = [...mediaContents(entry), ...enclosures(entry)].filter(isVideo);
  const accepted = candidates.find(
    (c) => c.length === null || c.length <= options.maxVideoBytes
  );
  return accepted?.url ?? null;
}

export function extractMedia(entry: XmlNode, options: MediaOptions = DEFAULT_OPTIONS): ExtractedMedia {
  return {
    imageUrl: extractImage(entry),
    videoUrl: extractVideo(entry, options),
  };
}
