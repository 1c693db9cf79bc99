/**
 * FeedRelay — Message formatting
 *
 * Builds the HTML message posted for an item: bold title, body trimmed to
 * fit, hashtags and a link back to the source.
 */

export const MESSAGE_LIMIT = 4096;
export const CAPTION_LIMIT = 1024;

const SOURCE_LABELS: Record<string, string> = {
  en: 'Source',
  ru: 'Источник',
  de: 'Quelle',
  fr: 'Source',
  es: 'Fuente',
  it: 'Fonte',
};

export interface MessageParts {
  title: string;
  content: string;
  sourceUrl: string;
  language: string;
  hashtags?: string[];
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/**
 * "Machine Learning" → "#MachineLearning". Returns null when nothing usable is left.
 */
export function toHashtag(label: string | null | undefined): string | null {
  if (!label) return null;
  const tag = label.replace(/[^\p{L}\p{N}_]+/gu, '');
  return tag ? `#${tag}` : null;
}

/**
 * Cut at the last word boundary that fits and add an ellipsis.
 */
export function truncateAtWord(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 1) return '…'.slice(0, maxLength);

  const slice = text.slice(0, maxLength - 1);
  const lastSpace = slice.lastIndexOf(' ');
  const cut = lastSpace > maxLength / 2 ? slice.slice(0, lastSpace) : slice;
  return `${cut.trimEnd()}…`;
}

export function formatMessage(parts: MessageParts, limit: number = MESSAGE_LIMIT): string {
  const title = `<b>${escapeHtml(parts.title)}</b>`;
  const label = SOURCE_LABELS[parts.language] ?? SOURCE_LABELS.en;
  const footerLines = [
    parts.hashtags && parts.hashtags.length > 0 ? parts.hashtags.join(' ') : null,
    `<a href="${escapeHtml(parts.sourceUrl)}">${label}</a>`,
  ].filter((line): line is string => line !== null);
  const footer = footerLines.join('\n');

  // Escaping can only lengthen the body, so trim the escaped text
  const budget = limit - title.length - footer.length - 4;
  const body = budget > 0 ? truncateEscaped(parts.content, budget) : '';

  return [title, body, footer].filter((block) => block.length > 0).join('\n\n');
}

function truncateEscaped(text: string, budget: number): string {
  let candidate = escapeHtml(text);
  if (candidate.length <= budget) return candidate;

  let length = Math.min(text.length, budget);
  while (length > 0) {
    candidate = escapeHtml(truncateAtWord(text, length));
    if (candidate.length <= budget) return candidate;
    length = Math.floor(length * 0.9);
  }
  return '';
}
