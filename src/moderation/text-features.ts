import { isIpv4Host, normalizeDomain, stripTrailingPunctuation, stripWwwPrefix } from '../utils/domain';
import { hasNonEnglishText, hasUnicodeTricks } from './script-detector';

// Over-inclusive on purpose: bare `word.tld` tokens count as links too.
const URL_REGEX = /(?:https?:\/\/|www\.|[a-z0-9-]+\.[a-z]{2,})[^\s<>"')]*/gi;
const TLD_LABEL_REGEX = /^(?:[a-z]{2,63}|xn--[a-z0-9-]{2,59})$/;

const INVITE_LINK_PATTERNS: readonly RegExp[] = [
  /t\.me\/joinchat\//i,
  /t\.me\/\+/i,
  /telegram\.me\/joinchat\//i,
  /telegram\.me\/\+/i,
  /max\.ru\/join\//i,
];

export const URL_SHORTENER_DOMAINS: ReadonlySet<string> = new Set([
  'bit.ly',
  't.co',
  'tinyurl.com',
  'goo.gl',
  'ow.ly',
  'is.gd',
  'buff.ly',
  'adf.ly',
]);

export interface TextFeatures {
  urls: string[];
  tlds: string[];
  hasInviteLink: boolean;
  hasUrlShortener: boolean;
  hasUnicodeTricks: boolean;
  hasNonEnglishText: boolean;
}

export function extractUrls(text: string): string[] {
  const urls: string[] = [];

  for (const match of text.matchAll(URL_REGEX)) {
    const candidate = stripTrailingPunctuation(match[0]);
    if (candidate) {
      urls.push(candidate);
    }
  }

  return urls;
}

/** A single alphabetic or punycode label; the only shape `extractTld` returns. */
export function isTldLabel(value: string): boolean {
  return TLD_LABEL_REGEX.test(value);
}

/** Last hostname label, or '' when the URL has no usable domain. */
export function extractTld(url: string): string {
  const hostname = normalizeDomain(url);
  if (!hostname || isIpv4Host(hostname)) {
    return '';
  }

  const labels = hostname.split('.');
  if (labels.length < 2) {
    return '';
  }

  const tld = labels[labels.length - 1] ?? '';
  return isTldLabel(tld) ? tld : '';
}

export function hasInviteLink(text: string): boolean {
  return INVITE_LINK_PATTERNS.some((pattern) => pattern.test(text));
}

export function hasUrlShortener(urls: readonly string[]): boolean {
  return urls.some((url) => {
    const hostname = normalizeDomain(url);
    return hostname !== null && URL_SHORTENER_DOMAINS.has(stripWwwPrefix(hostname));
  });
}

export function findSpamKeyword(text: string, patterns: readonly RegExp[]): RegExp | null {
  return patterns.find((pattern) => pattern.test(text)) ?? null;
}

export function extractTextFeatures(text: string, nonEnglishRatioThreshold: number): TextFeatures {
  const urls = extractUrls(text);

  return {
    urls,
    tlds: urls.map(extractTld),
    hasInviteLink: hasInviteLink(text),
    hasUrlShortener: hasUrlShortener(urls),
    hasUnicodeTricks: hasUnicodeTricks(text),
    hasNonEnglishText: hasNonEnglishText(text, nonEnglishRatioThreshold),
  };
}
