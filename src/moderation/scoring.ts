import { RuleConfig } from './rule-config';
import { extractTextFeatures, findSpamKeyword } from './text-features';

const LINK_COUNT_MIN = 2;
const LINK_POINTS_CAP = 4;
const SUSPICIOUS_TLD_POINTS = 2;
const SUSPICIOUS_TLD_POINTS_CAP = 6;
const URL_SHORTENER_POINTS = 3;
const INVITE_LINK_POINTS = 4;
const SPAM_KEYWORD_POINTS = 5;
const UNICODE_TRICKS_POINTS = 3;
const NON_ENGLISH_POINTS = 6;
const STRICT_MODE_POINTS = 1;

export interface SpamScore {
  readonly total: number;
  readonly reasons: readonly string[];
  readonly shouldWarn: boolean;
  readonly shouldDelete: boolean;
}

export function formatSpamScore(score: SpamScore): string {
  return `Score: ${score.total} | ${score.reasons.join(', ')}`;
}

/**
 * Additive heuristic score. Every fired rule appends one reason carrying its
 * points; strict mode adds a flat point only to an already positive total.
 */
export function scoreMessage(text: string, strictMode: boolean, rules: RuleConfig): SpamScore {
  const features = extractTextFeatures(text, rules.nonEnglishRatioThreshold);
  const reasons: string[] = [];
  let total = 0;

  const add = (points: number, reason: string): void => {
    total += points;
    reasons.push(`${reason} (+${points})`);
  };

  const linkCount = features.urls.length;
  if (linkCount >= LINK_COUNT_MIN) {
    add(Math.min(linkCount, LINK_POINTS_CAP), `${linkCount} links`);
  }

  const suspiciousTldCount = features.tlds.filter((tld) => tld !== '' && rules.suspiciousTlds.has(tld)).length;
  if (suspiciousTldCount > 0) {
    add(
      Math.min(suspiciousTldCount * SUSPICIOUS_TLD_POINTS, SUSPICIOUS_TLD_POINTS_CAP),
      `Suspicious TLD (${suspiciousTldCount})`,
    );
  }

  if (features.hasUrlShortener) {
    add(URL_SHORTENER_POINTS, 'URL shortener');
  }

  if (features.hasInviteLink) {
    add(INVITE_LINK_POINTS, 'Invite link');
  }

  if (findSpamKeyword(text, rules.spamKeywords)) {
    add(SPAM_KEYWORD_POINTS, 'Spam keywords');
  }

  if (features.hasUnicodeTricks) {
    add(UNICODE_TRICKS_POINTS, 'Unicode tricks');
  }

  if (rules.checkNonEnglish && features.hasNonEnglishText) {
    add(NON_ENGLISH_POINTS, 'Non-English text');
  }

  if (strictMode && total > 0) {
    add(STRICT_MODE_POINTS, 'Strict mode');
  }

  return Object.freeze({
    total,
    reasons: Object.freeze(reasons),
    shouldWarn: total >= rules.warnThreshold,
    shouldDelete: total >= rules.deleteThreshold,
  });
}
