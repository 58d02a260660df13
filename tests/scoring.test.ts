import { describe, expect, it } from 'vitest';
import { createRuleConfig } from '../src/moderation/rule-config';
import { formatSpamScore, scoreMessage } from '../src/moderation/scoring';

const rules = createRuleConfig();

describe('scoreMessage', () => {
  it('gives a clean message zero points', () => {
    const score = scoreMessage('Hello everyone! How are you doing today?', false, rules);

    expect(score).toEqual({ total: 0, reasons: [], shouldWarn: false, shouldDelete: false });
  });

  it('only warns on plain Hindi text', () => {
    const score = scoreMessage('नमस्ते दोस्तों, आज हम बाजार चलेंगे', false, rules);

    expect(score).toEqual({
      total: 6,
      reasons: ['Non-English text (+6)'],
      shouldWarn: true,
      shouldDelete: false,
    });
  });

  it('scores links, a suspicious TLD and a shortener together', () => {
    const score = scoreMessage('Check out https://bit.ly/a and https://scam.xyz', false, rules);

    expect(score.total).toBe(7);
    expect(score.reasons).toEqual(['2 links (+2)', 'Suspicious TLD (1) (+2)', 'URL shortener (+3)']);
    expect(score.shouldWarn).toBe(true);
    expect(score.shouldDelete).toBe(false);
  });

  it('adds one point in strict mode only to a positive total', () => {
    const text = 'Check out https://bit.ly/a and https://scam.xyz';
    const strict = scoreMessage(text, true, rules);

    expect(strict.total).toBe(8);
    expect(strict.reasons[strict.reasons.length - 1]).toBe('Strict mode (+1)');
    expect(strict.shouldDelete).toBe(true);

    const clean = scoreMessage('Good morning', true, rules);
    expect(clean.total).toBe(0);
    expect(clean.reasons).toEqual([]);
  });

  it('caps link and TLD points', () => {
    expect(scoreMessage('a.com b.com c.com d.com e.com f.com', false, rules).reasons).toEqual(['6 links (+4)']);

    const tlds = scoreMessage('x.ru y.xyz z.top w.icu', false, rules);
    expect(tlds.reasons).toEqual(['4 links (+4)', 'Suspicious TLD (4) (+6)']);
    expect(tlds.total).toBe(10);
  });

  it('counts keyword hits once', () => {
    const score = scoreMessage('Free crypto airdrop! Claim now!', false, rules);

    expect(score.total).toBe(5);
    expect(score.reasons).toEqual(['Spam keywords (+5)']);
  });

  it('flags invite links', () => {
    const score = scoreMessage('Join our group: https://t.me/joinchat/abc123', false, rules);

    expect(score.reasons).toEqual(['Invite link (+4)']);
    expect(score.shouldWarn).toBe(true);
  });

  it('flags invisible characters', () => {
    expect(scoreMessage('Hello\u200bWorld', false, rules).reasons).toEqual(['Unicode tricks (+3)']);
  });

  it('respects the non-English toggle', () => {
    expect(scoreMessage('Привет всем', false, rules).reasons).toEqual(['Non-English text (+6)']);

    const relaxed = createRuleConfig({ checkNonEnglish: false });
    expect(scoreMessage('Привет всем', false, relaxed).total).toBe(0);
  });

  it('lists reasons in rule order', () => {
    const score = scoreMessage(
      'FREE CRYPTO https://bit.ly/x https://t.me/joinchat/abc https://scam.xyz',
      false,
      rules,
    );

    expect(score.reasons).toEqual([
      '3 links (+3)',
      'Suspicious TLD (1) (+2)',
      'URL shortener (+3)',
      'Invite link (+4)',
      'Spam keywords (+5)',
    ]);
    expect(score.total).toBe(17);
    expect(score.shouldDelete).toBe(true);
  });

  it('compares against the configured thresholds independently', () => {
    const tight = createRuleConfig({ warnThreshold: 2, deleteThreshold: 3 });
    const score = scoreMessage('a.com b.com', false, tight);

    expect(score.total).toBe(2);
    expect(score.shouldWarn).toBe(true);
    expect(score.shouldDelete).toBe(false);
  });

  it('is deterministic and frozen', () => {
    const text = 'Check out https://bit.ly/a and https://scam.xyz';
    const first = scoreMessage(text, false, rules);
    const second = scoreMessage(text, false, rules);

    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.reasons)).toBe(true);
  });

  it('never lowers the score when a signal is added', () => {
    const base = scoreMessage('see https://scam.xyz', false, rules).total;
    const withKeyword = scoreMessage('see https://scam.xyz airdrop', false, rules).total;
    const withShortener = scoreMessage('see https://scam.xyz https://bit.ly/q', false, rules).total;

    expect(withKeyword).toBeGreaterThanOrEqual(base);
    expect(withShortener).toBeGreaterThanOrEqual(base);
  });
});

describe('formatSpamScore', () => {
  it('renders the total and reasons on one line', () => {
    const score = scoreMessage('Check out https://bit.ly/a and https://scam.xyz', false, rules);

    expect(formatSpamScore(score)).toBe('Score: 7 | 2 links (+2), Suspicious TLD (1) (+2), URL shortener (+3)');
  });
});
