import { describe, it, expect } from 'vitest';
import { ratingEvent } from '../../ratings/__tests__/fixtures.js';
import { PENDING_TECHNICAL_SIGNAL } from '../contracts/recommendation.contracts.js';
import { buildRationale, computeScore, scoreCandidate } from '../services/recommendation.scorer.js';

const NOW = new Date('2024-06-10T12:00:00Z');
const DAY = 24 * 60 * 60 * 1000;

const daysAgo = (days: number) => new Date(NOW.getTime() - days * DAY);

describe('computeScore', () => {
  it('scores a fresh Hold to Buy upgrade at 0.90', () => {
    expect(computeScore(ratingEvent({ ratingFrom: 'Hold', ratingTo: 'Buy', issuedAt: NOW }), NOW)).toBe(0.9);
  });

  it('adds the label bonus', () => {
    const old = daysAgo(30);
    expect(computeScore(ratingEvent({ ratingTo: 'Strong Buy', issuedAt: old }), NOW)).toBe(0.9);
    expect(computeScore(ratingEvent({ ratingTo: 'Buy', issuedAt: old }), NOW)).toBe(0.85);
    expect(computeScore(ratingEvent({ ratingTo: 'Overweight', issuedAt: old }), NOW)).toBe(0.8);
    expect(computeScore(ratingEvent({ ratingTo: 'Hold', issuedAt: old }), NOW)).toBe(0.7);
  });

  it('applies the recency bonus inside seven days only', () => {
    expect(computeScore(ratingEvent({ ratingTo: 'Hold', issuedAt: daysAgo(6.9) }), NOW)).toBe(0.75);
    expect(computeScore(ratingEvent({ ratingTo: 'Hold', issuedAt: daysAgo(7) }), NOW)).toBe(0.7);
  });

  it('stays within [0.70, 1.0]', () => {
    const labels = ['Strong Buy', 'Buy', 'Outperform', 'Overweight', 'Hold', 'Sell', 'Unknown'];
    for (const ratingTo of labels) {
      for (const issuedAt of [NOW, daysAgo(3), daysAgo(90)]) {
        const score = computeScore(ratingEvent({ ratingTo, issuedAt }), NOW);
        expect(score).toBeGreaterThanOrEqual(0.7);
        expect(score).toBeLessThanOrEqual(1);
      }
    }
  });
});

describe('buildRationale', () => {
  it('mentions label, brokerage, recency and target', () => {
    const event = ratingEvent({ ratingTo: 'Buy', brokerage: 'Goldman Sachs', issuedAt: NOW, targetTo: 210 });

    expect(buildRationale(event, NOW)).toBe('Buy rating by Goldman Sachs, issued today, price target $210.00');
  });

  it('counts whole days', () => {
    const event = ratingEvent({ issuedAt: daysAgo(3.5), targetTo: undefined });

    expect(buildRationale(event, NOW)).toBe('Buy rating by Goldman Sachs, issued 3 days ago');
  });

  it('drops the recency clause after a week', () => {
    const event = ratingEvent({ issuedAt: daysAgo(20), targetTo: 99.5 });

    expect(buildRationale(event, NOW)).toBe('Buy rating by Goldman Sachs, price target $99.50');
  });
});

describe('scoreCandidate', () => {
  it('builds the recommendation', () => {
    const rec = scoreCandidate(ratingEvent({ issuedAt: daysAgo(2), targetTo: 210 }), NOW);

    expect(rec).toEqual({
      ticker: 'AAPL',
      company: 'Apple Inc.',
      score: 0.9,
      rationale: 'Buy rating by Goldman Sachs, issued 2 days ago, price target $210.00',
      latestRating: 'Buy',
      targetPrice: 210,
      technicalSignal: PENDING_TECHNICAL_SIGNAL,
      sentimentScore: undefined,
      generatedAt: NOW,
    });
  });
});
