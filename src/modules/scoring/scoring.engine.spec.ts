import { ReviewSession } from '../sessions/session.types';
import { qualityXp, scoreBreakdown, scoreSession, scoreSessions } from './scoring.engine';

const HOUR = 60 * 60 * 1000;

function session(overrides: Partial<ReviewSession> & { comments: ReviewSession['comments'] }): ReviewSession {
  const commentCount = overrides.comments.length;
  return {
    repositoryId: 1,
    pullRequest: 7,
    reviewer: 'bob',
    windowStart: new Date('2026-03-02T10:30:00Z'),
    windowEnd: new Date('2026-03-02T10:40:00Z'),
    commentCount,
    substantiveCommentCount: overrides.comments.filter((c) => c.substantive).length,
    stateChange: null,
    elapsedSinceLastCommitMs: null,
    ...overrides,
  };
}

const substantive = (n: number, prefix = 'c') =>
  Array.from({ length: n }, (_, i) => ({ id: `${prefix}${i + 1}`, substantive: true }));

describe('scoreSession (flat)', () => {
  it('scores three substantive comments half an hour after the push at 35', () => {
    const s = session({ comments: substantive(3), elapsedSinceLastCommitMs: 0.5 * HOUR });
    expect(scoreSession(s)).toBe(35);
  });

  it('adds the thorough bonus for seven comments at 60', () => {
    const s = session({ comments: substantive(7), elapsedSinceLastCommitMs: 0.75 * HOUR });
    expect(scoreBreakdown(s)).toEqual({ base: 10, comments: 35, fast: 10, thorough: 5, deep: 0 });
    expect(scoreSession(s)).toBe(60);
  });

  it('adds the deep bonus on top of thorough past ten comments', () => {
    const s = session({ comments: substantive(11), elapsedSinceLastCommitMs: 2 * HOUR });
    expect(scoreSession(s)).toBe(10 + 55 + 5 + 10);
  });

  it('gives no fast bonus to a session opened at the same instant as the push', () => {
    const s = session({ comments: substantive(1), elapsedSinceLastCommitMs: 0 });
    expect(scoreBreakdown(s).fast).toBe(0);
    expect(scoreSession(s)).toBe(15);
  });

  it('gives no fast bonus without a preceding commit or at exactly one hour', () => {
    expect(scoreBreakdown(session({ comments: substantive(1) })).fast).toBe(0);
    expect(
      scoreBreakdown(session({ comments: substantive(1), elapsedSinceLastCommitMs: HOUR })).fast,
    ).toBe(0);
  });

  it('counts short comments toward thoroughness but pays nothing for them', () => {
    const comments = [
      ...substantive(1),
      ...Array.from({ length: 5 }, (_, i) => ({ id: `n${i}`, substantive: false })),
    ];
    expect(scoreSession(session({ comments }))).toBe(10 + 5 + 5);
  });
});

describe('scoreSession (quality-weighted)', () => {
  it('scores five high-quality comments with two logic and one structural at 58', () => {
    const s = session({ comments: substantive(5) });
    const quality = new Map<string, { category: unknown; qualityScore: unknown }>([
      ['c1', { category: 'logic', qualityScore: 9 }],
      ['c2', { category: 'logic', qualityScore: 7 }],
      ['c3', { category: 'structural', qualityScore: 8 }],
      ['c4', { category: 'cosmetic', qualityScore: 10 }],
      ['c5', { category: 'question', qualityScore: 7 }],
    ]);
    expect(scoreSession(s, quality)).toBe(58);
  });

  it('pays the flat rate for uncategorized comments in the same session', () => {
    const s = session({ comments: substantive(2) });
    const quality = new Map([['c1', { category: 'nit', qualityScore: 2 }]]);
    expect(scoreBreakdown(s, quality).comments).toBe(2 + 5);
  });

  it('falls back to the flat rate for malformed entries', () => {
    const s = session({ comments: substantive(3) });
    const quality = new Map<string, { category: unknown; qualityScore: unknown }>([
      ['c1', { category: 'security', qualityScore: 9 }],
      ['c2', { category: 'logic', qualityScore: 11 }],
      ['c3', { category: 'logic', qualityScore: '8' }],
    ]);
    expect(scoreSession(s, quality)).toBe(10 + 15);
  });

  it('maps score tiers to 2, 5 and 8', () => {
    expect(qualityXp({ category: 'nit', qualityScore: 3 })).toBe(2);
    expect(qualityXp({ category: 'nit', qualityScore: 4 })).toBe(5);
    expect(qualityXp({ category: 'nit', qualityScore: 6 })).toBe(5);
    expect(qualityXp({ category: 'logic', qualityScore: 7 })).toBe(11);
  });
});

describe('scoreSessions', () => {
  it('keeps session fields and attaches XP with its breakdown', () => {
    const [scored] = scoreSessions([session({ comments: substantive(1), stateChange: 'approved' })]);
    expect(scored.reviewer).toBe('bob');
    expect(scored.stateChange).toBe('approved');
    expect(scored.xpEarned).toBe(15);
    expect(scored.breakdown.comments).toBe(5);
  });
});
