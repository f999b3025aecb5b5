import { ReviewSession } from '../sessions/session.types';
import { CommentQuality, parseCommentQuality } from './comment-quality';

export const BASE_XP = 10;
export const FLAT_COMMENT_XP = 5;
export const FAST_REVIEW_XP = 10;
export const FAST_REVIEW_WINDOW_MS = 60 * 60 * 1000;
export const THOROUGH_XP = 5;
export const THOROUGH_MIN_COMMENTS = 6;
export const DEEP_XP = 10;
export const DEEP_MIN_COMMENTS = 11;

const CATEGORY_BONUS: Record<CommentQuality['category'], number> = {
  logic: 3,
  structural: 2,
  cosmetic: 0,
  nit: 0,
  question: 0,
};

export interface XpBreakdown {
  base: number;
  comments: number;
  fast: number;
  thorough: number;
  deep: number;
}

/** Quality data keyed by session comment id; values are checked before use. */
export type QualityLookup = ReadonlyMap<string, { category: unknown; qualityScore: unknown }>;

export function isFastReview(session: Pick<ReviewSession, 'elapsedSinceLastCommitMs'>): boolean {
  const elapsed = session.elapsedSinceLastCommitMs;
  return elapsed !== null && elapsed > 0 && elapsed < FAST_REVIEW_WINDOW_MS;
}

export function isThorough(session: Pick<ReviewSession, 'commentCount'>): boolean {
  return session.commentCount >= THOROUGH_MIN_COMMENTS;
}

export function isDeep(session: Pick<ReviewSession, 'commentCount'>): boolean {
  return session.commentCount >= DEEP_MIN_COMMENTS;
}

export function qualityXp(quality: CommentQuality): number {
  const tier = quality.qualityScore <= 3 ? 2 : quality.qualityScore <= 6 ? 5 : 8;
  return tier + CATEGORY_BONUS[quality.category];
}

/**
 * Per-comment term: classified comments earn quality XP, the rest earn the
 * flat rate when substantive. Malformed quality entries fall back to flat.
 */
export function commentXp(session: ReviewSession, quality?: QualityLookup): number {
  let total = 0;
  for (const comment of session.comments) {
    const entry = quality?.get(comment.id);
    const parsed = entry ? parseCommentQuality(entry.category, entry.qualityScore) : null;
    if (parsed) total += qualityXp(parsed);
    else if (comment.substantive) total += FLAT_COMMENT_XP;
  }
  return total;
}

export function scoreBreakdown(session: ReviewSession, quality?: QualityLookup): XpBreakdown {
  return {
    base: BASE_XP,
    comments: commentXp(session, quality),
    fast: isFastReview(session) ? FAST_REVIEW_XP : 0,
    thorough: isThorough(session) ? THOROUGH_XP : 0,
    deep: isDeep(session) ? DEEP_XP : 0,
  };
}

export function scoreSession(session: ReviewSession, quality?: QualityLookup): number {
  const b = scoreBreakdown(session, quality);
  return Math.max(0, b.base + b.comments + b.fast + b.thorough + b.deep);
}

export interface ScoredSession extends ReviewSession {
  xpEarned: number;
  breakdown: XpBreakdown;
}

export function scoreSessions(
  sessions: readonly ReviewSession[],
  quality?: QualityLookup,
): ScoredSession[] {
  return sessions.map((session) => {
    const breakdown = scoreBreakdown(session, quality);
    return { ...session, breakdown, xpEarned: scoreSession(session, quality) };
  });
}
