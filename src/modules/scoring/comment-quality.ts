export const COMMENT_CATEGORIES = ['cosmetic', 'logic', 'structural', 'nit', 'question'] as const;

export type CommentCategory = (typeof COMMENT_CATEGORIES)[number];

export interface CommentQuality {
  category: CommentCategory;
  /** Integer in 1..10. */
  qualityScore: number;
}

export function isCommentCategory(value: unknown): value is CommentCategory {
  return typeof value === 'string' && COMMENT_CATEGORIES.some((category) => category === value);
}

/**
 * Accepts classifier output or a stored row and returns it only when both
 * fields are usable.
 */
export function parseCommentQuality(category: unknown, qualityScore: unknown): CommentQuality | null {
  if (!isCommentCategory(category)) return null;
  if (typeof qualityScore !== 'number' || !Number.isInteger(qualityScore)) return null;
  if (qualityScore < 1 || qualityScore > 10) return null;
  return { category, qualityScore };
}
