export type RawEventType = 'commit_pushed' | 'comment_posted' | 'review_state_changed';

export type ReviewState = 'approved' | 'changes_requested' | 'commented' | 'dismissed';

interface RawEventBase {
  /** Stable id from the event source; the idempotency key. */
  key: string;
  repositoryId: number;
  pullRequest: number;
  pullRequestAuthor: string;
  /** `null` when the source could not link the activity to an account. */
  actor: string | null;
  timestamp: Date;
  /** Source-provided id used to order events sharing a timestamp. */
  sequence: number;
}

export interface CommitPushed extends RawEventBase {
  type: 'commit_pushed';
  sha: string;
}

export interface CommentPosted extends RawEventBase {
  type: 'comment_posted';
  commentId: string;
  body: string;
  path: string | null;
  line: number | null;
  inReplyTo: string | null;
}

export interface ReviewStateChanged extends RawEventBase {
  type: 'review_state_changed';
  reviewId: string;
  state: ReviewState;
  body: string;
}

export type RawEvent = CommitPushed | CommentPosted | ReviewStateChanged;

export const REVIEW_STATES: readonly ReviewState[] = [
  'approved',
  'changes_requested',
  'commented',
  'dismissed',
];

export function isReviewState(value: unknown): value is ReviewState {
  return typeof value === 'string' && REVIEW_STATES.some((state) => state === value);
}
