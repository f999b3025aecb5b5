export type SessionStateChange = 'approved' | 'changes_requested';

export interface SessionComment {
  /** Review-comment id for inline comments, `review:<id>` for review bodies. */
  id: string;
  substantive: boolean;
}

export interface ReviewSession {
  repositoryId: number;
  pullRequest: number;
  reviewer: string;
  windowStart: Date;
  windowEnd: Date;
  commentCount: number;
  substantiveCommentCount: number;
  stateChange: SessionStateChange | null;
  /** `null` when no author commit precedes the session. */
  elapsedSinceLastCommitMs: number | null;
  comments: SessionComment[];
}

export interface DroppedEvent {
  key: string;
  reason: string;
}

export interface SegmentationResult {
  sessions: ReviewSession[];
  dropped: DroppedEvent[];
}
