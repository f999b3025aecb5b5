import { DeepPartial } from 'typeorm';
import { RawEventEntity } from './entities/raw-event.entity';
import { isReviewState, RawEvent } from './raw-event.types';

export function toRawEventRow(event: RawEvent): DeepPartial<RawEventEntity> {
  const base = {
    eventKey: event.key,
    repositoryId: event.repositoryId,
    pullRequest: event.pullRequest,
    pullRequestAuthor: event.pullRequestAuthor,
    type: event.type,
    actor: event.actor,
    occurredAt: event.timestamp,
    sequence: event.sequence,
    sha: null,
    sourceId: null,
    reviewState: null,
    body: null,
    path: null,
    line: null,
    inReplyTo: null,
  };
  switch (event.type) {
    case 'commit_pushed':
      return { ...base, sha: event.sha };
    case 'comment_posted':
      return {
        ...base,
        sourceId: event.commentId,
        body: event.body,
        path: event.path,
        line: event.line,
        inReplyTo: event.inReplyTo,
      };
    case 'review_state_changed':
      return { ...base, sourceId: event.reviewId, reviewState: event.state, body: event.body };
  }
}

/**
 * Rebuilds the domain event from a stored row. Returns `null` for rows whose
 * type-specific columns are missing, so callers can drop them with a warning.
 */
export function fromRawEventRow(row: RawEventEntity): RawEvent | null {
  const base = {
    key: row.eventKey,
    repositoryId: row.repositoryId,
    pullRequest: row.pullRequest,
    pullRequestAuthor: row.pullRequestAuthor,
    actor: row.actor,
    timestamp: new Date(row.occurredAt),
    sequence: row.sequence,
  };
  switch (row.type) {
    case 'commit_pushed':
      return row.sha ? { ...base, type: 'commit_pushed', sha: row.sha } : null;
    case 'comment_posted':
      if (!row.sourceId) return null;
      return {
        ...base,
        type: 'comment_posted',
        commentId: row.sourceId,
        body: row.body ?? '',
        path: row.path,
        line: row.line,
        inReplyTo: row.inReplyTo,
      };
    case 'review_state_changed':
      if (!row.sourceId || !isReviewState(row.reviewState)) return null;
      return {
        ...base,
        type: 'review_state_changed',
        reviewId: row.sourceId,
        state: row.reviewState,
        body: row.body ?? '',
      };
    default:
      return null;
  }
}
