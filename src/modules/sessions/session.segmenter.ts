import { RawEvent } from '../events/raw-event.types';
import {
  DroppedEvent,
  ReviewSession,
  SegmentationResult,
  SessionComment,
  SessionStateChange,
} from './session.types';

export const IDLE_GAP_MS = 24 * 60 * 60 * 1000;
export const RUBBER_STAMP_WINDOW_MS = 60 * 1000;
export const SUBSTANTIVE_MIN_LENGTH = 21;

export function isSubstantive(body: string): boolean {
  return body.trim().length >= SUBSTANTIVE_MIN_LENGTH;
}

export function isBot(login: string): boolean {
  return login.endsWith('[bot]');
}

/**
 * Total order over one pull request's events: timestamp, then commits before
 * reviewer activity, then source sequence, then event key.
 */
export function compareEvents(a: RawEvent, b: RawEvent): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  if (byTime !== 0) return byTime;
  const byKind = kindRank(a) - kindRank(b);
  if (byKind !== 0) return byKind;
  if (a.sequence !== b.sequence) return a.sequence - b.sequence;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

function kindRank(event: RawEvent): number {
  return event.type === 'commit_pushed' ? 0 : 1;
}

interface OpenSession {
  session: ReviewSession;
  lastActivity: number;
}

/**
 * Splits every pull request's event stream into review sessions. Events are
 * grouped by `(repositoryId, pullRequest)`; within a pull request one ordered
 * pass keeps an arena of open sessions keyed by reviewer.
 */
export function segmentEvents(events: readonly RawEvent[]): SegmentationResult {
  const byPullRequest = new Map<string, RawEvent[]>();
  for (const event of events) {
    const key = `${event.repositoryId}#${event.pullRequest}`;
    const bucket = byPullRequest.get(key);
    if (bucket) bucket.push(event);
    else byPullRequest.set(key, [event]);
  }

  const sessions: ReviewSession[] = [];
  const dropped: DroppedEvent[] = [];
  for (const bucket of byPullRequest.values()) {
    const result = segmentPullRequest(bucket);
    sessions.push(...result.sessions);
    dropped.push(...result.dropped);
  }
  sessions.sort(compareSessions);
  return { sessions, dropped };
}

export function segmentPullRequest(events: readonly RawEvent[]): SegmentationResult {
  const dropped: DroppedEvent[] = [];
  if (events.length === 0) return { sessions: [], dropped };

  const { repositoryId, pullRequest, pullRequestAuthor } = events[0];
  const placeable: RawEvent[] = [];
  for (const event of events) {
    const reason = unplaceableReason(event, repositoryId, pullRequest);
    if (reason) dropped.push({ key: event.key, reason });
    else placeable.push(event);
  }
  placeable.sort(compareEvents);

  const open = new Map<string, OpenSession>();
  const finalized: ReviewSession[] = [];
  let lastCommitAt: number | null = null;

  const close = (reviewer: string) => {
    const current = open.get(reviewer);
    if (!current) return;
    open.delete(reviewer);
    if (isEligible(current.session)) finalized.push(current.session);
  };

  for (const event of placeable) {
    const at = event.timestamp.getTime();

    if (event.type === 'commit_pushed') {
      // Any commit moves the fast-review baseline; only the author's pushes close sessions.
      // Unlinked commits on a pull request branch are treated as the author's pushes.
      lastCommitAt = at;
      if (event.actor === null || event.actor === pullRequestAuthor) {
        for (const reviewer of [...open.keys()]) close(reviewer);
      }
      continue;
    }

    const reviewer = event.actor;
    if (reviewer === null || reviewer === pullRequestAuthor || isBot(reviewer)) continue;

    let current = open.get(reviewer);
    if (current && at - current.lastActivity > IDLE_GAP_MS) {
      close(reviewer);
      current = undefined;
    }
    if (!current) {
      current = {
        session: {
          repositoryId,
          pullRequest,
          reviewer,
          windowStart: event.timestamp,
          windowEnd: event.timestamp,
          commentCount: 0,
          substantiveCommentCount: 0,
          stateChange: null,
          elapsedSinceLastCommitMs: lastCommitAt === null ? null : at - lastCommitAt,
          comments: [],
        },
        lastActivity: at,
      };
      open.set(reviewer, current);
    }
    fold(current, event);
  }
  for (const reviewer of [...open.keys()]) close(reviewer);

  finalized.sort(compareSessions);
  return { sessions: finalized, dropped };
}

function unplaceableReason(
  event: RawEvent,
  repositoryId: number,
  pullRequest: number,
): string | null {
  if (Number.isNaN(event.timestamp.getTime())) return 'invalid timestamp';
  if (event.repositoryId !== repositoryId || event.pullRequest !== pullRequest) {
    return 'event belongs to another pull request';
  }
  if (event.type !== 'commit_pushed' && (event.actor === null || event.actor.trim() === '')) {
    return 'reviewer activity without an actor';
  }
  return null;
}

function fold(current: OpenSession, event: RawEvent): void {
  const { session } = current;
  if (event.type === 'comment_posted') {
    addComment(session, { id: event.commentId, substantive: isSubstantive(event.body) });
  } else if (event.type === 'review_state_changed') {
    // Review bodies only count when they say something; "LGTM" stays a bare approval.
    if (isSubstantive(event.body)) {
      addComment(session, { id: `review:${event.reviewId}`, substantive: true });
    }
    const change = toStateChange(event.state);
    if (change) session.stateChange = change;
  }
  session.windowEnd = event.timestamp;
  current.lastActivity = event.timestamp.getTime();
}

function addComment(session: ReviewSession, comment: SessionComment): void {
  session.comments.push(comment);
  session.commentCount += 1;
  if (comment.substantive) session.substantiveCommentCount += 1;
}

function toStateChange(state: string): SessionStateChange | null {
  return state === 'approved' || state === 'changes_requested' ? state : null;
}

export function isEligible(session: ReviewSession): boolean {
  if (session.substantiveCommentCount === 0 && session.stateChange === null) return false;
  const duration = session.windowEnd.getTime() - session.windowStart.getTime();
  const rubberStamp =
    session.stateChange === 'approved' &&
    session.commentCount === 0 &&
    duration < RUBBER_STAMP_WINDOW_MS;
  return !rubberStamp;
}

export function compareSessions(a: ReviewSession, b: ReviewSession): number {
  return (
    a.repositoryId - b.repositoryId ||
    a.pullRequest - b.pullRequest ||
    (a.reviewer < b.reviewer ? -1 : a.reviewer > b.reviewer ? 1 : 0) ||
    a.windowStart.getTime() - b.windowStart.getTime()
  );
}
