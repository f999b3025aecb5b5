import { RawEvent } from '../events/raw-event.types';

export const EVENT_SOURCE_ADAPTER = Symbol('EVENT_SOURCE_ADAPTER');

export interface RepositoryRef {
  /** Local id of the tracked repository; stamped onto every event. */
  id: number;
  owner: string;
  name: string;
}

export interface PullRequestRef {
  number: number;
  author: string;
  updatedAt: Date;
}

export interface PullRequestPage {
  pullRequests: PullRequestRef[];
  /** `null` when there is nothing left inside the window. */
  nextPageToken: string | null;
  /** Newest activity observed on this page, stored as the sync cursor token. */
  resumeToken: string | null;
}

export interface RemoteRepository {
  githubId: number;
  fullName: string;
}

/**
 * Supplies raw review activity for one repository. Methods reject with the
 * errors from `github.errors` so the coordinator can tell transient failures
 * from permanent ones.
 */
export interface EventSourceAdapter {
  getRepository(owner: string, name: string): Promise<RemoteRepository>;
  listPullRequests(
    repo: RepositoryRef,
    since: Date,
    pageToken: string | null,
  ): Promise<PullRequestPage>;
  listCommits(repo: RepositoryRef, pr: PullRequestRef, since: Date): Promise<RawEvent[]>;
  listReviews(repo: RepositoryRef, pr: PullRequestRef): Promise<RawEvent[]>;
  listReviewComments(repo: RepositoryRef, pr: PullRequestRef): Promise<RawEvent[]>;
}
