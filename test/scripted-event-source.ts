import { RawEvent } from '../src/modules/events/raw-event.types';
import {
  EventSourceAdapter,
  PullRequestPage,
  PullRequestRef,
  RemoteRepository,
  RepositoryRef,
} from '../src/modules/sync/event-source.adapter';

/**
 * Serves a fixed event log. Queued failures are thrown by the next calls, one
 * per call, before the source answers normally again.
 */
export class ScriptedEventSource implements EventSourceAdapter {
  pullRequests: PullRequestRef[] = [];
  events: RawEvent[] = [];
  resumeToken: string | null = '2026-03-05T00:00:00Z';
  readonly failures: Error[] = [];
  readonly windows: Date[] = [];
  readonly pageTokens: (string | null)[] = [];
  /** When set, pull requests are served this many per page. */
  pageSize: number | null = null;
  calls = 0;
  /** When set, `listPullRequests` waits for it before answering. */
  gate: Promise<void> | null = null;
  onListPullRequests: (() => void) | null = null;

  async getRepository(owner: string, name: string): Promise<RemoteRepository> {
    this.step();
    return { githubId: 9001, fullName: `${owner}/${name}` };
  }

  async listPullRequests(_repo: RepositoryRef, since: Date, pageToken: string | null): Promise<PullRequestPage> {
    this.windows.push(since);
    this.pageTokens.push(pageToken);
    this.onListPullRequests?.();
    if (this.gate) await this.gate;
    this.step();
    if (this.pageSize === null) {
      return { pullRequests: this.pullRequests, nextPageToken: null, resumeToken: this.resumeToken };
    }
    const offset = pageToken === null ? 0 : parseInt(pageToken, 10);
    const end = offset + this.pageSize;
    return {
      pullRequests: this.pullRequests.slice(offset, end),
      nextPageToken: end < this.pullRequests.length ? String(end) : null,
      resumeToken: this.resumeToken,
    };
  }

  async listCommits(_repo: RepositoryRef, pr: PullRequestRef): Promise<RawEvent[]> {
    this.step();
    return this.events.filter((e) => e.pullRequest === pr.number && e.type === 'commit_pushed');
  }

  async listReviews(_repo: RepositoryRef, pr: PullRequestRef): Promise<RawEvent[]> {
    this.step();
    return this.events.filter((e) => e.pullRequest === pr.number && e.type === 'review_state_changed');
  }

  async listReviewComments(_repo: RepositoryRef, pr: PullRequestRef): Promise<RawEvent[]> {
    this.step();
    return this.events.filter((e) => e.pullRequest === pr.number && e.type === 'comment_posted');
  }

  private step(): void {
    this.calls += 1;
    const failure = this.failures.shift();
    if (failure) throw failure;
  }
}
