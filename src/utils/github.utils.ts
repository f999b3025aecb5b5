import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { RawEvent, ReviewState, isReviewState } from '../modules/events/raw-event.types';
import {
  EventSourceAdapter,
  PullRequestPage,
  PullRequestRef,
  RemoteRepository,
  RepositoryRef,
} from '../modules/sync/event-source.adapter';
import { RateLimitedError, SourceRequestError, SourceUnavailableError } from './github.errors';

const PER_PAGE = 100;
const DEFAULT_RETRY_AFTER_SECONDS = 60;

export interface GitHubOptions {
  token: string;
  apiUrl: string;
  pageLimit: number;
}

interface GitHubUser {
  login: string;
}

interface GitHubPull {
  number: number;
  user: GitHubUser | null;
  updated_at: string;
}

interface GitHubCommit {
  sha: string;
  author: GitHubUser | null;
  commit: {
    author: { date: string } | null;
    committer: { date: string } | null;
  };
}

interface GitHubReview {
  id: number;
  user: GitHubUser | null;
  state: string;
  body: string | null;
  submitted_at?: string | null;
}

interface GitHubReviewComment {
  id: number;
  user: GitHubUser | null;
  body: string;
  created_at: string;
  path: string | null;
  line: number | null;
  in_reply_to_id?: number;
}

interface GitHubRepo {
  id: number;
  full_name: string;
}

/** GitHub REST v3 as an event source. */
export class GitHubUtils implements EventSourceAdapter {
  private readonly client: AxiosInstance;

  constructor(private readonly options: GitHubOptions, client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        baseURL: options.apiUrl,
        timeout: 30_000,
        headers: {
          ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
          Accept: 'application/vnd.github.v3+json',
        },
      });
  }

  /* ========== pagination ========== */

  private async get<T>(url: string, params: Record<string, string | number> = {}): Promise<AxiosResponse<T>> {
    try {
      return await this.client.get<T>(url, { params });
    } catch (err) {
      throw toSourceError(err);
    }
  }

  private async fetchAll<T>(url: string, params: Record<string, string | number> = {}): Promise<T[]> {
    let results: T[] = [];
    for (let page = 1; page <= this.options.pageLimit; page++) {
      const res = await this.get<T[]>(url, { ...params, per_page: PER_PAGE, page });
      results = results.concat(res.data);
      if (res.data.length < PER_PAGE) break;
    }
    return results;
  }

  /* ================= REPOSITORY ================= */

  async getRepository(owner: string, name: string): Promise<RemoteRepository> {
    const res = await this.get<GitHubRepo>(`/repos/${owner}/${name}`);
    return { githubId: res.data.id, fullName: res.data.full_name };
  }

  /* ================= PULL REQUEST ================= */

  /**
   * Pull requests updated at or after `since`, newest first. Paging stops at
   * the first pull request older than the window or at the configured limit.
   */
  async listPullRequests(
    repo: RepositoryRef,
    since: Date,
    pageToken: string | null,
  ): Promise<PullRequestPage> {
    const page = pageToken ? parseInt(pageToken, 10) : 1;
    const res = await this.get<GitHubPull[]>(`/repos/${repo.owner}/${repo.name}/pulls`, {
      state: 'all',
      sort: 'updated',
      direction: 'desc',
      per_page: PER_PAGE,
      page,
    });

    const inWindow = res.data.filter((pr) => Date.parse(pr.updated_at) >= since.getTime());
    const exhausted =
      res.data.length < PER_PAGE ||
      inWindow.length < res.data.length ||
      page >= this.options.pageLimit;

    return {
      pullRequests: inWindow.map((pr) => ({
        number: pr.number,
        author: pr.user?.login ?? 'ghost',
        updatedAt: new Date(pr.updated_at),
      })),
      nextPageToken: exhausted ? null : String(page + 1),
      resumeToken: inWindow.length > 0 ? inWindow[0].updated_at : null,
    };
  }

  /* ================= COMMITS ================= */

  async listCommits(repo: RepositoryRef, pr: PullRequestRef, since: Date): Promise<RawEvent[]> {
    const commits = await this.fetchAll<GitHubCommit>(
      `/repos/${repo.owner}/${repo.name}/pulls/${pr.number}/commits`,
    );
    const events: RawEvent[] = [];
    for (const c of commits) {
      const date = c.commit.committer?.date ?? c.commit.author?.date;
      if (!date || Date.parse(date) < since.getTime()) continue;
      events.push({
        type: 'commit_pushed',
        key: `commit:${repo.id}:${pr.number}:${c.sha}`,
        repositoryId: repo.id,
        pullRequest: pr.number,
        pullRequestAuthor: pr.author,
        actor: c.author?.login ?? null,
        timestamp: new Date(date),
        sequence: 0,
        sha: c.sha,
      });
    }
    return events;
  }

  /* ================= REVIEWS & COMMENTS ================= */

  async listReviews(repo: RepositoryRef, pr: PullRequestRef): Promise<RawEvent[]> {
    const reviews = await this.fetchAll<GitHubReview>(
      `/repos/${repo.owner}/${repo.name}/pulls/${pr.number}/reviews`,
    );
    const events: RawEvent[] = [];
    for (const r of reviews) {
      const state = toReviewState(r.state);
      if (!state || !r.user || !r.submitted_at) continue;
      events.push({
        type: 'review_state_changed',
        key: `review:${r.id}`,
        repositoryId: repo.id,
        pullRequest: pr.number,
        pullRequestAuthor: pr.author,
        actor: r.user.login,
        timestamp: new Date(r.submitted_at),
        sequence: r.id,
        reviewId: String(r.id),
        state,
        body: r.body ?? '',
      });
    }
    return events;
  }

  async listReviewComments(repo: RepositoryRef, pr: PullRequestRef): Promise<RawEvent[]> {
    const comments = await this.fetchAll<GitHubReviewComment>(
      `/repos/${repo.owner}/${repo.name}/pulls/${pr.number}/comments`,
    );
    const events: RawEvent[] = [];
    for (const c of comments) {
      if (!c.user) continue;
      events.push({
        type: 'comment_posted',
        key: `comment:${c.id}`,
        repositoryId: repo.id,
        pullRequest: pr.number,
        pullRequestAuthor: pr.author,
        actor: c.user.login,
        timestamp: new Date(c.created_at),
        sequence: c.id,
        commentId: String(c.id),
        body: c.body,
        path: c.path,
        line: c.line,
        inReplyTo: c.in_reply_to_id === undefined ? null : String(c.in_reply_to_id),
      });
    }
    return events;
  }
}

function toReviewState(state: string): ReviewState | null {
  const normalized = state.toLowerCase();
  return isReviewState(normalized) ? normalized : null;
}

/** Maps an axios failure onto the source error taxonomy. */
export function toSourceError(err: unknown): Error {
  if (!axios.isAxiosError(err)) return err instanceof Error ? err : new Error(String(err));

  const response = err.response;
  if (!response) {
    return new SourceUnavailableError(`GitHub unreachable: ${err.message}`);
  }

  const status = response.status;
  const remaining = headerValue(response.headers, 'x-ratelimit-remaining');
  if (status === 429 || (status === 403 && remaining === '0')) {
    return new RateLimitedError(retryAfterSeconds(response.headers));
  }
  if (status >= 500) {
    return new SourceUnavailableError(`GitHub responded ${status}`, status);
  }
  return new SourceRequestError(`GitHub responded ${status} for ${err.config?.url ?? 'request'}`, status);
}

function headerValue(headers: AxiosResponse['headers'], name: string): string | undefined {
  const value: unknown = headers[name];
  return value === undefined || value === null ? undefined : String(value);
}

function retryAfterSeconds(headers: AxiosResponse['headers']): number {
  const retryAfter = parseInt(headerValue(headers, 'retry-after') ?? '', 10);
  if (Number.isFinite(retryAfter) && retryAfter >= 0) return retryAfter;

  const reset = parseInt(headerValue(headers, 'x-ratelimit-reset') ?? '', 10);
  if (Number.isFinite(reset)) {
    return Math.max(1, Math.ceil(reset - Date.now() / 1000));
  }
  return DEFAULT_RETRY_AFTER_SECONDS;
}
