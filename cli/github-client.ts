/**
 * GitHub access for pull-request reviews: fetch the diff, post the report.
 */

import { Octokit } from 'octokit';
import { createAgentLogger } from '@routegraph/agent-core';
import { UsageError } from './task-input';

const log = createAgentLogger('GitHub');

export interface PullRequestRef {
  owner: string;
  repo: string;
  pullNumber: number;
}

/**
 * The two GitHub calls the CLI makes
 */
export interface PullRequestTransport {
  fetchDiff(ref: PullRequestRef): Promise<unknown>;
  createComment(ref: PullRequestRef, body: string): Promise<void>;
}

/**
 * Parse and validate a pull request URL
 * (https://github.com/<owner>/<repo>/pull/<number>)
 */
export function parsePullRequestUrl(prUrl: string): PullRequestRef {
  let url: URL;
  try {
    url = new URL(prUrl);
  } catch {
    throw new UsageError(`Invalid pull request URL: ${prUrl}`);
  }

  if (url.protocol !== 'https:') {
    throw new UsageError(`Pull request URL must use https: ${prUrl}`);
  }
  if (url.hostname !== 'github.com') {
    throw new UsageError(`Pull request URL must point to github.com: ${prUrl}`);
  }

  const match = url.pathname.match(/^\/([\w.-]+)\/([\w.-]+)\/pull\/(\d+)\/?$/);
  if (!match) {
    throw new UsageError(`Expected https://github.com/<owner>/<repo>/pull/<number>, got ${prUrl}`);
  }

  return { owner: match[1], repo: match[2], pullNumber: parseInt(match[3], 10) };
}

export class GitHubClient {
  constructor(private transport: PullRequestTransport) {}

  /**
   * Client backed by the GitHub REST API
   */
  static fromToken(token: string | undefined): GitHubClient {
    if (!token) {
      throw new UsageError('GITHUB_TOKEN environment variable is required for --pr');
    }
    const octokit = new Octokit({ auth: token });

    return new GitHubClient({
      async fetchDiff({ owner, repo, pullNumber }) {
        const response = await octokit.rest.pulls.get({
          owner,
          repo,
          pull_number: pullNumber,
          mediaType: { format: 'diff' },
        });
        return response.data;
      },
      async createComment({ owner, repo, pullNumber }, body) {
        await octokit.rest.issues.createComment({
          owner,
          repo,
          issue_number: pullNumber,
          body,
        });
      },
    });
  }

  async getPullRequestDiff(ref: PullRequestRef): Promise<string> {
    const data = await this.transport.fetchDiff(ref);
    // The diff media type returns the raw diff text instead of the PR object
    if (typeof data !== 'string') {
      throw new Error(`GitHub returned no diff for ${ref.owner}/${ref.repo}#${ref.pullNumber}`);
    }

    log.info('Fetched pull request diff', {
      pr: `${ref.owner}/${ref.repo}#${ref.pullNumber}`,
      length: data.length,
    });
    return data;
  }

  async postComment(ref: PullRequestRef, body: string): Promise<void> {
    await this.transport.createComment(ref, body);
    log.info('Posted review comment', { pr: `${ref.owner}/${ref.repo}#${ref.pullNumber}` });
  }
}
