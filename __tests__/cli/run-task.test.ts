/**
 * Run Command Tests
 *
 * Inference and GitHub are replaced with in-process fakes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CLEAN_REVIEW_REPORT } from '@routegraph/agent-core';
import { GitHubClient } from '../../cli/github-client';
import { createProgram } from '../../cli/program';
import { runTask, type RunDependencies } from '../../cli/run-task';
import { ScriptedInferenceAdapter } from '../../packages/agent-core/__tests__/mocks/scripted-inference';

const FORMATTED_REPLY = JSON.stringify({ formatted: 'const x = 1;', language: 'typescript', notes: [] });

function createDeps(inference: ScriptedInferenceAdapter) {
  const output: string[] = [];
  const errors: string[] = [];
  const transport = {
    fetchDiff: vi.fn(async () => 'diff --git a/a.ts b/a.ts\n+export const a = 1;'),
    createComment: vi.fn(async () => undefined),
  };
  const createGitHub = vi.fn(() => new GitHubClient(transport));

  const deps: RunDependencies = {
    createInference: () => inference,
    createGitHub,
    write: (text) => output.push(text),
    writeError: (text) => errors.push(text),
    env: { GITHUB_TOKEN: 'test-token' },
  };

  return { deps, output, errors, transport, createGitHub };
}

describe('runTask', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'routegraph-cli-'));
    for (const name of ['ENGINE_MAX_STEPS', 'ENGINE_MAX_ATTEMPTS', 'WORKER_TIMEOUT_MS', 'PR_MAX_CHARS']) {
      vi.stubEnv(name, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('prints the final state and exits 0 on Terminated', async () => {
    const { deps, output, errors } = createDeps(
      new ScriptedInferenceAdapter().queue('fast', FORMATTED_REPLY)
    );

    const code = await runTask(['format this code snippet\n```ts\nconst x=1\n```'], {}, deps);

    expect(code).toBe(0);
    expect(errors).toEqual([]);
    expect(output).toHaveLength(1);
    const printed = JSON.parse(output[0]);
    expect(printed.phase).toBe('terminated');
    expect(printed.result).toBe('const x = 1;');
  });

  it('prints a failure report and exits 1 on Failed', async () => {
    const { deps, output } = createDeps(new ScriptedInferenceAdapter());

    const code = await runTask(['sing', 'a', 'song'], {}, deps);

    expect(code).toBe(1);
    const printed = JSON.parse(output[0]);
    expect(printed.status).toBe('failed');
    expect(printed.errorKind).toBe('RoutingError');
    expect(printed.message).toBe('No worker can handle task "sing a song"');
    expect(printed.state.phase).toBe('failed');
  });

  it('reads the task from a file', async () => {
    const file = path.join(testDir, 'task.md');
    fs.writeFileSync(file, 'format this\n```\nconst x=1\n```\n');
    const inference = new ScriptedInferenceAdapter().queue('fast', FORMATTED_REPLY);
    const { deps } = createDeps(inference);

    const code = await runTask([], { file }, deps);

    expect(code).toBe(0);
    expect(inference.requests[0].prompt).toBe('## Task\nformat this\n\n## Code\nconst x=1');
  });

  it('applies --max-steps', async () => {
    const { deps, output } = createDeps(
      new ScriptedInferenceAdapter().queue('fast', '{"language":"ts","notes":[]}')
    );

    const code = await runTask(['format\n```\nx\n```'], { maxSteps: '1' }, deps);

    expect(code).toBe(1);
    expect(JSON.parse(output[0]).message).toBe('Step limit of 1 reached');
  });

  it.each([
    [[], {}, 'routegraph: A task description is required (argument or --file)'],
    [['format'], { post: true }, 'routegraph: --post requires --pr'],
    [['format'], { maxSteps: 'abc' }, 'routegraph: --max-steps must be a positive integer, got "abc"'],
    [['format'], { logLevel: 'loud' }, 'routegraph: Unknown log level "loud" (debug, info, warn, error)'],
    [['format'], { file: '/nonexistent/task.md' }, 'routegraph: Pass the task either as an argument or with --file, not both'],
  ])('exits 2 for usage errors (%j %j)', async (words, options, message) => {
    const { deps, output, errors } = createDeps(new ScriptedInferenceAdapter());

    const code = await runTask(words, options, deps);

    expect(code).toBe(2);
    expect(output).toEqual([]);
    expect(errors).toEqual([message]);
  });

  it('exits 2 for an invalid pull request URL', async () => {
    const { deps, errors, createGitHub } = createDeps(new ScriptedInferenceAdapter());

    const code = await runTask([], { pr: 'https://example.com/pull/1' }, deps);

    expect(code).toBe(2);
    expect(errors[0]).toBe('routegraph: Pull request URL must point to github.com: https://example.com/pull/1');
    expect(createGitHub).not.toHaveBeenCalled();
  });

  it('reviews a pull request and posts the report', async () => {
    const inference = new ScriptedInferenceAdapter()
      .queue('heavy', '{"findings":[]}', 'no diagram here', 'no diagram here')
      .queue('fast', '{"findings":[]}');
    const { deps, output, transport, createGitHub } = createDeps(inference);
    const prUrl = 'https://github.com/acme/widgets/pull/42';

    const code = await runTask([], { pr: prUrl, post: true }, deps);

    expect(code).toBe(0);
    expect(createGitHub).toHaveBeenCalledWith('test-token');
    const printed = JSON.parse(output[0]);
    expect(printed.task).toBe('Review this pull request');
    expect(printed.prUrl).toBe(prUrl);
    expect(printed.subject).toBe('diff --git a/a.ts b/a.ts\n+export const a = 1;');
    expect(transport.createComment).toHaveBeenCalledWith(
      { owner: 'acme', repo: 'widgets', pullNumber: 42 },
      CLEAN_REVIEW_REPORT
    );
  });

  it('exits 1 after printing the result when posting the comment fails', async () => {
    const inference = new ScriptedInferenceAdapter()
      .queue('heavy', '{"findings":[]}')
      .queue('fast', '{"findings":[]}');
    const { deps, output, errors, transport } = createDeps(inference);
    transport.createComment.mockRejectedValueOnce(new Error('Resource not accessible by integration'));

    const code = await runTask([], { pr: 'https://github.com/acme/widgets/pull/42', post: true }, deps);

    expect(code).toBe(1);
    expect(JSON.parse(output[0]).phase).toBe('terminated');
    expect(errors).toEqual([
      'routegraph: Could not post the review comment: Resource not accessible by integration',
    ]);
  });

  it('does not post when the review fails', async () => {
    const inference = new ScriptedInferenceAdapter().queue('heavy', 'garbage', 'garbage');
    const { deps, transport } = createDeps(inference);

    const code = await runTask([], { pr: 'https://github.com/acme/widgets/pull/42', post: true }, deps);

    expect(code).toBe(1);
    expect(transport.createComment).not.toHaveBeenCalled();
  });
});

describe('createProgram', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it('passes positional words and options to the run command', async () => {
    const inference = new ScriptedInferenceAdapter().queue('fast', FORMATTED_REPLY);
    const { deps, output } = createDeps(inference);

    await createProgram(deps).parseAsync(['node', 'routegraph', 'run', 'format', 'it', '--max-steps', '3']);

    expect(process.exitCode).toBe(0);
    expect(JSON.parse(output[0]).task).toBe('format it');
  });
});
