import test from 'ava';

import { githubGetIssue, githubListIssues } from '../tools/github/issues.js';
import { createFetchStub, createTestContext, repoUrl } from './helpers/github-stub.js';

const rawIssue = (number: number, extra: Readonly<Record<string, unknown>> = {}) => ({
  number,
  title: `Issue ${number}`,
  body: `Body of ${number}`,
  state: 'open',
  user: { login: 'reporter' },
  labels: [{ name: 'bug' }, { name: 'ui' }],
  assignees: [{ login: 'fixer' }],
  comments: 1,
  created_at: '2024-04-01T00:00:00Z',
  updated_at: '2024-04-03T00:00:00Z',
  closed_at: null,
  html_url: `https://github.com/acme/widgets/issues/${number}`,
  ...extra,
});

test('github_list_issues drops pull requests by default', async (t) => {
  const stub = createFetchStub({
    [repoUrl('/issues?state=open&per_page=20&sort=updated&direction=desc')]: {
      body: [rawIssue(1), rawIssue(2, { pull_request: { url: 'https://api.github.test/pr/2' } })],
    },
  });
  const tool = githubListIssues(createTestContext(stub.fetch));

  const result = await tool.invoke({ repo: 'acme/widgets' });

  t.deepEqual(result, {
    repo: 'acme/widgets',
    count: 1,
    items: [
      {
        number: 1,
        title: 'Issue 1',
        body: 'Body of 1',
        state: 'open',
        is_pr: false,
        user: 'reporter',
        labels: ['bug', 'ui'],
        comments: 1,
        created_at: '2024-04-01T00:00:00Z',
        updated_at: '2024-04-03T00:00:00Z',
        html_url: 'https://github.com/acme/widgets/issues/1',
      },
    ],
  });
});

test('github_list_issues keeps pull requests and forwards filters on request', async (t) => {
  const url = repoUrl('/issues?state=closed&per_page=1&sort=updated&direction=desc&labels=bug%2Cui');
  const stub = createFetchStub({
    [url]: { body: [rawIssue(2, { state: 'closed', pull_request: {} })] },
  });
  const tool = githubListIssues(createTestContext(stub.fetch));

  const result = await tool.invoke({
    repo: 'acme/widgets',
    state: 'closed',
    labels: 'bug,ui',
    limit: 0,
    include_prs: true,
  });

  t.is(stub.requests[0]?.url, url);
  t.deepEqual(result, {
    repo: 'acme/widgets',
    count: 1,
    items: [
      {
        number: 2,
        title: 'Issue 2',
        body: 'Body of 2',
        state: 'closed',
        is_pr: true,
        user: 'reporter',
        labels: ['bug', 'ui'],
        comments: 1,
        created_at: '2024-04-01T00:00:00Z',
        updated_at: '2024-04-03T00:00:00Z',
        html_url: 'https://github.com/acme/widgets/issues/2',
      },
    ],
  });
});

test('github_get_issue returns the issue with its comments', async (t) => {
  const stub = createFetchStub({
    [repoUrl('/issues/5')]: { body: rawIssue(5) },
    [repoUrl('/issues/5/comments?per_page=100')]: {
      body: [
        {
          id: 501,
          user: { login: 'helper' },
          body: 'Seeing this too.',
          created_at: '2024-04-02T00:00:00Z',
          updated_at: '2024-04-02T00:00:00Z',
          html_url: 'https://github.com/acme/widgets/issues/5#issuecomment-501',
        },
      ],
    },
  });
  const tool = githubGetIssue(createTestContext(stub.fetch));

  const result = await tool.invoke({ repo: 'acme/widgets', issue_number: 5 });

  t.deepEqual(result, {
    repo: 'acme/widgets',
    issue: {
      number: 5,
      title: 'Issue 5',
      state: 'open',
      is_pr: false,
      user: 'reporter',
      labels: ['bug', 'ui'],
      assignees: ['fixer'],
      comments_count: 1,
      comments: [
        {
          id: 501,
          user: 'helper',
          body: 'Seeing this too.',
          created_at: '2024-04-02T00:00:00Z',
          updated_at: '2024-04-02T00:00:00Z',
          html_url: 'https://github.com/acme/widgets/issues/5#issuecomment-501',
        },
      ],
      created_at: '2024-04-01T00:00:00Z',
      updated_at: '2024-04-03T00:00:00Z',
      closed_at: null,
      html_url: 'https://github.com/acme/widgets/issues/5',
      body: 'Body of 5',
    },
  });
});

test('github_get_issue reports an unexpected payload shape', async (t) => {
  const stub = createFetchStub({ [repoUrl('/issues/5')]: { body: { title: 'no number' } } });
  const tool = githubGetIssue(createTestContext(stub.fetch));

  await t.throwsAsync(() => tool.invoke({ repo: 'acme/widgets', issue_number: 5 }), {
    message: 'Unexpected GitHub response for issue #5 at number: Required',
  });
});
