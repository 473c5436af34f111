import {
  identityKey,
  isPullRequestRecord,
  issueCodec,
  issueCreationPayload,
  pullRequestCodec,
} from '../../src/lib/entities';
import { InvalidRecordError } from '../../src/lib/errors';

describe('issueCodec', () => {
  it('should normalize a REST API issue record', () => {
    const issue = issueCodec.parse({
      id: 42,
      number: 7,
      title: '  Broken build ',
      body: 'Fails on main',
      state: 'closed',
      labels: [{ name: 'type:bug', color: 'd93f0b' }, { name: 'ci' }, 'ci'],
      assignees: [{ login: 'octo-dev' }],
      milestone: { title: 'v1.0', number: 3 },
      html_url: 'https://github.com/acme/widgets/issues/7',
      created_at: '2025-01-10T00:00:00Z',
      updated_at: '2025-01-11T00:00:00Z',
      closed_at: '2025-01-12T00:00:00Z',
      user: { login: 'reporter' },
    });

    expect(issue).toEqual({
      number: 7,
      title: 'Broken build',
      body: 'Fails on main',
      labels: ['ci', 'type:bug'],
      state: 'closed',
      assignees: ['octo-dev'],
      milestone: 'v1.0',
      url: 'https://github.com/acme/widgets/issues/7',
      createdAt: '2025-01-10T00:00:00Z',
      updatedAt: '2025-01-11T00:00:00Z',
      closedAt: '2025-01-12T00:00:00Z',
    });
  });

  it('should fill defaults for a minimal hand-written record', () => {
    const issue = issueCodec.parse({ title: 'Only a title' });

    expect(issue.number).toBeNull();
    expect(issue.body).toBeNull();
    expect(issue.state).toBe('open');
    expect(issue.labels).toEqual([]);
    expect(issue.assignees).toEqual([]);
    expect(issue.milestone).toBeNull();
  });

  it('should produce frozen entities', () => {
    const issue = issueCodec.parse({ title: 'Frozen', labels: ['a'] });

    expect(Object.isFrozen(issue)).toBe(true);
    expect(Object.isFrozen(issue.labels)).toBe(true);
  });

  it('should reject records without a title', () => {
    expect(() => issueCodec.parse({ body: 'no title' })).toThrow(InvalidRecordError);
    expect(() => issueCodec.parse({ title: '   ' })).toThrow('title: title must not be empty');
  });

  it('should reject an unknown state', () => {
    expect(() => issueCodec.parse({ title: 'T', state: 'merged' })).toThrow(InvalidRecordError);
  });

  it('should reject non-object records', () => {
    expect(() => issueCodec.parse('just a string')).toThrow(/^Invalid issue record: /);
    expect(() => issueCodec.parse(null)).toThrow(InvalidRecordError);
  });

  it('should convert to a flattened file record', () => {
    const issue = issueCodec.parse({
      number: 3,
      title: 'Docs',
      body: null,
      labels: [{ name: 'docs' }],
      assignees: [{ login: 'writer' }],
      milestone: { title: 'v2' },
    });

    expect(issueCodec.toRecord(issue)).toEqual({
      number: 3,
      title: 'Docs',
      body: null,
      state: 'open',
      labels: ['docs'],
      assignees: ['writer'],
      milestone: 'v2',
      html_url: null,
      created_at: null,
      updated_at: null,
      closed_at: null,
    });
  });

  it('should parse its own file record back to an equal entity', () => {
    const issue = issueCodec.parse({ number: 9, title: 'Round', body: 'trip', labels: ['x', 'y'], state: 'closed' });

    expect(issueCodec.parse(issueCodec.toRecord(issue))).toEqual(issue);
  });
});

describe('pullRequestCodec', () => {
  it('should normalize a REST API pull request record', () => {
    const pr = pullRequestCodec.parse({
      number: 12,
      title: 'Add widgets',
      body: 'Closes #7',
      state: 'closed',
      labels: [],
      head: { ref: 'feature/widgets', sha: 'abc123' },
      base: { ref: 'main', sha: 'def456' },
      draft: false,
      merged_at: '2025-02-01T00:00:00Z',
      html_url: 'https://github.com/acme/widgets/pull/12',
    });

    expect(pr.head).toBe('feature/widgets');
    expect(pr.base).toBe('main');
    expect(pr.mergedAt).toBe('2025-02-01T00:00:00Z');
    expect(pr.url).toBe('https://github.com/acme/widgets/pull/12');
    expect(pullRequestCodec.toRecord(pr)).toMatchObject({
      head: 'feature/widgets',
      base: 'main',
      draft: false,
      merged_at: '2025-02-01T00:00:00Z',
    });
  });

  it('should accept branch refs as plain strings', () => {
    const pr = pullRequestCodec.parse({ title: 'Local PR', head: 'dev', base: 'main' });

    expect(pr.head).toBe('dev');
    expect(pr.base).toBe('main');
    expect(pr.draft).toBe(false);
  });

  it('should name the pull request kind in record errors', () => {
    expect(() => pullRequestCodec.parse({ body: 'no title' })).toThrow(/^Invalid pull request record: title/);
  });
});

describe('isPullRequestRecord', () => {
  it('should detect pull requests listed by the issues endpoint', () => {
    expect(isPullRequestRecord({ title: 'PR', pull_request: { url: 'https://api.github.com/x' } })).toBe(true);
    expect(isPullRequestRecord({ title: 'Issue' })).toBe(false);
    expect(isPullRequestRecord(null)).toBe(false);
  });
});

describe('identityKey', () => {
  it('should ignore the remote number', () => {
    const local = issueCodec.parse({ title: 'A', body: 'x' });
    const remote = issueCodec.parse({ number: 1, title: 'A', body: 'x' });

    expect(identityKey(local)).toBe(identityKey(remote));
  });

  it('should treat a missing body like an empty one', () => {
    expect(identityKey({ title: 'A', body: null })).toBe(identityKey({ title: 'A', body: '' }));
  });

  it('should normalize line endings and surrounding whitespace', () => {
    expect(identityKey({ title: ' A ', body: 'line 1\r\nline 2\n' })).toBe(
      identityKey({ title: 'A', body: 'line 1\nline 2' })
    );
  });

  it('should distinguish different bodies', () => {
    expect(identityKey({ title: 'A', body: 'x' })).not.toBe(identityKey({ title: 'A', body: 'y' }));
  });

  it('should not collide when text moves between title and body', () => {
    expect(identityKey({ title: 'a","b', body: 'c' })).not.toBe(identityKey({ title: 'a', body: 'b","c' }));
  });
});

describe('issueCreationPayload', () => {
  it('should carry title, body and labels but never the number', () => {
    const issue = issueCodec.parse({ number: 5, title: 'T', body: 'B', labels: ['bug'], state: 'closed' });

    expect(issueCreationPayload(issue)).toEqual({ title: 'T', body: 'B', labels: ['bug'] });
  });

  it('should omit an absent body and empty labels', () => {
    const issue = issueCodec.parse({ title: 'T' });

    expect(issueCreationPayload(issue)).toEqual({ title: 'T' });
  });
});
