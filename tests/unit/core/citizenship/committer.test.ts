/**
 * Tests for the GitHub contents API membership committer.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { GitHubMembershipCommitter, decodeMembersFile } from '../../../../src/core/citizenship/committer.js';
import type { GitHubSettings } from '../../../../src/core/config/schema.js';
import type { Member } from '../../../../src/core/registry/types.js';
import { CitizenshipError, ErrorCodes } from '../../../../src/utils/errors.js';
import { stalledBody, failingBody } from '../../../helpers/streams.js';

vi.mock('../../../../src/utils/logger.js', () => {
  const log = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
  return { logger: { ...log, child: () => log } };
});

const SETTINGS: GitHubSettings = {
  repo: 'example-org/community',
  branch: 'main',
  api_url: 'https://api.github.test',
  token: 'test-token',
  timeout_ms: 5000,
};

const EXISTING: Member = { npub: 'npub1alice', role: 'operator', status: 'active', services: [] };

const NEW_MEMBER: Member = {
  npub: 'npub1bob',
  role: 'citizen',
  status: 'active',
  display_name: 'Bob',
  services: [],
  upstream_authority_npub: null,
};

function encode(data: unknown): string {
  return Buffer.from(JSON.stringify(data), 'utf-8').toString('base64');
}

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status });
}

describe('GitHubMembershipCommitter', () => {
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should report availability from the token', () => {
    expect(new GitHubMembershipCommitter(SETTINGS).isAvailable()).toBe(true);
    expect(new GitHubMembershipCommitter({ ...SETTINGS, token: undefined }).isAvailable()).toBe(false);
  });

  it('should refuse to commit without a token', async () => {
    const committer = new GitHubMembershipCommitter({ ...SETTINGS, token: undefined });

    const error = await committer.addMember(NEW_MEMBER, 'msg').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CitizenshipError);
    expect(error).toMatchObject({
      code: ErrorCodes.GITHUB_TOKEN_MISSING,
      message: 'GitHub token not configured. Set GITHUB_TOKEN to enable automated membership commits.',
    });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should append the member and commit on the configured branch', async () => {
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ sha: 'sha-1', content: encode({ members: [EXISTING] }) }))
      .mockResolvedValueOnce(jsonResponse({ content: { html_url: 'https://github.test/blob/main/members.json' } }));
    const committer = new GitHubMembershipCommitter(SETTINGS);

    const url = await committer.addMember(NEW_MEMBER, '[Citizenship] Add Bob');

    expect(url).toBe('https://github.test/blob/main/members.json');
    expect(fetchSpy).toHaveBeenCalledTimes(2);

    const [getUrl, getInit] = fetchSpy.mock.calls[0];
    expect(getUrl).toBe('https://api.github.test/repos/example-org/community/contents/members.json?ref=main');
    expect(getInit).toMatchObject({
      method: 'GET',
      headers: { Authorization: 'Bearer test-token' },
    });

    const [putUrl, putInit] = fetchSpy.mock.calls[1];
    expect(putUrl).toBe('https://api.github.test/repos/example-org/community/contents/members.json');
    expect(putInit).toMatchObject({ method: 'PUT' });

    const body = JSON.parse(String(putInit?.body));
    expect(body.message).toBe('[Citizenship] Add Bob');
    expect(body.sha).toBe('sha-1');
    expect(body.branch).toBe('main');
    expect(decodeMembersFile(body.content).members).toEqual([EXISTING, NEW_MEMBER]);
  });

  it('should write the file with two-space indentation and a trailing newline', async () => {
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ sha: 'sha-1', content: encode({ members: [] }) }))
      .mockResolvedValueOnce(jsonResponse({ content: { html_url: 'https://github.test/x' } }));

    await new GitHubMembershipCommitter(SETTINGS).addMember(EXISTING, 'msg');

    const body = JSON.parse(String(fetchSpy.mock.calls[1][1]?.body));
    const text = Buffer.from(body.content, 'base64').toString('utf-8');
    expect(text).toBe(JSON.stringify({ members: [EXISTING] }, null, 2) + '\n');
  });

  it('should raise on a GitHub API error', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('Bad credentials', { status: 401 }));

    await expect(new GitHubMembershipCommitter(SETTINGS).addMember(NEW_MEMBER, 'msg'))
      .rejects.toThrow('GitHub API error: 401 - Bad credentials');
  });

  it('should raise when the write is rejected', async () => {
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ sha: 'sha-1', content: encode({ members: [] }) }))
      .mockResolvedValueOnce(new Response('sha mismatch', { status: 409 }));

    await expect(new GitHubMembershipCommitter(SETTINGS).addMember(NEW_MEMBER, 'msg'))
      .rejects.toThrow('GitHub API error: 409 - sha mismatch');
  });

  it('should time out when the GitHub body stalls after the headers', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(stalledBody()));
    const committer = new GitHubMembershipCommitter({ ...SETTINGS, timeout_ms: 20 });

    const error = await committer.addMember(NEW_MEMBER, 'msg').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CitizenshipError);
    expect(error).toMatchObject({
      code: ErrorCodes.COMMIT_FAILED,
      message: 'GitHub API request failed: request timed out after 20ms',
    });
  });

  it('should raise CitizenshipError when the body fails mid-stream', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(failingBody('terminated')));

    await expect(new GitHubMembershipCommitter(SETTINGS).addMember(NEW_MEMBER, 'msg'))
      .rejects.toThrow('GitHub API request failed: terminated');
  });

  it('should raise on a response that is not JSON', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

    await expect(new GitHubMembershipCommitter(SETTINGS).addMember(NEW_MEMBER, 'msg'))
      .rejects.toThrow(/^Unexpected GitHub API response: /);
  });

  it('should raise on an unexpected response shape', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ message: 'hello' }));

    await expect(new GitHubMembershipCommitter(SETTINGS).addMember(NEW_MEMBER, 'msg'))
      .rejects.toThrow(/^Unexpected GitHub API response: /);
  });
});

describe('decodeMembersFile', () => {
  it('should decode base64 JSON', () => {
    expect(decodeMembersFile(encode({ members: [EXISTING] }))).toEqual({ members: [EXISTING] });
  });

  it('should reject content that is not JSON', () => {
    const encoded = Buffer.from('nope', 'utf-8').toString('base64');

    expect(() => decodeMembersFile(encoded)).toThrow(/^members\.json on GitHub is not valid JSON: /);
  });

  it('should reject a file without members', () => {
    expect(() => decodeMembersFile(encode({ people: [] }))).toThrow(/^members\.json on GitHub is malformed: /);
  });
});
