/**
 * Writes new member records to members.json through the GitHub contents API.
 */
import { z } from 'zod';
import type { GitHubSettings } from '../config/schema.js';
import { MembersFileSchema } from '../registry/schema.js';
import { RegistryFiles, type Member, type MembersFile } from '../registry/types.js';
import { CitizenshipError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { fetchText, truncateBody, type TextResponse } from '../../utils/http.js';
import { formatZodError } from '../../utils/schema.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('committer');

/**
 * Appends a member to the registry and returns a URL for the change.
 */
export interface MembershipCommitter {
  addMember(member: Member, message: string): Promise<string>;
}

const ContentsResponseSchema = z.object({
  sha: z.string(),
  content: z.string(),
});

const PutResponseSchema = z.object({
  content: z.object({ html_url: z.string() }),
});

export class GitHubMembershipCommitter implements MembershipCommitter {
  constructor(private readonly settings: GitHubSettings) {}

  isAvailable(): boolean {
    return !!this.settings.token;
  }

  async addMember(member: Member, message: string): Promise<string> {
    const token = this.settings.token;
    if (!token) {
      throw new CitizenshipError(
        ErrorCodes.GITHUB_TOKEN_MISSING,
        'GitHub token not configured. Set GITHUB_TOKEN to enable automated membership commits.'
      );
    }

    const { repo, branch } = this.settings;
    const contentsUrl = `${this.settings.api_url.replace(/\/+$/, '')}/repos/${repo}/contents/${RegistryFiles.MEMBERS}`;
    const headers = {
      'Authorization': `Bearer ${token}`,
      'Accept': 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'community-oracle',
    };

    const current = await this.call(
      `${contentsUrl}?ref=${encodeURIComponent(branch)}`,
      { method: 'GET', headers },
      ContentsResponseSchema
    );
    const membersFile = decodeMembersFile(current.content);
    membersFile.members.push(member);

    const updated = JSON.stringify(membersFile, null, 2) + '\n';
    const written = await this.call(
      contentsUrl,
      {
        method: 'PUT',
        headers: { ...headers, 'Content-Type': 'application/json' },
        body: JSON.stringify({
          message,
          content: Buffer.from(updated, 'utf-8').toString('base64'),
          sha: current.sha,
          branch,
        }),
      },
      PutResponseSchema
    );

    log.info(`Committed ${RegistryFiles.MEMBERS} to ${repo}@${branch}`, { npub: member.npub });
    return written.content.html_url;
  }

  private async call<S extends z.ZodTypeAny>(url: string, init: RequestInit, schema: S): Promise<z.infer<S>> {
    let response: TextResponse;
    try {
      response = await fetchText(url, { ...init, timeoutMs: this.settings.timeout_ms });
    } catch (error) {
      throw new CitizenshipError(
        ErrorCodes.COMMIT_FAILED,
        `GitHub API request failed: ${errorMessage(error)}`,
        { url }
      );
    }

    if (!response.ok) {
      throw new CitizenshipError(
        ErrorCodes.COMMIT_FAILED,
        `GitHub API error: ${response.status}${response.body ? ` - ${truncateBody(response.body)}` : ''}`,
        { url, status: response.status }
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(response.body);
    } catch (error) {
      throw new CitizenshipError(
        ErrorCodes.COMMIT_FAILED,
        `Unexpected GitHub API response: ${errorMessage(error)}`,
        { url }
      );
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      throw new CitizenshipError(
        ErrorCodes.COMMIT_FAILED,
        `Unexpected GitHub API response: ${formatZodError(result.error)}`,
        { url }
      );
    }
    return result.data;
  }
}

/**
 * Decode the base64 body of members.json as returned by the contents API.
 */
export function decodeMembersFile(base64: string): MembersFile {
  const text = Buffer.from(base64, 'base64').toString('utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CitizenshipError(
      ErrorCodes.COMMIT_FAILED,
      `${RegistryFiles.MEMBERS} on GitHub is not valid JSON: ${errorMessage(error)}`
    );
  }
  const result = MembersFileSchema.safeParse(raw);
  if (!result.success) {
    throw new CitizenshipError(
      ErrorCodes.COMMIT_FAILED,
      `${RegistryFiles.MEMBERS} on GitHub is malformed: ${formatZodError(result.error)}`
    );
  }
  return result.data;
}
