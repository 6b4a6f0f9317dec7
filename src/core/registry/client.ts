/**
 * CommunityRegistry - cached reads of the community registry over HTTP.
 *
 * Files are addressed by path relative to a raw-content base URL, e.g.
 * `<base>/members.json`. JSON and text bodies are cached separately.
 */
import type { z } from 'zod';
import { TtlCache } from '../cache/index.js';
import { RegistryError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { fetchText, truncateBody, type TextResponse } from '../../utils/http.js';
import { formatZodError } from '../../utils/schema.js';
import { logger } from '../../utils/logger.js';
import { MembersFileSchema, NetworkStatusSchema } from './schema.js';
import { RegistryFiles } from './types.js';
import type { Member, NetworkStatus, RegistryReader } from './types.js';

const log = logger.child('registry');

export interface CommunityRegistryOptions {
  baseUrl: string;
  cacheTtlSeconds?: number;
  timeoutMs?: number;
  /** Clock used for cache ages (default: Date.now) */
  now?: () => number;
}

export class CommunityRegistry implements RegistryReader {
  private readonly base: string;
  private readonly timeoutMs: number;
  private readonly jsonCache: TtlCache<unknown>;
  private readonly textCache: TtlCache<string>;

  constructor(options: CommunityRegistryOptions) {
    this.base = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    const ttlMs = (options.cacheTtlSeconds ?? 300) * 1000;
    this.jsonCache = new TtlCache<unknown>(ttlMs, options.now);
    this.textCache = new TtlCache<string>(ttlMs, options.now);
  }

  get baseUrl(): string {
    return this.base;
  }

  urlFor(path: string): string {
    return `${this.base}/${path.replace(/^\/+/, '')}`;
  }

  async getText(path: string): Promise<string> {
    return this.textCache.getOrLoad(path, () => this.request(path));
  }

  async getMembers(): Promise<Member[]> {
    const data = await this.fetchJson(RegistryFiles.MEMBERS);
    if (typeof data !== 'object' || data === null || !('members' in data)) {
      throw new RegistryError(
        ErrorCodes.REGISTRY_INVALID,
        `${RegistryFiles.MEMBERS} missing 'members' key`,
        { path: RegistryFiles.MEMBERS }
      );
    }
    return this.validate(RegistryFiles.MEMBERS, data, MembersFileSchema).members;
  }

  async lookupMember(npub: string): Promise<Member | null> {
    const members = await this.getMembers();
    return members.find((member) => member.npub === npub) ?? null;
  }

  async getFirstCurator(): Promise<Member | null> {
    const members = await this.getMembers();
    return members.find((member) => member.role === 'prime_authority') ?? null;
  }

  async getNetworkStatus(): Promise<NetworkStatus> {
    const data = await this.fetchJson(RegistryFiles.NETWORK_STATUS);
    return this.validate(RegistryFiles.NETWORK_STATUS, data, NetworkStatusSchema);
  }

  invalidateCache(): void {
    this.jsonCache.clear();
    this.textCache.clear();
    log.debug('Registry cache invalidated');
  }

  private async fetchJson(path: string): Promise<unknown> {
    return this.jsonCache.getOrLoad(path, async () => {
      const body = await this.request(path);
      try {
        const data: unknown = JSON.parse(body);
        return data;
      } catch (error) {
        throw this.fetchError(path, errorMessage(error));
      }
    });
  }

  /**
   * GET a registry file and return its body. Transport failures, timeouts
   * (body read included) and non-2xx statuses all become RegistryError.
   */
  private async request(path: string): Promise<string> {
    const url = this.urlFor(path);
    log.debug(`GET ${url}`);

    let response: TextResponse;
    try {
      response = await fetchText(url, { timeoutMs: this.timeoutMs });
    } catch (error) {
      throw this.fetchError(path, errorMessage(error));
    }

    if (!response.ok) {
      throw this.fetchError(
        path,
        `HTTP ${response.status}${response.body ? ` - ${truncateBody(response.body)}` : ''}`,
        response.status
      );
    }
    return response.body;
  }

  private fetchError(path: string, reason: string, status?: number): RegistryError {
    const url = this.urlFor(path);
    log.warn(`Failed to fetch ${url}`, { reason });
    return new RegistryError(
      ErrorCodes.REGISTRY_FETCH_FAILED,
      `Failed to fetch ${url}: ${reason}`,
      { url, status }
    );
  }

  private validate<S extends z.ZodTypeAny>(path: string, data: unknown, schema: S): z.infer<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new RegistryError(
        ErrorCodes.REGISTRY_INVALID,
        `${path} is malformed: ${formatZodError(result.error)}`,
        { path }
      );
    }
    return result.data;
  }
}
