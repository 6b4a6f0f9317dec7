/**
 * OracleContext wired to in-memory collaborators.
 */
import { getDefaultConfig } from '../../src/core/config/index.js';
import type { Config } from '../../src/core/config/index.js';
import { CitizenshipService, type MembershipCommitter } from '../../src/core/citizenship/index.js';
import type { OracleContext } from '../../src/core/oracle.js';
import type { Member } from '../../src/core/registry/types.js';
import { FakeRegistry } from './fake-registry.js';

export class RecordingCommitter implements MembershipCommitter {
  added: Member[] = [];

  async addMember(member: Member): Promise<string> {
    this.added.push(member);
    return 'https://github.test/commit/1';
  }
}

export interface TestContext extends OracleContext {
  registry: FakeRegistry;
  committer: RecordingCommitter;
}

export function createTestContext(overrides: Partial<Config> = {}): TestContext {
  const defaults = getDefaultConfig();
  const config: Config = {
    ...defaults,
    github: { ...defaults.github, repo: 'example-org/community' },
    ...overrides,
  };
  const registry = new FakeRegistry();
  const committer = new RecordingCommitter();
  const citizenship = new CitizenshipService({ registry, committer });
  return { config, registry, committer, citizenship };
}
