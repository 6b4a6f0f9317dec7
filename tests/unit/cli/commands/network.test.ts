/**
 * Tests for the versions and advisory commands.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createVersionsCommand, createAdvisoryCommand } from '../../../../src/cli/commands/network.js';
import { loadContext } from '../../../../src/cli/context.js';
import { SAMPLE_NETWORK_STATUS } from '../../../helpers/fake-registry.js';
import { createTestContext } from '../../../helpers/oracle-context.js';

vi.mock('chalk', async () => (await import('../../../helpers/chalk-mock.js')).plainChalk);

vi.mock('../../../../src/cli/context.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../../src/cli/context.js')>()),
  loadContext: vi.fn(),
}));

describe('network commands', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(loadContext).mockResolvedValue(createTestContext());
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print component versions', async () => {
    await createVersionsCommand().parseAsync([], { from: 'user' });

    const text = String(logSpy.mock.calls[0][0]);
    expect(text.split('\n')[0]).toBe('Component versions');
    expect(text).toContain('current 0.1.11  minimum 0.1.7');
  });

  it('should print network status as JSON', async () => {
    await createVersionsCommand().parseAsync(['--json'], { from: 'user' });

    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(SAMPLE_NETWORK_STATUS, null, 2));
  });

  it('should print the advisory', async () => {
    await createAdvisoryCommand().parseAsync([], { from: 'user' });

    expect(logSpy).toHaveBeenCalledWith('# Network Advisory\n\nRedeploy for npub enforcement.');
  });
});
