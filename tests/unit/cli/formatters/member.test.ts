/**
 * Tests for member and network status formatting.
 */
import { describe, it, expect, vi } from 'vitest';
import { formatMember, formatNetworkStatus, roleLabel } from '../../../../src/cli/formatters/member.js';
import { ALICE, SAMPLE_NETWORK_STATUS } from '../../../helpers/fake-registry.js';

vi.mock('chalk', async () => (await import('../../../helpers/chalk-mock.js')).plainChalk);

describe('roleLabel', () => {
  it('should name known roles', () => {
    expect(roleLabel('prime_authority')).toBe('First Curator (Prime Authority)');
    expect(roleLabel('citizen')).toBe('Citizen');
  });

  it('should pass unknown roles through', () => {
    expect(roleLabel('observer')).toBe('observer');
  });
});

describe('formatMember', () => {
  it('should print the populated fields', () => {
    expect(formatMember(ALICE)).toBe([
      'Alice',
      '  npub:     npub1alice',
      '  role:     Operator',
      '  status:   active',
    ].join('\n'));
  });

  it('should fall back to the npub as a title and show optional fields', () => {
    const text = formatMember({
      npub: 'npub1bob',
      role: 'citizen',
      member_since: '2026-02-21',
      upstream_authority_npub: 'npub1curator',
      services: ['weather-mcp'],
      notes: 'hello',
    });

    expect(text).toBe([
      'npub1bob',
      '  npub:     npub1bob',
      '  role:     Citizen',
      '  since:    2026-02-21',
      '  upstream: npub1curator',
      '  services: weather-mcp',
      '  notes:    hello',
    ].join('\n'));
  });
});

describe('formatMember with null fields', () => {
  it('should skip fields the registry left null', () => {
    const text = formatMember({
      npub: 'npub1bob',
      role: 'citizen',
      status: null,
      display_name: null,
      member_since: null,
      services: null,
      upstream_authority_npub: null,
      notes: null,
    });

    expect(text).toBe('npub1bob\n  npub:     npub1bob\n  role:     Citizen');
  });
});

describe('formatNetworkStatus', () => {
  it('should list components, protocols, date and advisory', () => {
    expect(formatNetworkStatus(SAMPLE_NETWORK_STATUS)).toBe([
      'Component versions',
      `  ${'tollbooth-sdk'.padEnd(24)} current 0.1.11  minimum 0.1.7`,
      `  ${'authority-service'.padEnd(24)} current 0.1.1  minimum 0.1.0`,
      '',
      'Protocols',
      '  - base-certificate-01',
      '',
      'Last updated: 2026-02-21',
      '',
      'Test advisory summary.',
    ].join('\n'));
  });

  it('should omit empty sections', () => {
    expect(formatNetworkStatus({ components: {}, protocols: [] })).toBe('Component versions');
  });
});
