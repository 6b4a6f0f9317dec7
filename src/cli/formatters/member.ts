/**
 * Human-readable rendering of member records and network status.
 */
import chalk from 'chalk';
import type { Member, NetworkStatus } from '../../core/registry/index.js';

const ROLE_LABELS: Record<string, string> = {
  citizen: 'Citizen',
  operator: 'Operator',
  authority: 'Authority',
  prime_authority: 'First Curator (Prime Authority)',
};

export function roleLabel(role: string): string {
  return ROLE_LABELS[role] ?? role;
}

export function formatMember(member: Member): string {
  const lines: string[] = [];
  lines.push(chalk.bold(member.display_name ?? member.npub));
  lines.push(`  ${chalk.dim('npub:')}     ${member.npub}`);
  lines.push(`  ${chalk.dim('role:')}     ${chalk.cyan(roleLabel(member.role))}`);
  if (member.status) {
    const status = member.status === 'active' ? chalk.green(member.status) : chalk.yellow(member.status);
    lines.push(`  ${chalk.dim('status:')}   ${status}`);
  }
  if (member.member_since) {
    lines.push(`  ${chalk.dim('since:')}    ${member.member_since}`);
  }
  if (member.upstream_authority_npub) {
    lines.push(`  ${chalk.dim('upstream:')} ${member.upstream_authority_npub}`);
  }
  if (member.services && member.services.length > 0) {
    lines.push(`  ${chalk.dim('services:')} ${member.services.join(', ')}`);
  }
  if (member.notes) {
    lines.push(`  ${chalk.dim('notes:')}    ${member.notes}`);
  }
  return lines.join('\n');
}

export function formatNetworkStatus(status: NetworkStatus): string {
  const lines: string[] = [chalk.bold('Component versions')];
  for (const [name, version] of Object.entries(status.components)) {
    lines.push(`  ${name.padEnd(24)} current ${chalk.green(version.current)}  minimum ${chalk.yellow(version.minimum)}`);
  }
  if (status.protocols.length > 0) {
    lines.push('', chalk.bold('Protocols'), ...status.protocols.map((p) => `  - ${p}`));
  }
  if (status.last_updated) {
    lines.push('', `${chalk.dim('Last updated:')} ${status.last_updated}`);
  }
  if (status.advisory) {
    lines.push('', status.advisory);
  }
  return lines.join('\n');
}
