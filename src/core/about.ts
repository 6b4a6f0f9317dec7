import type { RegistryReader } from './registry/types.js';
import { RegistryFiles } from './registry/types.js';

/**
 * Narrative overview: the registry README followed by the governance document.
 */
export async function buildAbout(registry: RegistryReader): Promise<string> {
  const [readme, governance] = await Promise.all([
    registry.getText(RegistryFiles.README),
    registry.getText(RegistryFiles.GOVERNANCE),
  ]);
  return (
    '# About the Honor Chain\n\n' +
    `${readme}\n\n` +
    '---\n\n' +
    '# Governance\n\n' +
    governance
  );
}
