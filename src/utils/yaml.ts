/**
 * YAML parsing utilities.
 */
import { parse } from 'yaml';
import { OracleError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content. An empty document yields an empty object.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content) ?? {};
  } catch (error) {
    throw new OracleError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

/**
 * Load and parse a YAML file.
 */
export async function loadYaml(filePath: string): Promise<unknown> {
  const content = await readFile(filePath);
  try {
    return parseYaml(content);
  } catch (error) {
    if (error instanceof OracleError) {
      throw new OracleError(error.code, `${error.message} (file: ${filePath})`, { filePath });
    }
    throw error;
  }
}
