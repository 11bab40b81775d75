/**
 * YAML loader for configuration documents.
 *
 * @example
 * ```typescript
 * import { loadConfigFromFile, HomeAutomation } from 'home-rules';
 *
 * const document = await loadConfigFromFile('./automation.yaml');
 * const automation = await HomeAutomation.start({ hub, document });
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { ConfigValidationError } from '../errors.js';
import { validateDocument } from './schema.js';
import type { AutomationDocument } from './types.js';

/**
 * Parses and validates a YAML configuration document.
 *
 * @throws ConfigValidationError on a YAML syntax error, an empty document
 *         or an invalid structure
 */
export function loadConfigFromYAML(yamlContent: string, source = 'config'): AutomationDocument {
  let parsed: unknown;
  try {
    parsed = parse(yamlContent);
  } catch (err) {
    throw new ConfigValidationError(
      `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`,
      source,
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new ConfigValidationError('YAML content is empty', source);
  }

  return validateDocument(parsed);
}

/**
 * Reads, parses and validates a YAML configuration file.
 *
 * @throws ConfigValidationError when the file cannot be read or is invalid
 */
export async function loadConfigFromFile(filePath: string): Promise<AutomationDocument> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigValidationError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  return loadConfigFromYAML(content, filePath);
}
