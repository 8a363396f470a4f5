import * as fs from 'fs/promises';
import * as yaml from 'js-yaml';
import { ConfigurationError, DocumentNotFoundError } from './errors.js';

/**
 * Read and parse a YAML file. A missing file and a YAML syntax error are
 * both configuration errors.
 *
 * Documents holding identifiers pass `yaml.FAILSAFE_SCHEMA` so that every
 * scalar stays the text it was written as (`000683123456`, `1.10`).
 */
export async function readYamlDocument(
  filePath: string,
  kind: string,
  schema: yaml.Schema = yaml.DEFAULT_SCHEMA
): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new DocumentNotFoundError(kind, filePath, { operation: 'readYamlDocument' });
    }
    throw new ConfigurationError(
      `Unable to open ${kind.toLowerCase()} file "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
      { operation: 'readYamlDocument', path: filePath }
    );
  }

  try {
    return yaml.load(content, { filename: filePath, schema });
  } catch (error) {
    throw new ConfigurationError(
      `Unable to parse ${kind.toLowerCase()} file "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
      { operation: 'readYamlDocument', path: filePath }
    );
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
