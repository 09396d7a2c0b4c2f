import { readFile } from 'fs/promises';
import { parse, TomlError } from 'smol-toml';
import { ConfigurationError, ValidationError } from './errors.js';
import { Zone } from './zone.js';

/**
 * Parses a zones document:
 *
 * ```toml
 * [[zones]]
 * host = 'example.com'
 * type = 'A'
 * answer = '1.2.3.4'
 * ```
 */
export function parseZones(content: string, source: string = 'zones file'): Zone[] {
  let data: Record<string, unknown>;
  try {
    data = parse(content);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new ValidationError(`Invalid TOML in ${source}: ${error.message}`);
    }
    throw error;
  }

  if (!Array.isArray(data.zones)) {
    throw new ValidationError(`${source} must contain a "zones" array of tables`);
  }
  return data.zones.map((entry: unknown, index) => Zone.fromRaw(index, entry));
}

export async function loadZonesFile(path: string): Promise<Zone[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read zones file "${path}": ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseZones(content, path);
}
