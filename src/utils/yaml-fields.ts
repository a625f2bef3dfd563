import * as yaml from 'js-yaml';
import { InvalidModuleFileError } from './errors.js';

export type YamlRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a YAML document whose top level must be a mapping.
 * An empty document reads as an empty mapping.
 */
export function loadYamlRecord(content: string, file: string): YamlRecord {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: file });
  } catch (error) {
    throw new InvalidModuleFileError(`${file}: ${error instanceof Error ? error.message : String(error)}`, { file });
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new InvalidModuleFileError(`${file}: top level must be a mapping`, { file });
  }
  return parsed;
}

/**
 * Typed access to the fields of one YAML mapping. Every accessor throws
 * InvalidModuleFileError naming the offending field.
 */
export class FieldReader {
  constructor(
    private readonly record: YamlRecord,
    private readonly where: string
  ) {}

  private fail(key: string, expected: string): never {
    throw new InvalidModuleFileError(`${this.where}: '${key}' must be ${expected}`, { where: this.where, key });
  }

  has(key: string): boolean {
    return this.record[key] !== undefined && this.record[key] !== null;
  }

  string(key: string): string {
    const value = this.optionalString(key);
    if (value === undefined) {
      throw new InvalidModuleFileError(`${this.where}: missing required field '${key}'`, { where: this.where, key });
    }
    return value;
  }

  /** Numbers are accepted and stringified, so `version: 2` reads as "2" */
  optionalString(key: string): string | undefined {
    const value = this.record[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return this.fail(key, 'a string');
  }

  optionalBoolean(key: string): boolean | undefined {
    const value = this.record[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') return this.fail(key, 'a boolean');
    return value;
  }

  stringArray(key: string): string[] {
    const value = this.record[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
      return this.fail(key, 'a list of strings');
    }
    return value.map(item => String(item));
  }

  /** A mapping of string values, e.g. extra attributes */
  stringRecord(key: string): Record<string, string> {
    const value = this.record[key];
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) return this.fail(key, 'a mapping');
    const result: Record<string, string> = {};
    for (const [name, entry] of Object.entries(value)) {
      if (typeof entry !== 'string' && typeof entry !== 'number') {
        return this.fail(`${key}.${name}`, 'a string');
      }
      result[name] = String(entry);
    }
    return result;
  }

  optionalRecord(key: string): FieldReader | undefined {
    const value = this.record[key];
    if (value === undefined || value === null) return undefined;
    if (!isRecord(value)) return this.fail(key, 'a mapping');
    return new FieldReader(value, `${this.where}.${key}`);
  }

  /** A list of mappings */
  records(key: string): FieldReader[] {
    const value = this.record[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) return this.fail(key, 'a list');
    return value.map((item: unknown, index) => {
      if (!isRecord(item)) {
        return this.fail(`${key}[${index}]`, 'a mapping');
      }
      return new FieldReader(item, `${this.where}.${key}[${index}]`);
    });
  }

  /** A mapping of mappings, keyed by name */
  recordEntries(key: string): Array<[string, FieldReader]> {
    const value = this.record[key];
    if (value === undefined || value === null) return [];
    if (!isRecord(value)) return this.fail(key, 'a mapping');
    return Object.entries(value).map(([name, item]) => {
      if (!isRecord(item)) {
        return this.fail(`${key}.${name}`, 'a mapping');
      }
      return [name, new FieldReader(item, `${this.where}.${key}.${name}`)];
    });
  }
}
