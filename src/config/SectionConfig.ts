import * as fs from 'fs/promises';
import { constants } from 'fs';
import { ConfigError } from '../common/Errors';
import { resolveConfig } from '../common/Config';
import type { ReconcileConfig } from '../common/Config';

export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | ConfigValue[]
  | { [key: string]: ConfigValue };

type ConfigSection = { [key: string]: ConfigValue };

function isSection(value: unknown): value is ConfigSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Flat key/value lookup assembled from named sections of a JSON file:
 *
 *   {
 *     "defaults":  { "report_max_lines": 500 },
 *     "inventory": { "unique_inputs": true, "http_port": 8080 }
 *   }
 *
 * Sections are applied in the order requested, so a key present in several
 * of them takes the value from the last one.
 */
export class SectionConfig {
  private readonly settings: Map<string, ConfigValue>;
  private readonly filePath: string;

  private constructor(filePath: string, values: Map<string, ConfigValue>) {
    this.filePath = filePath;
    this.settings = values;
  }

  public static async load(filePath: unknown, sections: readonly string[]): Promise<SectionConfig> {
    if (typeof filePath !== 'string') {
      throw new ConfigError(
        `Configuration setup wasn't supplied a valid file path - instead it got ${describeType(filePath)}`
      );
    }

    try {
      await fs.access(filePath, constants.F_OK);
    } catch {
      throw new ConfigError(`Configuration setup can't find the specified file ${filePath}`);
    }

    try {
      await fs.access(filePath, constants.R_OK);
    } catch {
      throw new ConfigError(`Configuration setup can't read the specified file ${filePath}`);
    }

    const content = await fs.readFile(filePath, 'utf8');
    return SectionConfig.parse(content, sections, filePath);
  }

  public static parse(content: string, sections: readonly string[], filePath: string = '<inline>'): SectionConfig {
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Configuration setup did not correctly parse the specified file ${filePath}: ${reason}`);
    }

    if (!isSection(document)) {
      throw new ConfigError(
        `Configuration setup parsed the specified file ${filePath}, but it's not a simple object (it's ${describeType(document)})`
      );
    }

    if (sections.length === 0) {
      throw new ConfigError(`Configuration setup was not given any section names to read from ${filePath}`);
    }

    const values = new Map<string, ConfigValue>();

    for (const name of sections) {
      if (typeof name !== 'string') {
        throw new ConfigError(`Configuration setup found a section name of type ${describeType(name)}`);
      }

      const section = document[name];
      if (section === undefined) {
        throw new ConfigError(`Configuration setup could not find a section named ${name} in the specified file ${filePath}`);
      }
      if (!isSection(section)) {
        throw new ConfigError(
          `Configuration setup expected that the section named ${name} from the specified file ${filePath} ` +
          `would be an object, but instead it's ${describeType(section)}`
        );
      }

      for (const [key, value] of Object.entries(section)) {
        values.set(key, value);
      }
    }

    return new SectionConfig(filePath, values);
  }

  public get source(): string {
    return this.filePath;
  }

  public get(key: string): ConfigValue | undefined {
    return this.settings.get(key);
  }

  public set(key: string, value: ConfigValue): void {
    this.settings.set(key, value);
  }

  public has(key: string): boolean {
    return this.settings.has(key);
  }

  public keys(): string[] {
    return [...this.settings.keys()];
  }

  public entries(): Array<[string, ConfigValue]> {
    return [...this.settings.entries()];
  }

  public values(): ConfigValue[] {
    return [...this.settings.values()];
  }

  public getNumber(key: string): number | undefined {
    const value = this.settings.get(key);
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'number') {
      throw new ConfigError(`Configuration key ${key} in ${this.filePath} must be a number, got ${describeType(value)}`);
    }
    return value;
  }

  public getBoolean(key: string): boolean | undefined {
    const value = this.settings.get(key);
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw new ConfigError(`Configuration key ${key} in ${this.filePath} must be a boolean, got ${describeType(value)}`);
    }
    return value;
  }

  public toReconcileConfig(): ReconcileConfig {
    const httpPort = this.getNumber('http_port');
    const reportMaxLines = this.getNumber('report_max_lines');
    const uniqueInputs = this.getBoolean('unique_inputs');

    return resolveConfig({
      ...(httpPort !== undefined && { httpPort }),
      ...(reportMaxLines !== undefined && { reportMaxLines }),
      ...(uniqueInputs !== undefined && { uniqueInputs }),
    });
  }
}
