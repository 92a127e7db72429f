/**
 * Global Configuration Adapter
 *
 * Shared INI configuration consulted by job modules for settings that do not
 * belong in individual job definitions: chat credentials, the build server's
 * base URL, the sender's display name.
 *
 * @module adapters/global-config-adapter
 */

import { readFileSync } from 'fs';
import ini from 'ini';
import { z } from 'zod';
import { HipChatFailureMode } from '../contracts/hipchat.contract.js';
import { ConfigurationError } from '../errors.js';

/**
 * Section name to key/value pairs
 */
export type ConfigSections = Record<string, Record<string, string>>;

/**
 * Values used when the configuration file leaves them out
 */
export const DEFAULT_CONFIG: ConfigSections = {
  jenkins: {
    url: 'http://localhost:8080/',
  },
  hipchat: {
    'send-as': 'Jenkins',
  },
};

const IniValueSchema = z.union([z.string(), z.boolean(), z.number()]);

/**
 * GlobalConfig exposes key lookups under named sections.
 *
 * @example
 * ```typescript
 * const config = GlobalConfig.fromIni('[hipchat]\nauthtoken=test-token\n');
 *
 * config.get('hipchat', 'authtoken'); // 'test-token'
 * config.get('jenkins', 'url');       // 'http://localhost:8080/'
 * ```
 */
export class GlobalConfig {
  private readonly sections: ConfigSections;

  constructor(sections: ConfigSections = {}, defaults: ConfigSections = DEFAULT_CONFIG) {
    this.sections = GlobalConfig.merge(defaults, sections);
  }

  /**
   * Parse INI text. Top-level keys outside any section are ignored.
   */
  static fromIni(text: string, defaults: ConfigSections = DEFAULT_CONFIG): GlobalConfig {
    const parsed: Record<string, unknown> = ini.parse(text);
    const sections: ConfigSections = {};

    for (const [name, body] of Object.entries(parsed)) {
      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        continue;
      }

      const entries: Record<string, string> = {};
      for (const [key, value] of Object.entries(body)) {
        const result = IniValueSchema.safeParse(value);
        if (result.success) {
          entries[key] = String(result.data);
        }
      }
      sections[name] = entries;
    }

    return new GlobalConfig(sections, defaults);
  }

  /**
   * Read and parse an INI file
   */
  static fromFile(path: string, defaults: ConfigSections = DEFAULT_CONFIG): GlobalConfig {
    return GlobalConfig.fromIni(readFileSync(path, 'utf-8'), defaults);
  }

  /**
   * Whether a section is present
   */
  has(section: string): boolean {
    return this.section(section) !== undefined;
  }

  /**
   * Whether a key is present in a section
   */
  hasOption(section: string, key: string): boolean {
    return this.option(section, key) !== undefined;
  }

  /**
   * Look up a key.
   *
   * @throws ConfigurationError with code NO_SECTION or NO_OPTION
   */
  get(section: string, key: string): string {
    const body = this.section(section);
    if (!body) {
      throw new ConfigurationError(
        `No section: '${section}'`,
        HipChatFailureMode.NO_SECTION
      );
    }

    const value = this.option(section, key);
    if (value === undefined) {
      throw new ConfigurationError(
        `No option '${key}' in section: '${section}'`,
        HipChatFailureMode.NO_OPTION
      );
    }

    return value;
  }

  /**
   * Look up a key, falling back when the section or key is absent
   */
  getOrDefault(section: string, key: string, fallback: string): string {
    return this.option(section, key) ?? fallback;
  }

  /**
   * Names of all sections, defaults included
   */
  sectionNames(): string[] {
    return Object.keys(this.sections);
  }

  private section(name: string): Record<string, string> | undefined {
    return Object.hasOwn(this.sections, name) ? this.sections[name] : undefined;
  }

  private option(section: string, key: string): string | undefined {
    const body = this.section(section);
    return body && Object.hasOwn(body, key) ? body[key] : undefined;
  }

  private static merge(base: ConfigSections, overrides: ConfigSections): ConfigSections {
    const merged: ConfigSections = {};
    for (const [name, body] of Object.entries(base)) {
      merged[name] = { ...body };
    }
    for (const [name, body] of Object.entries(overrides)) {
      merged[name] = { ...merged[name], ...body };
    }
    return merged;
  }
}
