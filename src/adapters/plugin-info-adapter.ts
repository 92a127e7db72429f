/**
 * Plugin Info Adapter
 *
 * Metadata about the plugins installed on the target build server, as
 * reported by the server (or dumped to a YAML file beforehand). Job modules
 * use it to pick between output schemas of different plugin releases.
 *
 * @module adapters/plugin-info-adapter
 */

import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { HipChatFailureMode } from '../contracts/hipchat.contract.js';
import { ConfigurationError } from '../errors.js';

export const PluginInfoSchema = z
  .object({
    longName: z.string().optional(),
    shortName: z.string().optional(),
    version: z.union([z.string(), z.number()]).transform(String).optional(),
  })
  .passthrough();

export type PluginInfo = z.infer<typeof PluginInfoSchema>;

export const PluginInfoListSchema = z.array(PluginInfoSchema);

/**
 * Lookup of installed plugins by long or short name
 */
export class PluginInfoAdapter {
  private readonly plugins: PluginInfo[];

  constructor(plugins: PluginInfo[] = []) {
    this.plugins = [...plugins];
  }

  /**
   * Build an adapter from a parsed plugins info document.
   *
   * @throws ConfigurationError if the document is not a list of plugin entries
   */
  static fromData(data: unknown): PluginInfoAdapter {
    if (data === null || data === undefined) {
      return new PluginInfoAdapter();
    }

    const result = PluginInfoListSchema.safeParse(data);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid plugins info: ${result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')}`,
        HipChatFailureMode.INVALID_PLUGINS_INFO
      );
    }
    return new PluginInfoAdapter(result.data);
  }

  static fromYaml(text: string): PluginInfoAdapter {
    return PluginInfoAdapter.fromData(parseYaml(text));
  }

  static fromFile(path: string): PluginInfoAdapter {
    return PluginInfoAdapter.fromYaml(readFileSync(path, 'utf-8'));
  }

  /**
   * First plugin whose long or short name matches, or an empty record
   */
  getPluginInfo(pluginName: string): PluginInfo {
    return (
      this.plugins.find(
        (p) => p.longName === pluginName || p.shortName === pluginName
      ) ?? {}
    );
  }

  /**
   * Reported version of a plugin, or `fallback` when it is not installed
   */
  getPluginVersion(pluginName: string, fallback: string = '0'): string {
    return this.getPluginInfo(pluginName).version ?? fallback;
  }

  get size(): number {
    return this.plugins.length;
  }
}
