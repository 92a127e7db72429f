/**
 * CLI Configuration
 *
 * Resolves the files a run reads from command-line flags and the environment.
 *
 * @module config/cli-config
 */

import { z } from 'zod';

/** Environment variable naming the global INI file */
export const CONF_ENV_VAR = 'HIPCHAT_JOB_XML_CONF';

/** Environment variable naming the plugins info YAML file */
export const PLUGINS_INFO_ENV_VAR = 'HIPCHAT_JOB_XML_PLUGINS_INFO';

export const CliOptionsSchema = z.object({
  conf: z.string().min(1).optional(),
  pluginsInfo: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface ResolvedCliConfig {
  /** Global INI file; built-in defaults only when absent */
  confPath?: string;
  /** Plugins info file; every plugin unknown when absent */
  pluginsInfoPath?: string;
  /** Output file; stdout when absent */
  outputPath?: string;
}

/**
 * Merge flags over environment variables
 */
export function resolveCliConfig(
  options: unknown,
  env: NodeJS.ProcessEnv = process.env
): ResolvedCliConfig {
  const parsed = CliOptionsSchema.parse(options);

  return {
    confPath: parsed.conf ?? (env[CONF_ENV_VAR] || undefined),
    pluginsInfoPath: parsed.pluginsInfo ?? (env[PLUGINS_INFO_ENV_VAR] || undefined),
    outputPath: parsed.output,
  };
}
