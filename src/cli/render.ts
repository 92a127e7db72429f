/**
 * Job Rendering
 *
 * Loads job definitions from YAML and renders each one to XML through the
 * module registry.
 *
 * @module cli/render
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { GlobalConfig } from '../adapters/global-config-adapter.js';
import type { PluginInfoAdapter } from '../adapters/plugin-info-adapter.js';
import { HipChatFailureMode } from '../contracts/hipchat.contract.js';
import { FormatError } from '../errors.js';
import { MemoryLogger, type Logger } from '../logging/logger.js';
import {
  HipChatTranslator,
  parseHipChatConfig,
  resolveRoomText,
} from '../translators/hipchat-translator.js';
import { ModuleRegistry, type JobDefinition } from '../translators/module-registry.js';

const JobMappingSchema = z.record(z.unknown());

const JobEntrySchema = z.union([
  z.object({ job: JobMappingSchema }),
  JobMappingSchema,
]);

export interface RenderOptions {
  config: GlobalConfig;
  plugins?: PluginInfoAdapter;
  logger?: Logger;
  /** Indentation of the rendered XML */
  indent?: string;
}

export interface RenderedJob {
  name: string;
  xml: string;
}

export interface JobValidationResult {
  name: string;
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Name of a job, or its position when it has none
 */
export function jobName(job: JobDefinition, index: number): string {
  return typeof job.name === 'string' && job.name !== '' ? job.name : `job-${index + 1}`;
}

/**
 * Parse a job file: a single mapping, or a list of mappings or `job:` entries.
 *
 * @throws FormatError if the document has another shape
 */
export function loadJobs(text: string): JobDefinition[] {
  const document: unknown = parseYaml(text);
  const entries: unknown[] = Array.isArray(document) ? document : [document];

  return entries.map((entry, index) => {
    const result = JobEntrySchema.safeParse(entry);
    if (!result.success) {
      throw new FormatError(
        `Entry ${index + 1} of the job file is not a job definition`,
        HipChatFailureMode.INVALID_JOB_CONFIG
      );
    }
    const data = result.data;
    const job = data.job;
    return isJobMapping(job) ? job : data;
  });
}

function isJobMapping(value: unknown): value is JobDefinition {
  return JobMappingSchema.safeParse(value).success;
}

/**
 * Registry holding every job module
 */
export function createRegistry(options: RenderOptions): ModuleRegistry {
  return new ModuleRegistry([
    new HipChatTranslator({
      config: options.config,
      plugins: options.plugins,
      logger: options.logger,
    }),
  ]);
}

/**
 * Render every job.
 *
 * @throws FormatError attributed to the first malformed job
 * @throws ConfigurationError if the global configuration is insufficient
 */
export function renderJobs(jobs: JobDefinition[], options: RenderOptions): RenderedJob[] {
  const registry = createRegistry(options);
  const indent = options.indent ?? '  ';

  return jobs.map((job, index) => {
    const name = jobName(job, index);
    try {
      const root = registry.generateJobXml(job);
      return { name, xml: root.toString({ indent, declaration: true }) };
    } catch (error) {
      if (error instanceof FormatError) {
        throw error.forJob(name);
      }
      throw error;
    }
  });
}

/**
 * Check each job's `hipchat` section without touching credentials
 */
export function validateJobs(jobs: JobDefinition[]): JobValidationResult[] {
  return jobs.map((job, index) => {
    const logger = new MemoryLogger();
    const errors: string[] = [];

    try {
      const config = parseHipChatConfig(job.hipchat);
      if (config) {
        resolveRoomText(config, logger);
      }
    } catch (error) {
      if (!(error instanceof FormatError)) {
        throw error;
      }
      errors.push(error.message);
    }

    return {
      name: jobName(job, index),
      valid: errors.length === 0,
      errors,
      warnings: logger.messages('warn'),
    };
  });
}
