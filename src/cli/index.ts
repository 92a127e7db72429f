#!/usr/bin/env node
/**
 * hipchat-job-xml CLI
 *
 * Command-line interface for rendering job definitions with HipChat
 * notification settings into build server job XML.
 *
 * @module cli
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFileSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

import { GlobalConfig } from '../adapters/global-config-adapter.js';
import { PluginInfoAdapter } from '../adapters/plugin-info-adapter.js';
import { resolveCliConfig } from '../config/cli-config.js';
import { ConfigurationError, FormatError } from '../errors.js';
import { loadJobs, renderJobs, validateJobs } from './render.js';

const program = new Command();

// Read package.json for version
const packageJson: { version: string } = JSON.parse(
  readFileSync(resolve(dirname(fileURLToPath(import.meta.url)), '../../package.json'), 'utf-8')
);

program
  .name('hipchat-job-xml')
  .description('Render HipChat notification settings of job definitions into job XML')
  .version(packageJson.version);

/**
 * Generate command
 */
program
  .command('generate')
  .description('Render job definitions (YAML) to job XML')
  .argument('<input>', 'Job definition file (YAML)')
  .option('-c, --conf <file>', 'Global configuration file (INI)')
  .option('-p, --plugins-info <file>', 'Installed plugins info file (YAML)')
  .option('-o, --output <file>', 'Write XML to a file instead of stdout')
  .action((input: string, options: unknown) => {
    const spinner = ora('Rendering job definitions...').start();

    try {
      const settings = resolveCliConfig(options);

      const config = settings.confPath
        ? GlobalConfig.fromFile(settings.confPath)
        : new GlobalConfig();
      const plugins = settings.pluginsInfoPath
        ? PluginInfoAdapter.fromFile(settings.pluginsInfoPath)
        : new PluginInfoAdapter();

      spinner.text = 'Parsing job definitions...';
      const jobs = loadJobs(readFileSync(input, 'utf-8'));

      spinner.text = `Rendering ${jobs.length} job(s)...`;
      const rendered = renderJobs(jobs, { config, plugins });

      spinner.succeed(`Rendered ${rendered.length} job(s)`);

      const output = rendered
        .map((job) => `<!-- ${job.name} -->\n${job.xml}`)
        .join('\n\n');

      if (settings.outputPath) {
        writeFileSync(settings.outputPath, `${output}\n`);
        console.error(chalk.green(`\n✓ Written to ${settings.outputPath}`));
      } else {
        console.log(output);
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        spinner.fail('Configuration error');
        console.error(chalk.red(`FATAL: ${error.message}`));
      } else if (error instanceof FormatError) {
        spinner.fail('Invalid job definition');
        console.error(chalk.red(error.message));
      } else {
        spinner.fail('Unexpected error');
        console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      }
      process.exit(1);
    }
  });

/**
 * Validate command
 */
program
  .command('validate')
  .description('Check the hipchat section of job definitions')
  .argument('<input>', 'Job definition file (YAML)')
  .action((input: string) => {
    const spinner = ora('Validating job definitions...').start();

    try {
      const results = validateJobs(loadJobs(readFileSync(input, 'utf-8')));
      const failed = results.filter((r) => !r.valid);

      if (failed.length > 0) {
        spinner.fail(`${failed.length} of ${results.length} job(s) invalid`);
      } else {
        spinner.succeed(`${results.length} job(s) valid`);
      }

      for (const result of results) {
        const mark = result.valid ? chalk.green('✓') : chalk.red('✗');
        console.log(`${mark} ${result.name}`);
        result.errors.forEach((err) => console.error(chalk.red(`  - ${err}`)));
        result.warnings.forEach((warn) => console.warn(chalk.yellow(`  - ${warn}`)));
      }

      if (failed.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      spinner.fail('Unexpected error');
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });

// Parse arguments
program.parse();
