/**
 * Job Rendering Tests
 *
 * Loads YAML job definitions and renders them through the module registry.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { loadJobs, renderJobs, validateJobs, jobName } from '../../src/cli/render.js';
import { GlobalConfig } from '../../src/adapters/global-config-adapter.js';
import { PluginInfoAdapter } from '../../src/adapters/plugin-info-adapter.js';
import { ConfigurationError, FormatError } from '../../src/errors.js';
import { MemoryLogger } from '../../src/logging/logger.js';

const JOBS_YAML = `
- job:
    name: build-app
    hipchat:
      rooms:
        - builds
        - alerts
- job:
    name: docs
`;

const EXPECTED_BUILD_APP_XML = [
  '<?xml version="1.0" encoding="utf-8"?>',
  '<project>',
  '  <properties>',
  '    <jenkins.plugins.hipchat.HipChatNotifier_-HipChatJobProperty>',
  '      <room>builds,alerts</room>',
  '      <notifySuccess>false</notifySuccess>',
  '      <notifyAborted>false</notifyAborted>',
  '      <notifyNotBuilt>false</notifyNotBuilt>',
  '      <notifyUnstable>false</notifyUnstable>',
  '      <notifyFailure>false</notifyFailure>',
  '      <notifyBackToNormal>false</notifyBackToNormal>',
  '    </jenkins.plugins.hipchat.HipChatNotifier_-HipChatJobProperty>',
  '  </properties>',
  '  <publishers>',
  '    <jenkins.plugins.hipchat.HipChatNotifier>',
  '      <notifySuccess>false</notifySuccess>',
  '      <notifyAborted>false</notifyAborted>',
  '      <notifyNotBuilt>false</notifyNotBuilt>',
  '      <notifyUnstable>false</notifyUnstable>',
  '      <notifyFailure>false</notifyFailure>',
  '      <notifyBackToNormal>false</notifyBackToNormal>',
  '      <buildServerUrl>http://localhost:8080/</buildServerUrl>',
  '      <sendAs>Jenkins</sendAs>',
  '      <authToken>test-token</authToken>',
  '      <room>builds,alerts</room>',
  '    </jenkins.plugins.hipchat.HipChatNotifier>',
  '  </publishers>',
  '</project>',
].join('\n');

describe('loadJobs', () => {
  it('should unwrap job entries from a list', () => {
    const jobs = loadJobs(JOBS_YAML);

    expect(jobs).toEqual([
      { name: 'build-app', hipchat: { rooms: ['builds', 'alerts'] } },
      { name: 'docs' },
    ]);
  });

  it('should accept a single job mapping', () => {
    expect(loadJobs('name: solo\nhipchat:\n  room: team\n')).toEqual([
      { name: 'solo', hipchat: { room: 'team' } },
    ]);
  });

  it('should reject entries that are not mappings', () => {
    expect(() => loadJobs('- 42\n')).toThrow(FormatError);
  });
});

describe('jobName', () => {
  it('should fall back to the position of unnamed jobs', () => {
    expect(jobName({ name: 'docs' }, 0)).toBe('docs');
    expect(jobName({}, 2)).toBe('job-3');
  });
});

describe('renderJobs', () => {
  let config: GlobalConfig;
  let plugins: PluginInfoAdapter;
  let logger: MemoryLogger;

  beforeEach(() => {
    config = new GlobalConfig({ hipchat: { authtoken: 'test-token' } });
    plugins = new PluginInfoAdapter([{ longName: 'Jenkins HipChat Plugin', version: '0.1.9' }]);
    logger = new MemoryLogger();
  });

  it('should render each job to indented XML', () => {
    const rendered = renderJobs(loadJobs(JOBS_YAML), { config, plugins, logger });

    expect(rendered).toEqual([
      { name: 'build-app', xml: EXPECTED_BUILD_APP_XML },
      { name: 'docs', xml: '<?xml version="1.0" encoding="utf-8"?>\n<project/>' },
    ]);
  });

  it('should render a bare enabled key as a disabled section', () => {
    const rendered = renderJobs(loadJobs('name: j\nhipchat:\n  enabled:\n  rooms: [a]\n'), {
      config,
      plugins,
      logger,
    });

    expect(rendered).toEqual([
      { name: 'j', xml: '<?xml version="1.0" encoding="utf-8"?>\n<project/>' },
    ]);
  });

  it('should attribute format errors to the job', () => {
    let caught: unknown;
    try {
      renderJobs([{ name: 'broken', hipchat: { enabled: true } }], { config, plugins, logger });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FormatError);
    expect(caught).toMatchObject({
      jobName: 'broken',
      message: "broken: Must specify either 'room' or 'rooms' in hipchat config.",
    });
  });

  it('should pass configuration errors through', () => {
    expect(() =>
      renderJobs([{ name: 'no-token', hipchat: { rooms: ['builds'] } }], {
        config: new GlobalConfig({}),
        plugins,
        logger,
      })
    ).toThrow(ConfigurationError);
  });
});

describe('validateJobs', () => {
  it('should report errors and deprecation warnings per job', () => {
    const results = validateJobs([
      { name: 'legacy', hipchat: { room: 'team' } },
      { hipchat: { rooms: 'builds' } },
      { name: 'plain' },
    ]);

    expect(results[0]).toEqual({
      name: 'legacy',
      valid: true,
      errors: [],
      warnings: ["'room' is deprecated, please use 'rooms'"],
    });
    expect(results[1]?.name).toBe('job-2');
    expect(results[1]?.valid).toBe(false);
    expect(results[1]?.errors[0]).toMatch(/^Invalid hipchat config: rooms: /);
    expect(results[2]).toEqual({ name: 'plain', valid: true, errors: [], warnings: [] });
  });
});
