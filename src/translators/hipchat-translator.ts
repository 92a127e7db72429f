/**
 * HipChat Translator
 *
 * Writes the HipChat notification settings of a job into its XML: a job
 * property holding the rooms and event flags, and a notifier publisher that
 * additionally carries the credentials and server details from the global
 * configuration.
 *
 * @module translators/hipchat-translator
 */

import type { GlobalConfig } from '../adapters/global-config-adapter.js';
import { PluginInfoAdapter } from '../adapters/plugin-info-adapter.js';
import {
  EVENT_FLAG_MAPPINGS,
  HIPCHAT_BASELINE_VERSION,
  HIPCHAT_MODULE_SEQUENCE,
  HIPCHAT_PLUGIN_NAME,
  HipChatConfigSchema,
  HipChatFailureMode,
  JOB_PROPERTY_TAG,
  NOTIFIER_TAG,
  type HipChatConfig,
} from '../contracts/hipchat.contract.js';
import { FormatError } from '../errors.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { XmlElement } from '../xml/element.js';
import { CredentialLoader } from './credential-loader.js';
import type { JobDefinition, JobModule } from './module-registry.js';
import { selectPublisherSchema } from './version-gate.js';

/**
 * Translator options
 */
export interface HipChatTranslatorOptions {
  /** Global configuration holding the `[hipchat]` and `[jenkins]` sections */
  config: GlobalConfig;
  /** Installed plugins; unknown plugins are treated as version 0 */
  plugins?: PluginInfoAdapter;
  logger?: Logger;
}

/**
 * Validate the `hipchat` section of a job.
 *
 * @returns the parsed section, or null when the job has no active section
 * @throws FormatError if values have the wrong type
 */
export function parseHipChatConfig(raw: unknown): HipChatConfig | null {
  if (!raw || (typeof raw === 'object' && Object.keys(raw).length === 0)) {
    return null;
  }

  const result = HipChatConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new FormatError(
      `Invalid hipchat config: ${details}`,
      HipChatFailureMode.INVALID_JOB_CONFIG
    );
  }

  const config = result.data;
  if (config.enabled === false || config.enabled === null) {
    return null;
  }
  return config;
}

/**
 * Room text shared by the job property and the notifier.
 *
 * @throws FormatError if neither `room` nor `rooms` is given
 */
export function resolveRoomText(config: HipChatConfig, logger: Logger): string {
  if (config.rooms !== undefined) {
    return config.rooms.join(',');
  }

  if (config.room !== undefined) {
    logger.warn("'room' is deprecated, please use 'rooms'");
    return config.room;
  }

  throw new FormatError(
    "Must specify either 'room' or 'rooms' in hipchat config.",
    HipChatFailureMode.MISSING_ROOM
  );
}

/**
 * Write the event flag fields into a parent node.
 * Optional flags are written whenever the job gives a value, `false` included.
 */
function writeEventFlags(parent: XmlElement, config: HipChatConfig): void {
  for (const { source, target, optional } of EVENT_FLAG_MAPPINGS) {
    const value = config[source];
    if (optional && value === undefined) {
      continue;
    }
    parent.appendText(target, String(value ?? false));
  }
}

/**
 * HipChatTranslator
 *
 * @example
 * ```typescript
 * const translator = new HipChatTranslator({
 *   config: GlobalConfig.fromIni('[hipchat]\nauthtoken=test-token\n'),
 *   plugins: new PluginInfoAdapter([{ longName: 'Jenkins HipChat Plugin', version: '0.1.9' }]),
 * });
 *
 * const project = new XmlElement('project');
 * translator.genXml(project, { hipchat: { rooms: ['builds'], 'notify-failure': true } });
 * ```
 */
export class HipChatTranslator implements JobModule {
  readonly sequence = HIPCHAT_MODULE_SEQUENCE;
  readonly name = 'hipchat';

  private readonly credentials: CredentialLoader;
  private readonly plugins: PluginInfoAdapter;
  private readonly logger: Logger;

  constructor(options: HipChatTranslatorOptions) {
    this.logger = options.logger ?? createLogger('hipchat');
    this.credentials = new CredentialLoader(options.config, this.logger);
    this.plugins = options.plugins ?? new PluginInfoAdapter();
  }

  /**
   * Append the job property and notifier for `data.hipchat`.
   *
   * Nothing is written when the section is absent, empty or disabled.
   * Credentials and the room specification are checked before the document
   * is touched. Repeated calls append repeated subtrees.
   *
   * @throws ConfigurationError if the credentials are missing
   * @throws FormatError if the section is malformed
   */
  genXml(xmlParent: XmlElement, data: JobDefinition): void {
    const hipchat = parseHipChatConfig(data.hipchat);
    if (!hipchat) {
      return;
    }

    const credentials = this.credentials.load();
    const roomText = resolveRoomText(hipchat, this.logger);

    const properties = xmlParent.findOrCreate('properties');
    const jobProperty = properties.subElement(JOB_PROPERTY_TAG);
    jobProperty.appendText('room', roomText);

    const publishers = xmlParent.findOrCreate('publishers');
    const notifier = publishers.subElement(NOTIFIER_TAG);

    for (const parent of [notifier, jobProperty]) {
      writeEventFlags(parent, hipchat);
    }

    const version = this.plugins.getPluginVersion(HIPCHAT_PLUGIN_NAME);
    const schema = selectPublisherSchema(version, HIPCHAT_BASELINE_VERSION);
    this.logger.debug(`${HIPCHAT_PLUGIN_NAME} ${version}: ${schema} publisher fields`);

    if (schema === 'current') {
      notifier.appendText('buildServerUrl', credentials.serverUrl);
      notifier.appendText('sendAs', credentials.sendAs);
    } else {
      notifier.appendText('jenkinsUrl', credentials.serverUrl);
    }

    notifier.appendText('authToken', credentials.authToken);
    // Default room; a room is always given per job, so this repeats it
    notifier.appendText('room', roomText);
  }
}
