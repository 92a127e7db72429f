/**
 * hipchat-job-xml
 *
 * Library entry point.
 *
 * @module hipchat-job-xml
 */

// Contract
export {
  HIPCHAT_PLUGIN_NAME,
  HIPCHAT_BASELINE_VERSION,
  HIPCHAT_MODULE_SEQUENCE,
  JOB_PROPERTY_TAG,
  NOTIFIER_TAG,
  EVENT_FLAG_MAPPINGS,
  HipChatConfigSchema,
  HipChatCredentialsSchema,
  HipChatFailureMode,
  FailureModeHandling,
  type HipChatConfig,
  type HipChatCredentials,
  type HipChatEventFlag,
  type EventFlagMapping,
} from './contracts/hipchat.contract.js';

// Errors
export { JobBuilderError, FormatError, ConfigurationError } from './errors.js';

// Logging
export {
  ConsoleLogger,
  MemoryLogger,
  createLogger,
  type Logger,
  type LogLevel,
} from './logging/logger.js';

// XML
export { XmlElement, escapeXml, type SerializeOptions } from './xml/element.js';

// Adapters
export {
  GlobalConfig,
  DEFAULT_CONFIG,
  type ConfigSections,
} from './adapters/global-config-adapter.js';
export {
  PluginInfoAdapter,
  type PluginInfo,
} from './adapters/plugin-info-adapter.js';

// Translators
export {
  HipChatTranslator,
  parseHipChatConfig,
  resolveRoomText,
  type HipChatTranslatorOptions,
} from './translators/hipchat-translator.js';
export { CredentialLoader } from './translators/credential-loader.js';
export {
  parseVersion,
  compareVersions,
  selectPublisherSchema,
  type ParsedVersion,
  type PublisherSchema,
} from './translators/version-gate.js';
export {
  ModuleRegistry,
  PROJECT_ROOT_TAG,
  type JobModule,
  type JobDefinition,
} from './translators/module-registry.js';

// Rendering
export {
  loadJobs,
  renderJobs,
  validateJobs,
  createRegistry,
  type RenderOptions,
  type RenderedJob,
  type JobValidationResult,
} from './cli/render.js';
