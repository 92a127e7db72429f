/**
 * HipChat Notification Contract
 *
 * Input shape of the `hipchat` section of a job definition, the mapping of
 * its event flags onto the plugin's XML fields, and the failure modes the
 * translator can report.
 *
 * @module contracts/hipchat.contract
 */

import { z } from 'zod';

// =============================================================================
// 1. PLUGIN IDENTIFIERS
// =============================================================================

/** Name the plugin is reported under by the build server */
export const HIPCHAT_PLUGIN_NAME = 'Jenkins HipChat Plugin';

/** First plugin release that takes `buildServerUrl` and `sendAs` */
export const HIPCHAT_BASELINE_VERSION = '0.1.8';

/** Position of the HipChat module among job modules */
export const HIPCHAT_MODULE_SEQUENCE = 80;

export const JOB_PROPERTY_TAG = 'jenkins.plugins.hipchat.HipChatNotifier_-HipChatJobProperty';
export const NOTIFIER_TAG = 'jenkins.plugins.hipchat.HipChatNotifier';

// =============================================================================
// 2. INPUT SCHEMA
// =============================================================================

/**
 * `hipchat` section of a job definition
 */
export const HipChatConfigSchema = z.object({
  /** General cut-off switch; a bare `enabled:` (null) disables */
  enabled: z.boolean().nullish(),
  /** Single room (deprecated, use `rooms`) */
  room: z.string().optional(),
  /** Rooms to post messages to */
  rooms: z.array(z.string()).optional(),
  'start-notify': z.boolean().optional(),
  'notify-success': z.boolean().optional(),
  'notify-aborted': z.boolean().optional(),
  'notify-not-built': z.boolean().optional(),
  'notify-unstable': z.boolean().optional(),
  'notify-failure': z.boolean().optional(),
  'notify-back-to-normal': z.boolean().optional(),
});

export type HipChatConfig = z.infer<typeof HipChatConfigSchema>;

/**
 * Event flag keys accepted in the `hipchat` section
 */
export type HipChatEventFlag = Exclude<keyof HipChatConfig, 'enabled' | 'room' | 'rooms'>;

/**
 * Target field of an event flag
 */
export interface EventFlagMapping {
  /** Key in the job definition */
  source: HipChatEventFlag;
  /** Element name in the plugin's XML */
  target: string;
  /** Written only when the job definition gives a value */
  optional: boolean;
}

/**
 * Event flags in the order their fields are emitted
 */
export const EVENT_FLAG_MAPPINGS: readonly EventFlagMapping[] = [
  { source: 'start-notify', target: 'startNotification', optional: true },
  { source: 'notify-success', target: 'notifySuccess', optional: false },
  { source: 'notify-aborted', target: 'notifyAborted', optional: false },
  { source: 'notify-not-built', target: 'notifyNotBuilt', optional: false },
  { source: 'notify-unstable', target: 'notifyUnstable', optional: false },
  { source: 'notify-failure', target: 'notifyFailure', optional: false },
  { source: 'notify-back-to-normal', target: 'notifyBackToNormal', optional: false },
] as const;

// =============================================================================
// 3. GLOBAL CREDENTIALS
// =============================================================================

/**
 * Credentials and server details shared by every job
 */
export const HipChatCredentialsSchema = z.object({
  authToken: z
    .string()
    .refine((token) => token.trim() !== '', 'Hipchat authtoken must not be a blank string'),
  serverUrl: z.string(),
  sendAs: z.string(),
});

export type HipChatCredentials = z.infer<typeof HipChatCredentialsSchema>;

// =============================================================================
// 4. FAILURE MODES
// =============================================================================

export enum HipChatFailureMode {
  /** `hipchat` section has values of the wrong type */
  INVALID_JOB_CONFIG = 'INVALID_JOB_CONFIG',
  /** Neither `room` nor `rooms` given */
  MISSING_ROOM = 'MISSING_ROOM',
  /** `[hipchat]` section or its authtoken absent or blank */
  MISSING_CREDENTIALS = 'MISSING_CREDENTIALS',
  /** Requested section absent from the global config */
  NO_SECTION = 'NO_SECTION',
  /** Requested key absent from a global config section */
  NO_OPTION = 'NO_OPTION',
  /** Plugins info document is malformed */
  INVALID_PLUGINS_INFO = 'INVALID_PLUGINS_INFO',
}

export const FailureModeHandling: Record<
  HipChatFailureMode,
  { recoverable: boolean; action: string }
> = {
  [HipChatFailureMode.INVALID_JOB_CONFIG]: {
    recoverable: false,
    action: 'Report the malformed job definition',
  },
  [HipChatFailureMode.MISSING_ROOM]: {
    recoverable: false,
    action: "Report the job; it must specify either 'room' or 'rooms'",
  },
  [HipChatFailureMode.MISSING_CREDENTIALS]: {
    recoverable: false,
    action: 'Abort the run; the configuration file needs a hipchat section containing authtoken',
  },
  [HipChatFailureMode.NO_SECTION]: {
    recoverable: false,
    action: 'Abort the run with the missing section name',
  },
  [HipChatFailureMode.NO_OPTION]: {
    recoverable: false,
    action: 'Abort the run with the missing key name',
  },
  [HipChatFailureMode.INVALID_PLUGINS_INFO]: {
    recoverable: false,
    action: 'Abort the run; plugins info must be a list of plugin entries',
  },
};
