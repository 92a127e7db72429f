/**
 * Error Model
 *
 * @module errors
 */

import { HipChatFailureMode } from './contracts/hipchat.contract.js';

/**
 * Base class for every error raised while building job XML
 */
export class JobBuilderError extends Error {
  constructor(
    message: string,
    public readonly code: HipChatFailureMode
  ) {
    super(message);
    this.name = 'JobBuilderError';
  }
}

/**
 * A job definition violates the expected format
 */
export class FormatError extends JobBuilderError {
  constructor(
    message: string,
    code: HipChatFailureMode = HipChatFailureMode.INVALID_JOB_CONFIG,
    public readonly jobName?: string
  ) {
    super(message, code);
    this.name = 'FormatError';
  }

  /**
   * Copy of this error attributed to a job
   */
  forJob(jobName: string): FormatError {
    return new FormatError(`${jobName}: ${this.message}`, this.code, jobName);
  }
}

/**
 * The global configuration cannot support the run
 */
export class ConfigurationError extends JobBuilderError {
  constructor(message: string, code: HipChatFailureMode) {
    super(message, code);
    this.name = 'ConfigurationError';
  }
}
