/**
 * Global Configuration Adapter Tests
 */

import { describe, it, expect } from 'vitest';
import { GlobalConfig } from '../../src/adapters/global-config-adapter.js';
import { HipChatFailureMode } from '../../src/contracts/hipchat.contract.js';
import { ConfigurationError } from '../../src/errors.js';

const captureError = (fn: () => void): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('GlobalConfig', () => {
  describe('fromIni', () => {
    it('should read keys under sections', () => {
      const config = GlobalConfig.fromIni(
        '[hipchat]\nauthtoken=test-token\nsend-as=Build Bot\n\n[jenkins]\nurl=http://ci.example.test/\n'
      );

      expect(config.get('hipchat', 'authtoken')).toBe('test-token');
      expect(config.get('hipchat', 'send-as')).toBe('Build Bot');
      expect(config.get('jenkins', 'url')).toBe('http://ci.example.test/');
    });

    it('should fill in defaults for keys the file leaves out', () => {
      const config = GlobalConfig.fromIni('[hipchat]\nauthtoken=test-token\n');

      expect(config.get('jenkins', 'url')).toBe('http://localhost:8080/');
      expect(config.get('hipchat', 'send-as')).toBe('Jenkins');
    });

    it('should keep boolean-looking values as strings', () => {
      const config = GlobalConfig.fromIni('[jenkins]\nquery_plugins_info=false\n');

      expect(config.get('jenkins', 'query_plugins_info')).toBe('false');
    });

    it('should ignore keys outside any section', () => {
      const config = GlobalConfig.fromIni('stray=value\n[hipchat]\nauthtoken=test-token\n', {});

      expect(config.sectionNames()).toEqual(['hipchat']);
    });
  });

  describe('lookups', () => {
    it('should report a missing section', () => {
      const error = captureError(() => new GlobalConfig({}, {}).get('hipchat', 'authtoken'));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        code: HipChatFailureMode.NO_SECTION,
        message: "No section: 'hipchat'",
      });
    });

    it('should report a missing key', () => {
      const error = captureError(() =>
        new GlobalConfig({ hipchat: {} }, {}).get('hipchat', 'authtoken')
      );

      expect(error).toMatchObject({
        code: HipChatFailureMode.NO_OPTION,
        message: "No option 'authtoken' in section: 'hipchat'",
      });
    });

    it('should fall back for absent sections and keys', () => {
      const config = new GlobalConfig({ hipchat: { authtoken: 'test-token' } }, {});

      expect(config.getOrDefault('hipchat', 'authtoken', 'x')).toBe('test-token');
      expect(config.getOrDefault('hipchat', 'send-as', 'Bot')).toBe('Bot');
      expect(config.getOrDefault('jenkins', 'url', 'http://fallback/')).toBe('http://fallback/');
    });

    it('should report present sections and keys', () => {
      const config = new GlobalConfig({ hipchat: { authtoken: 'test-token' } }, {});

      expect(config.has('hipchat')).toBe(true);
      expect(config.has('jenkins')).toBe(false);
      expect(config.hasOption('hipchat', 'authtoken')).toBe(true);
      expect(config.hasOption('hipchat', 'send-as')).toBe(false);
    });

    it('should not treat inherited object members as sections or keys', () => {
      const config = new GlobalConfig({ hipchat: { authtoken: 'test-token' } }, {});

      expect(config.has('toString')).toBe(false);
      expect(config.hasOption('hipchat', 'constructor')).toBe(false);
      expect(config.getOrDefault('hipchat', 'toString', 'x')).toBe('x');
      expect(captureError(() => config.get('constructor', 'name'))).toMatchObject({
        code: HipChatFailureMode.NO_SECTION,
        message: "No section: 'constructor'",
      });
      expect(captureError(() => config.get('hipchat', 'hasOwnProperty'))).toMatchObject({
        code: HipChatFailureMode.NO_OPTION,
      });
    });

    it('should let file values override defaults', () => {
      const config = new GlobalConfig({ jenkins: { url: 'http://ci.example.test/' } });

      expect(config.get('jenkins', 'url')).toBe('http://ci.example.test/');
      expect(config.get('hipchat', 'send-as')).toBe('Jenkins');
    });
  });
});
