/**
 * Tern Tests: Configuration
 * Loading and validation of .ternrc.yaml
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
} from '../src/index.js';

describe('Tern Configuration', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tern-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    writeFileSync(join(dir, CONFIG_FILE_NAME), content);
  }

  describe('defaults', () => {
    it('uses the current directory and .tern', () => {
      expect(createDefaultConfig()).toEqual({
        modules: { root: '.', extension: '.tern' },
        trace: false,
      });
    });

    it('returns null when no file exists', () => {
      expect(loadConfig(dir)).toBeNull();
    });

    it('treats an empty file as all defaults', () => {
      writeConfig('');
      expect(loadConfig(dir)).toEqual(createDefaultConfig());
    });
  });

  describe('loading', () => {
    it('reads every key', () => {
      writeConfig('modules:\n  root: src\n  extension: .tn\ntrace: true\n');
      expect(loadConfig(dir)).toEqual({
        modules: { root: 'src', extension: '.tn' },
        trace: true,
      });
    });

    it('fills in missing module keys', () => {
      writeConfig('modules:\n  root: lib\n');
      expect(loadConfig(dir)).toEqual({
        modules: { root: 'lib', extension: '.tern' },
        trace: false,
      });
    });
  });

  describe('validation', () => {
    it('rejects invalid YAML', () => {
      writeConfig('modules: [unclosed');
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: invalid YAML'
      );
    });

    it('rejects a non-mapping document', () => {
      writeConfig('- a\n- b\n');
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: must be a mapping'
      );
    });

    it('rejects unknown keys', () => {
      writeConfig('strict: true\n');
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: unknown key strict'
      );
      writeConfig('modules:\n  paths: []\n');
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: unknown key modules.paths'
      );
    });

    it('rejects a non-boolean trace', () => {
      writeConfig('trace: yes please\n');
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: trace must be a boolean'
      );
    });

    it('rejects a modules value that is not a mapping', () => {
      writeConfig('modules: lib\n');
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: modules must be a mapping'
      );
    });

    it('rejects an empty module root', () => {
      writeConfig('modules:\n  root: ""\n');
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: modules.root must be a non-empty string'
      );
    });

    it('rejects an extension without a leading dot', () => {
      writeConfig('modules:\n  extension: tern\n');
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: modules.extension must be a string starting with "."'
      );
    });
  });
});
