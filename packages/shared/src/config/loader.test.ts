import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigLoader, REPO_CONFIG_FILENAME } from './loader';
import { ConfigError } from '../errors';

describe('ConfigLoader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gitree-config-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeYaml(name: string, data: unknown): string {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, yaml.dump(data));
    return filePath;
  }

  describe('load', () => {
    it('should load defaults when no files exist', () => {
      const config = ConfigLoader.load({ cwd: tmpDir });
      expect(config).toEqual({
        configVersion: 1,
        layout: { extraKnownNames: [] },
        exceptions: { names: [], match: 'basename' },
        limits: { maxEntriesPerDirectory: 4096 },
      });
    });

    it('should load repo config from the working directory', () => {
      writeYaml(REPO_CONFIG_FILENAME, { exceptions: { names: ['mirror'] } });

      const config = ConfigLoader.load({ cwd: tmpDir });
      expect(config.exceptions).toEqual({ names: ['mirror'], match: 'basename' });
    });

    it('should respect precedence: flags > explicit > repo', () => {
      writeYaml(REPO_CONFIG_FILENAME, {
        limits: { maxEntriesPerDirectory: 10 },
        exceptions: { match: 'prefix' },
      });
      const explicitPath = writeYaml('explicit.yaml', { limits: { maxEntriesPerDirectory: 20 } });

      const config = ConfigLoader.load({
        cwd: tmpDir,
        configPath: explicitPath,
        flags: { limits: { maxEntriesPerDirectory: 30 } },
      });

      expect(config.limits.maxEntriesPerDirectory).toBe(30);
      expect(config.exceptions.match).toBe('prefix');
    });

    it('should fail if explicit config file is missing', () => {
      expect(() =>
        ConfigLoader.load({ cwd: tmpDir, configPath: path.join(tmpDir, 'missing.yaml') }),
      ).toThrow(/Config file not found/);
    });

    it('should report every schema issue on its own line', () => {
      writeYaml(REPO_CONFIG_FILENAME, {
        exceptions: { match: 'glob' },
        limits: { maxEntriesPerDirectory: -1 },
      });

      let caught: unknown;
      try {
        ConfigLoader.load({ cwd: tmpDir });
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(ConfigError);
      const lines = (caught as ConfigError).message.split('\n');
      expect(lines[0]).toBe('Configuration validation failed:');
      expect(lines).toHaveLength(3);
      expect(lines[1]).toMatch(/^- exceptions\.match: /);
      expect(lines[2]).toMatch(/^- limits\.maxEntriesPerDirectory: /);
    });

    it('should reject unknown keys', () => {
      writeYaml(REPO_CONFIG_FILENAME, { layuot: {} });
      expect(() => ConfigLoader.load({ cwd: tmpDir })).toThrow(/- \(root\): Unrecognized key/);
    });
  });

  describe('loadYaml', () => {
    it('should wrap YAML syntax errors in ConfigError', () => {
      const filePath = path.join(tmpDir, 'broken.yaml');
      fs.writeFileSync(filePath, 'layout: [unclosed\n');
      expect(() => ConfigLoader.loadYaml(filePath)).toThrow(ConfigError);
    });

    it('should treat an empty file as empty config', () => {
      const filePath = path.join(tmpDir, 'empty.yaml');
      fs.writeFileSync(filePath, '');
      expect(ConfigLoader.loadYaml(filePath)).toEqual({});
    });

    it('should reject a top-level list', () => {
      const filePath = writeYaml('list.yaml', ['a', 'b']);
      expect(() => ConfigLoader.loadYaml(filePath)).toThrow(/must contain a mapping/);
    });
  });

  describe('mergeConfigs', () => {
    it('merges nested objects and replaces arrays', () => {
      const merged = ConfigLoader.mergeConfigs(
        { layout: { extraKnownNames: ['a'] }, exceptions: { match: 'prefix' } },
        { layout: { extraKnownNames: ['b'] }, exceptions: { names: ['x'] } },
      );
      expect(merged).toEqual({
        layout: { extraKnownNames: ['b'] },
        exceptions: { match: 'prefix', names: ['x'] },
      });
    });
  });
});
