import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError } from '@northstar/shared';
import { ConfigLoader } from './loader';

vi.mock('fs');
vi.mock('os');

describe('ConfigLoader', () => {
  const mockHome = '/mock/home';
  const mockCwd = '/mock/cwd';
  const userPath = path.join(mockHome, '.northstar', 'config.yaml');
  const repoPath = path.join(mockCwd, '.northstar.yaml');

  function withFiles(files: Record<string, unknown>) {
    vi.mocked(fs.existsSync).mockImplementation((p) => String(p) in files);
    vi.mocked(fs.readFileSync).mockImplementation((p) => {
      const content = files[String(p)];
      return typeof content === 'string' ? content : yaml.dump(content);
    });
  }

  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(os.homedir).mockReturnValue(mockHome);
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.mocked(fs.readFileSync).mockReturnValue('');
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('load', () => {
    it('returns defaults when no files exist', () => {
      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });
      expect(config.execution.defaultBaseBranch).toBe('main');
      expect(config.git.branchPrefix).toBe('northstar');
      expect(config.merge.apiKey).toBeUndefined();
    });

    it('loads the user config', () => {
      withFiles({ [userPath]: { git: { branchPrefix: 'exp' } } });

      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });
      expect(config.git.branchPrefix).toBe('exp');
      expect(config.git.maxBranchProbes).toBe(50);
    });

    it('respects precedence: flags > env > explicit > repo > user', () => {
      withFiles({
        [userPath]: { execution: { defaultFile: 'user.ts', defaultRepo: 'user/repo', defaultBaseBranch: 'u' } },
        [repoPath]: { execution: { defaultFile: 'repo.ts', defaultRepo: 'repo/repo', defaultBaseBranch: 'r' } },
        '/explicit/config.yaml': { execution: { defaultFile: 'explicit.ts', defaultBaseBranch: 'e' } },
      });

      const config = ConfigLoader.load({
        cwd: mockCwd,
        configPath: '/explicit/config.yaml',
        env: { NORTHSTAR_BASE_BRANCH: 'env-branch', NORTHSTAR_TARGET_FILE: 'env.ts' },
        flags: { execution: { defaultFile: 'flag.ts' } },
      });

      expect(config.execution.defaultFile).toBe('flag.ts');
      expect(config.execution.defaultBaseBranch).toBe('env-branch');
      expect(config.execution.defaultRepo).toBe('repo/repo');
    });

    it('reads the target repository from the environment', () => {
      const config = ConfigLoader.load({ cwd: mockCwd, env: { NORTHSTAR_TARGET_REPO: 'acme/web' } });
      expect(config.execution.defaultRepo).toBe('acme/web');
    });

    it('fails if the explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ configPath: '/missing.yaml', env: {} })).toThrow(
        'Config file not found: /missing.yaml',
      );
    });

    it('fails on invalid YAML', () => {
      withFiles({ '/invalid.yaml': 'invalid: yaml: :' });

      expect(() => ConfigLoader.load({ configPath: '/invalid.yaml', env: {} })).toThrow(
        /Error parsing YAML file: \/invalid.yaml/,
      );
    });

    it('fails when the file is not a mapping', () => {
      withFiles({ '/list.yaml': '- a\n- b\n' });

      expect(() => ConfigLoader.load({ configPath: '/list.yaml', env: {} })).toThrow(
        'Config file must contain a mapping: /list.yaml',
      );
    });

    it('lists every schema violation', () => {
      withFiles({
        '/config.yaml': { git: { maxBranchProbes: 0 }, execution: { defaultRepo: 'nope' } },
      });

      const error = (() => {
        try {
          ConfigLoader.load({ configPath: '/config.yaml', env: {} });
        } catch (e) {
          return e;
        }
      })();

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        message:
          'Configuration validation failed:\n' +
          '- git.maxBranchProbes: Number must be greater than or equal to 1\n' +
          '- execution.defaultRepo: must be in owner/name form',
      });
    });

    it('resolves secrets from the named environment variables', () => {
      withFiles({ [repoPath]: { github: { tokenEnv: 'NS_GH_TOKEN' } } });

      const config = ConfigLoader.load({
        cwd: mockCwd,
        env: { MORPH_API_KEY: 'test-secret', NS_GH_TOKEN: 'test-token' },
      });

      expect(config.merge.apiKey).toBe('test-secret');
      expect(config.github.token).toBe('test-token');
    });

    it('prefers secrets set in config over the environment', () => {
      const config = ConfigLoader.load({
        cwd: mockCwd,
        env: { MORPH_API_KEY: 'from-env' },
        flags: { merge: { apiKey: 'from-flags' } },
      });

      expect(config.merge.apiKey).toBe('from-flags');
    });
  });

  describe('mergeConfigs', () => {
    it('merges nested objects and replaces arrays and primitives', () => {
      expect(
        ConfigLoader.mergeConfigs(
          { a: { b: 1, c: [1, 2] }, d: 'x' },
          { a: { c: [3] }, d: 'y', e: undefined },
        ),
      ).toEqual({ a: { b: 1, c: [3] }, d: 'y' });
    });
  });
});
