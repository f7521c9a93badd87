import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import { loadGlobalConfig, loadProjectConfig, getResolvedConfig } from '../../src/main/services/config-service';

vi.mock('fs');
vi.mock('os');

const mockedFs = vi.mocked(fs);
const mockedOs = vi.mocked(os);

describe('config-service', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    mockedOs.homedir.mockReturnValue('/home/testuser');
  });

  describe('loadGlobalConfig', () => {
    it('returns parsed JSON when file exists', () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockedFs.readFileSync.mockReturnValue('{"timeoutMinutes": 30, "pollIntervalSeconds": 10}');

      const result = loadGlobalConfig();

      expect(result).toEqual({ timeoutMinutes: 30, pollIntervalSeconds: 10 });
      expect(mockedFs.existsSync).toHaveBeenCalledWith('/home/testuser/.release-pr/config.json');
    });

    it('returns empty object when file does not exist', () => {
      mockedFs.existsSync.mockReturnValue(false);

      expect(loadGlobalConfig()).toEqual({});
      expect(mockedFs.readFileSync).not.toHaveBeenCalled();
    });

    it('returns empty object when file contains invalid JSON', () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockedFs.readFileSync.mockReturnValue('not valid json {{{');

      expect(loadGlobalConfig()).toEqual({});
    });

    it('returns empty object when file holds a JSON array', () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockedFs.readFileSync.mockReturnValue('[1, 2]');

      expect(loadGlobalConfig()).toEqual({});
    });
  });

  describe('loadProjectConfig', () => {
    it('reads from the project config directory', () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockedFs.readFileSync.mockReturnValue('{"baseBranch": "develop"}');

      const result = loadProjectConfig('/my/project');

      expect(result).toEqual({ baseBranch: 'develop' });
      expect(mockedFs.existsSync).toHaveBeenCalledWith('/my/project/.release-pr/config.json');
    });

    it('returns empty object when file contains invalid JSON', () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockedFs.readFileSync.mockReturnValue('}{broken');

      expect(loadProjectConfig('/some/path')).toEqual({});
    });
  });

  describe('getResolvedConfig', () => {
    it('returns defaults when no config files exist', () => {
      mockedFs.existsSync.mockReturnValue(false);

      expect(getResolvedConfig()).toEqual({
        timeoutMinutes: 60,
        pollIntervalSeconds: 30,
        remote: 'origin',
        baseBranch: 'main',
      });
    });

    it('global config overrides defaults', () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockedFs.readFileSync.mockReturnValue('{"timeoutMinutes": 15}');

      const result = getResolvedConfig();

      expect(result.timeoutMinutes).toBe(15);
      expect(result.pollIntervalSeconds).toBe(30);
      expect(result.remote).toBe('origin');
    });

    it('project config overrides global config', () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockedFs.readFileSync
        .mockReturnValueOnce('{"timeoutMinutes": 15, "remote": "upstream"}')
        .mockReturnValueOnce('{"timeoutMinutes": 90}');

      const result = getResolvedConfig('/my/project');

      expect(result.timeoutMinutes).toBe(90);
      expect(result.remote).toBe('upstream');
    });

    it('ignores fields with the wrong type', () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockedFs.readFileSync.mockReturnValue(
        '{"timeoutMinutes": "soon", "pollIntervalSeconds": -5, "remote": "", "baseBranch": "release"}',
      );

      expect(getResolvedConfig()).toEqual({
        timeoutMinutes: 60,
        pollIntervalSeconds: 30,
        remote: 'origin',
        baseBranch: 'release',
      });
    });

    it('does not load project config when projectPath is not provided', () => {
      mockedFs.existsSync.mockReturnValue(false);

      getResolvedConfig();

      expect(mockedFs.existsSync).toHaveBeenCalledTimes(1);
    });
  });
});
