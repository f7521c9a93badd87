import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { ReleaseConfig } from '../../shared/types';

export const DEFAULT_CONFIG: ReleaseConfig = {
  timeoutMinutes: 60,
  pollIntervalSeconds: 30,
  remote: 'origin',
  baseBranch: 'main',
};

export const CONFIG_DIR_NAME = '.release-pr';
const CONFIG_FILE_NAME = 'config.json';

function readJsonFile(filePath: string): Record<string, unknown> {
  try {
    if (fs.existsSync(filePath)) {
      const content = fs.readFileSync(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        return { ...parsed };
      }
    }
  } catch {
    // Unreadable or malformed config counts as empty
  }
  return {};
}

/** Keep only the fields that carry the right type; anything else falls through to the next layer. */
function pickConfig(raw: Record<string, unknown>): Partial<ReleaseConfig> {
  const picked: Partial<ReleaseConfig> = {};
  const { timeoutMinutes, pollIntervalSeconds, remote, baseBranch } = raw;
  if (typeof timeoutMinutes === 'number' && Number.isFinite(timeoutMinutes)) picked.timeoutMinutes = timeoutMinutes;
  if (typeof pollIntervalSeconds === 'number' && pollIntervalSeconds > 0) picked.pollIntervalSeconds = pollIntervalSeconds;
  if (typeof remote === 'string' && remote) picked.remote = remote;
  if (typeof baseBranch === 'string' && baseBranch) picked.baseBranch = baseBranch;
  return picked;
}

export function loadGlobalConfig(): Record<string, unknown> {
  const globalPath = path.join(os.homedir(), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
  return readJsonFile(globalPath);
}

export function loadProjectConfig(projectPath: string): Record<string, unknown> {
  const projectConfigPath = path.join(projectPath, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
  return readJsonFile(projectConfigPath);
}

export function getResolvedConfig(projectPath?: string): ReleaseConfig {
  const global = pickConfig(loadGlobalConfig());
  const project = projectPath ? pickConfig(loadProjectConfig(projectPath)) : {};
  return { ...DEFAULT_CONFIG, ...global, ...project };
}
