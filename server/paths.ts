import os from 'node:os';
import path from 'node:path';

const APP_DIR_NAME = 'dataset-captioner';
const WINDOWS_APP_DIR_NAME = 'DatasetCaptioner';

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  const override = env.DATASET_CAPTIONER_HOME?.trim();
  if (override) {
    return path.resolve(override);
  }

  if (platform === 'win32') {
    const appData = env.APPDATA?.trim() || os.homedir();
    return path.join(appData, WINDOWS_APP_DIR_NAME);
  }

  return path.join(os.homedir(), '.config', APP_DIR_NAME);
}

export function settingsFilePath(configDir: string): string {
  return path.join(configDir, 'settings.json');
}

export function templatesFilePath(configDir: string): string {
  return path.join(configDir, 'templates.json');
}
