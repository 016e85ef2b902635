import os from 'node:os';
import path from 'node:path';

export function getAppDataDir(appName: string): string {
  const platform = process.platform;
  if (platform === 'win32') {
    const base = process.env.LOCALAPPDATA || process.env.APPDATA;
    if (base) {
      return path.join(base, appName);
    }
  }

  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', appName);
  }

  const xdgConfigHome = process.env.XDG_CONFIG_HOME;
  if (xdgConfigHome) {
    return path.join(xdgConfigHome, appName);
  }

  return path.join(os.homedir(), '.config', appName);
}

export function getDefaultCredentialsPath(appName: string, filename: string): string {
  return path.join(getAppDataDir(appName), filename);
}

export function getDefaultLedgerPath(outputDir: string, filename: string): string {
  return path.join(outputDir, filename);
}
