import { existsSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import { extname, join } from 'node:path';

export interface ArchiveMetrics {
  orgSettings: number;
  devices: number;
  deviceSettings: number;
  networks: number;
  networkSettings: number;
  totalSettings: number;
}

const SETTING_EXTENSIONS = new Set(['.json', '.yaml']);

/** Settings in one directory; a setting kept as both JSON and YAML counts once. */
async function countSettings(dir: string): Promise<number> {
  const names = new Set<string>();
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    if (!entry.isFile()) continue;
    const ext = extname(entry.name);
    if (SETTING_EXTENSIONS.has(ext)) names.add(entry.name.slice(0, -ext.length));
  }
  return names.size;
}

async function countEntityDirs(parent: string): Promise<{ dirs: number; settings: number }> {
  if (!existsSync(parent)) return { dirs: 0, settings: 0 };
  let dirs = 0;
  let settings = 0;
  for (const entry of await fs.readdir(parent, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    dirs += 1;
    settings += await countSettings(join(parent, entry.name));
  }
  return { dirs, settings };
}

export async function collectMetrics(settingsDir: string): Promise<ArchiveMetrics> {
  const orgSettings = await countSettings(settingsDir);
  const devices = await countEntityDirs(join(settingsDir, 'devices'));
  const networks = await countEntityDirs(join(settingsDir, 'networks'));
  return {
    orgSettings,
    devices: devices.dirs,
    deviceSettings: devices.settings,
    networks: networks.dirs,
    networkSettings: networks.settings,
    totalSettings: orgSettings + devices.settings + networks.settings,
  };
}
