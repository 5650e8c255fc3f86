import fs from 'node:fs';
import path from 'node:path';
import { StoredAppDataSchema } from '../schema/index.js';
import type { AppData } from '../model/types.js';
import { createDefaultProjects } from '../model/projects.js';
import { appDataFromStored, appDataToStored } from './codec.js';

export const DATA_FILENAME = 'data.json';
export const FALLBACK_DATA_FILENAME = 'ptodo_data.json';

/** The persistence boundary the session saves through. */
export interface DataStore {
  load(): AppData;
  save(data: AppData): void;
}

export function getDefaultDataFilePath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  const home = process.env.HOME || process.env.USERPROFILE;
  if (!home) {
    return path.join('.', FALLBACK_DATA_FILENAME);
  }
  return path.join(home, '.config', 'ptodo', DATA_FILENAME);
}

export function readDataFile(filePath: string): AppData | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    const result = StoredAppDataSchema.safeParse(JSON.parse(content));
    return result.success ? appDataFromStored(result.data) : null;
  } catch {
    // Unreadable or not JSON: same as no file.
    return null;
  }
}

/**
 * Best-effort write. Returns false instead of throwing when the file
 * cannot be written.
 */
export function writeDataFile(data: AppData, filePath: string): boolean {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const content = JSON.stringify(appDataToStored(data), null, 2);
    fs.writeFileSync(filePath, content, 'utf-8');
    return true;
  } catch {
    return false;
  }
}

export function createFileStore(filePath: string = getDefaultDataFilePath()): DataStore {
  return {
    load: () => readDataFile(filePath) ?? { projects: createDefaultProjects() },
    save: (data) => {
      // Failures stay silent during the session.
      writeDataFile(data, filePath);
    },
  };
}
