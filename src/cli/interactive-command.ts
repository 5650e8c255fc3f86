/**
 * ptodo - Full-screen project/todo session
 */

import { createFileStore, getDefaultDataFilePath } from '../store/data-file.js';
import { runInteractiveTui } from '../tui/interactive.js';

export interface InteractiveOptions {
  dataFile: string;
  colorsDisabled: boolean;
}

/** Command-line arguments are not read; the session is configured from the environment alone. */
export function resolveInteractiveOptions(): InteractiveOptions {
  return {
    dataFile: getDefaultDataFilePath(),
    colorsDisabled: Boolean(process.env.NO_COLOR),
  };
}

export async function handleInteractiveCommand(): Promise<void> {
  const { dataFile, colorsDisabled } = resolveInteractiveOptions();
  await runInteractiveTui({ store: createFileStore(dataFile), colorsDisabled });
}
