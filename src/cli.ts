#!/usr/bin/env node
import { handleInteractiveCommand } from './cli/interactive-command.js';

async function main(): Promise<void> {
  try {
    await handleInteractiveCommand();
    // terminal-kit can leave stdin referenced after releasing input.
    process.exit(0);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
