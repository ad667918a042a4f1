#!/usr/bin/env node

/**
 * Command line entry point for the local mirror
 */

import { getConfig } from './config';
import { SyncRunner } from './runner';

const COMMANDS = ['once', 'continuous', 'status', 'reset'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

async function main(): Promise<void> {
  const command = process.argv[2] || 'once';

  if (!isCommand(command)) {
    console.error('Usage: ticktick-sync [once|continuous|status|reset]');
    console.error('  once       - Run a single sync cycle');
    console.error('  continuous - Run continuous sync on schedule');
    console.error('  status     - Show checkpoint, mirrored collections and recent syncs');
    console.error('  reset      - Forget the checkpoint so the next sync is a full one');
    process.exit(1);
  }

  let runner: SyncRunner | null = null;

  try {
    runner = new SyncRunner(getConfig());

    switch (command) {
      case 'once':
        await runner.runOnce();
        break;
      case 'continuous':
        await runner.runContinuous();
        break;
      case 'status':
        runner.showStatus();
        break;
      case 'reset':
        await runner.reset();
        break;
    }
    runner.cleanup();
  } catch (error) {
    console.error('Fatal error:', error);
    runner?.cleanup();
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
