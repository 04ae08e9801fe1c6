#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { resolveCommand } from './cli/commands/resolve.js';
import { checkCommand } from './cli/commands/check.js';

async function printVersion(): Promise<void> {
  const require = createRequire(import.meta.url);
  const pkg = require('../package.json') as { version: string; name: string };

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js       ${process.version}`);
}

function showHelp(): void {
  console.log(`
${pc.bold('graph-naming')} - Validate and resolve graph node names

Usage:
  graph-naming <command> [options]

Commands:
  resolve, r   Build a node identity and print its names
  check, c     Validate the nodes declared in a manifest
  help         Show this help message

Run "graph-naming <command> --help" for command options.
`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V') {
    await printVersion();
    return 0;
  }

  switch (command) {
    case 'resolve':
    case 'r':
      return resolveCommand(args.slice(1));

    case 'check':
    case 'c':
      return checkCommand(args.slice(1));

    case undefined:
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      return 0;

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    p.log.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
