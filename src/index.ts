#!/usr/bin/env node
import './config'; // Must be the first import
import { Command } from 'commander';
import { resolveCommand, urlCommand, watchCommand } from './commands';
import { shutdown } from './utils/otel_provider';

async function main() {
  const program = new Command();

  program
    .name('dashtime')
    .version('1.0.0')
    .description('Resolve dashboard time ranges and run auto-refresh sessions');

  program.addCommand(resolveCommand);
  program.addCommand(urlCommand);
  program.addCommand(watchCommand);

  await program.parseAsync(process.argv);
}

/**
 * Flushes pending OpenTelemetry data, then exits.
 */
async function handleShutdown(signal: string) {
  console.log(`\nReceived ${signal}, shutting down gracefully...`);
  try {
    await shutdown();
    process.exit(0);
  } catch (error) {
    console.error('Error during shutdown:', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main()
  .then(async () => {
    await shutdown();
    process.exit(typeof process.exitCode === 'number' ? process.exitCode : 0);
  })
  .catch(async (error) => {
    console.error('An error occurred:', error);
    await shutdown();
    process.exit(1);
  });
