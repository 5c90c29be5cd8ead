#!/usr/bin/env node
import { SketchConfig } from './common/Config';
import { CLIParser, CLIOptions } from './cli/CLIParser';
import { DefaultSketchFactory } from './factory/SketchFactory';
import { SketchRegistry } from './registry/SketchRegistry';
import { HTTPServer } from './server/HTTPServer';
import {
  checkPasswordUniqueness,
  compareCounts,
  formatComparison,
  loadIpAddresses,
} from './analysis';

const STATUS_LABELS = {
  'invalid': 'invalid password',
  'already-used': 'already used',
  'unique': 'unique',
} as const;

function runPasswords(options: CLIOptions): void {
  const factory = new DefaultSketchFactory(options.config);
  const filter = factory.createFilter();

  for (const password of options.existingPasswords) {
    filter.add(password);
  }

  for (const { password, status } of checkPasswordUniqueness(filter, options.inputs)) {
    console.log(`Password '${String(password)}' - ${STATUS_LABELS[status]}.`);
  }
}

async function runCompare(options: CLIOptions): Promise<void> {
  const [logFile] = options.inputs;
  if (logFile === undefined) {
    throw new Error('compare requires a log file path');
  }

  const addresses = await loadIpAddresses(logFile);
  const report = compareCounts(addresses, options.config.estimator.bucketBits);

  console.log(`Read ${addresses.length} IP addresses from ${logFile}`);
  console.log('Comparison results:');
  console.log(formatComparison(report));
  console.log(`Relative error: ${(report.relativeError * 100).toFixed(2)}%`);
}

async function runServer(config: SketchConfig): Promise<void> {
  const registry = new SketchRegistry(new DefaultSketchFactory(config));
  const httpServer = new HTTPServer(registry, config.httpPort);

  const shutdown = async (): Promise<void> => {
    console.log('\nShutting down gracefully...');
    await httpServer.stop();
    console.log('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  await httpServer.start();

  console.log('Sketchbook - Ready!');
  console.log(`  HTTP API: http://localhost:${config.httpPort}`);
  console.log(`  Filter defaults: capacity=${config.filter.capacity}, hashCount=${config.filter.hashCount}`);
  console.log(`  Estimator defaults: bucketBits=${config.estimator.bucketBits}`);
}

async function main(): Promise<void> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help || options.command === null) {
    CLIParser.printHelp();
    return;
  }

  switch (options.command) {
    case 'passwords':
      runPasswords(options);
      return;
    case 'compare':
      await runCompare(options);
      return;
    case 'serve':
      await runServer(options.config);
      return;
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
