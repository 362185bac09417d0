#!/usr/bin/env node
import { createReadStream, createWriteStream } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import { RecordStreamSource } from './adapters/record-stream-source.js';
import { loadPolicyFile, resolveConfig } from './config.js';
import { ControlLoop } from './control-loop.js';
import { DecisionEngine } from './engine.js';
import { ConfigError } from './errors.js';
import { createConsoleLogger } from './logger.js';
import { formatBanner, formatSummary } from './report.js';
import type { PolicyConfig } from './types.js';

function parseUint(label: string) {
  return (value: string): number => {
    const n = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
      throw new InvalidArgumentError(`${label} must be a non-negative integer`);
    }
    return n;
  };
}

type CliOptions = {
  disallowed?: string;
  threshold?: number;
  pid?: number;
  config?: string;
  events: string;
  commands: string;
};

function loadConfig(opts: CliOptions): PolicyConfig {
  try {
    const file = opts.config ? loadPolicyFile(opts.config) : undefined;
    return resolveConfig(opts, file);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const program = new Command('access-tripwire')
    .description('Block a process after it opens too many disallowed files')
    .option('-d, --disallowed <patterns>', "comma-separated disallowed patterns (e.g. '/etc/passwd,/etc/shadow')")
    .option('-t, --threshold <count>', 'disallowed opens before blocking (default: 2)', parseUint('threshold'))
    .option('-p, --pid <pid>', 'only watch this PID (default: 0, every process)', parseUint('pid'))
    .option('-c, --config <path>', 'JSON policy file')
    .option('--events <path>', "event record stream from the capture helper ('-' for stdin)", '-')
    .requiredOption('--commands <path>', 'where block commands for the capture helper are written')
    .parse();

  const opts = program.opts<CliOptions>();
  const logger = createConsoleLogger();

  const config = loadConfig(opts);

  const input = opts.events === '-' ? process.stdin : createReadStream(opts.events);
  const commands = createWriteStream(opts.commands, { flags: 'a' });
  const source = new RecordStreamSource(input, commands, { logger });
  const engine = new DecisionEngine(source, config, { logger });
  const loop = new ControlLoop(engine, source, { logger });

  // Register before run(): the loop only returns once the signal aborts.
  const controller = new AbortController();
  // once(): a second signal falls through to the default handler and exits.
  process.once('SIGINT', () => controller.abort());
  process.once('SIGTERM', () => controller.abort());

  for (const line of formatBanner(config)) console.log(line);
  console.log('Press Ctrl+C to stop\n');

  await loop.run(controller.signal);
  console.log('\nExiting...');
  await source.close();
  for (const line of formatSummary(engine.snapshot())) console.log(line);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
