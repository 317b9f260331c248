#!/usr/bin/env node

import { Command } from 'commander';
import { runCommand } from './commands/run';
import { validateCommand } from './commands/validate';
import { listCommand } from './commands/list';
import { csvHeaderCommand } from './commands/csv-header';
import { VERSION } from '../version';

const program = new Command();

program
    .name('netpace')
    .description('Measure latency, jitter, download and upload speed against LibreSpeed-style servers')
    .version(VERSION);

program
    .command('run', { isDefault: true })
    .description('Run a speed test against the configured servers')
    .argument('<config>', 'Configuration file with the server list (YAML or JSON)')
    .option('-e, --env <environment>', 'Environment configuration')
    .option('-s, --server <ids...>', 'Only test the servers with these ids')
    .option('-x, --exclude <ids...>', 'Skip the servers with these ids')
    .option('--no-download', 'Do not perform the download test')
    .option('--no-upload', 'Do not perform the upload test')
    .option('--no-pre-allocate', 'Generate a fresh upload payload for every request instead of reusing one')
    .option('--concurrent <number>', 'Concurrent HTTP requests per transfer test')
    .option('--chunks <number>', 'Chunks requested per download request')
    .option('--duration <time>', 'Upper bound of each transfer test (e.g. 15, 15s, 500ms)')
    .option('--upload-size <kib>', 'Upload payload size in KiB')
    .option('--bytes', 'Display values in bytes instead of bits')
    .option('--mebibytes', 'Use 1024 bytes as 1 kilobyte instead of 1000')
    .option('--distance <unit>', 'Distance unit shown in ISP info (km|mi|NM)')
    .option('--source <ip>', 'Source IP address to bind to')
    .option('-4, --ipv4', 'Force IPv4')
    .option('-6, --ipv6', 'Force IPv6')
    .option('--simple', 'Suppress verbose output, only show basic information')
    .option('--csv', 'Print results in CSV format (takes precedence over --json)')
    .option('--csv-delimiter <char>', 'CSV field delimiter (, or ;)')
    .option('--json', 'Print results in JSON format')
    .option('--share', 'Submit results and print a share link')
    .option('--telemetry-level <level>', 'Telemetry level (disabled|basic|full|debug)')
    .option('--telemetry-server <url>', 'Telemetry server base URL')
    .option('--telemetry-path <path>', 'Telemetry submission path')
    .option('--telemetry-share <path>', 'Telemetry share page path')
    .option('--telemetry-extra <text>', 'Extra data attached to the telemetry submission')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(runCommand);

program
    .command('list')
    .description('List the servers in a configuration file')
    .argument('<config>', 'Configuration file with the server list')
    .option('-e, --env <environment>', 'Environment configuration')
    .action(listCommand);

program
    .command('validate')
    .description('Validate a configuration file')
    .argument('<config>', 'Configuration file with the server list')
    .option('-e, --env <environment>', 'Environment configuration')
    .action(validateCommand);

program
    .command('csv-header')
    .description('Print the CSV header row')
    .option('--csv-delimiter <char>', 'CSV field delimiter (, or ;)', ',')
    .action(csvHeaderCommand);

program.parseAsync().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
