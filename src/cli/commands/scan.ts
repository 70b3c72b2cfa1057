/**
 * Scan command implementation
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { App } from '../../core/app.js';
import {
  DEFAULTS,
  parseFormat,
  parseMethods,
  parseSchemes,
  resolveScanConfig,
} from '../../core/config.js';
import type { ScanConfig, ScanReport } from '../../core/types.js';

interface ScanCommandOptions {
  domain: string;
  wordlist?: string;
  concurrency: number;
  timeout: number;
  methods: string[];
  schemes: string[];
  scanTimeout?: number;
  retries: number;
  resolver: string[];
  insecure: boolean;
  output?: string;
  format?: string;
  quiet: boolean;
  verbose: boolean;
}

const toNumber = (value: string) => Number(value);

export const scanCommand = new Command('scan')
  .description('Brute-force subdomains of a domain and verify them over DNS and HTTP')
  .requiredOption('-d, --domain <domain>', 'Target domain to scan')
  .option('-w, --wordlist <path>', 'Wordlist file, one label per line (default: built-in list)')
  .option('-c, --concurrency <number>', 'Candidates probed in parallel', toNumber, DEFAULTS.concurrency)
  .option('-t, --timeout <seconds>', 'Per-probe timeout in seconds', toNumber, DEFAULTS.timeout)
  .option('-m, --methods <methods...>', 'Probe methods: dns, http', [...DEFAULTS.methods])
  .option('--schemes <schemes...>', 'HTTP schemes to try: http, https', [...DEFAULTS.schemes])
  .option('--scan-timeout <seconds>', 'Stop dispatching new candidates after this many seconds', toNumber)
  .option('-r, --retries <count>', 'Retries for timed-out or failed probes (max 3)', toNumber, DEFAULTS.retries)
  .option('--resolver <servers...>', 'Upstream DNS servers (default: system resolver)', [])
  .option('--insecure', 'Skip TLS certificate verification', false)
  .option('-o, --output <file>', 'Write results to file')
  .option('-f, --format <type>', 'Output format: text|json|csv (default: from --output extension)')
  .option('-q, --quiet', 'Suppress logs and summary (results still go to stdout without -o)', false)
  .option('-v, --verbose', 'Log every probe outcome', false)
  .action(async (options: ScanCommandOptions) => {
    // First Ctrl-C stops dispatch and reports what was found; a second one kills the process
    const controller = new AbortController();
    process.once('SIGINT', () => {
      console.error(chalk.yellow('\n   ⚠ Interrupted, finishing in-flight probes...'));
      controller.abort();
    });

    try {
      const config = resolveScanConfig(options.domain, {
        wordlist: options.wordlist,
        concurrency: options.concurrency,
        timeout: options.timeout,
        methods: parseMethods(options.methods),
        schemes: parseSchemes(options.schemes),
        scanTimeout: options.scanTimeout,
        retries: options.retries,
        resolvers: options.resolver,
        insecure: options.insecure,
        output: options.output,
        format: options.format === undefined ? undefined : parseFormat(options.format),
        quiet: options.quiet,
        verbose: options.verbose,
        signal: controller.signal,
      });

      if (!config.quiet) {
        printBanner(config);
      }

      const report = await new App(config).run();

      if (!config.quiet) {
        printSummary(config, report);
      }

      if (report.interrupted) {
        process.exit(130);
      }
      process.exit(report.outputError ? 1 : 0);
    } catch (error) {
      if (error instanceof Error) {
        console.log(
          chalk.red.bold('\n   ✘ Scan failed\n') +
            chalk.red.bold('   ──────────────────────────────────────────────────────────────\n')
        );
        console.log(chalk.red(`   Error: `) + chalk.white(error.message));
        console.log(chalk.dim('\n   Check your input arguments or local network setup.\n'));
      }
      process.exit(1);
    }
  });

function printBanner(config: ScanConfig) {
  console.log(
    chalk.bold('\n   Target') + chalk.gray(' ──▶ ') + chalk.cyan.bold(config.domain) + '\n'
  );

  console.log(chalk.dim('   Configuration'));
  console.log(chalk.gray('   ├─ Wordlist         : ') + chalk.white(config.wordlist ?? 'built-in'));
  console.log(chalk.gray('   ├─ Concurrency      : ') + chalk.white.bold(config.concurrency.toString()));
  console.log(chalk.gray('   ├─ Probe timeout    : ') + chalk.white(`${config.timeoutMs}ms`));
  console.log(chalk.gray('   ├─ Methods          : ') + chalk.magenta.bold(config.methods.join(', ')));
  if (config.methods.includes('http')) {
    console.log(chalk.gray('   ├─ Schemes          : ') + chalk.magenta(config.schemes.join(', ')));
  }
  if (config.scanTimeoutMs !== undefined) {
    console.log(chalk.gray('   ├─ Scan deadline    : ') + chalk.white(`${config.scanTimeoutMs}ms`));
  }
  if (config.resolvers.length > 0) {
    console.log(chalk.gray('   ├─ Resolvers        : ') + chalk.white(config.resolvers.join(', ')));
  }
  console.log(
    chalk.gray('   └─ Output           : ') +
      (config.output ? chalk.blue(`${config.output} (${config.format})`) : chalk.dim('stdout'))
  );
  console.log();
}

function printSummary(config: ScanConfig, report: ScanReport) {
  const { statistics } = report.resultSet;

  console.log(chalk.green.bold('\n   ✔ Scan completed\n'));
  console.log(chalk.bold('   Results Summary'));
  console.log(chalk.gray('   ├─ Candidates checked : ') + chalk.white(statistics.attempted.toString()));
  console.log(chalk.gray('   ├─ Live subdomains    : ') + chalk.green.bold(statistics.resolved.toString()));
  console.log(chalk.gray('   ├─ Unreachable        : ') + chalk.dim(statistics.unreachable.toString()));
  console.log(chalk.gray('   ├─ Timed out          : ') + chalk.yellow(statistics.timedOut.toString()));
  console.log(chalk.gray('   ├─ Errors             : ') + chalk.red(statistics.errored.toString()));
  console.log(
    chalk.gray('   ├─ Duration           : ') + chalk.white(`${(report.durationMs / 1000).toFixed(2)}s`)
  );
  if (report.interrupted) {
    console.log(chalk.gray('   ├─ ') + chalk.yellow('Interrupted; results cover the candidates checked so far'));
  }
  if (report.deadlineReached) {
    console.log(chalk.gray('   ├─ ') + chalk.yellow('Scan deadline reached; remaining candidates skipped'));
  }

  if (report.outputError) {
    console.log(chalk.gray('   └─ Export             : ') + chalk.red(report.outputError.message));
  } else if (config.output) {
    console.log(chalk.gray('   └─ Exported to        : ') + chalk.blue.underline(config.output));
  } else {
    console.log(chalk.gray('   └─ Export             : ') + chalk.dim('Disabled'));
  }
  console.log();
}
