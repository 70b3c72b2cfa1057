/**
 * Main application orchestrator
 */
import { writeFile } from 'fs/promises';
import chalk from 'chalk';
import { ResultAggregator } from './aggregator.js';
import { DnsProbe, systemResolverFactory } from './dns-probe.js';
import { HttpProbe } from './http-probe.js';
import { ScanScheduler } from './scheduler.js';
import { generateCandidates, loadDefaultWordlist, loadWordlist } from './generator.js';
import { formatResults } from './formatter.js';
import { toError } from './errors.js';
import { logger } from '../utils/logger.js';
import type { DnsProber, HttpProber, ScanConfig, ScanHooks, ScanReport, ScanResult } from './types.js';

/**
 * Probe overrides, mainly for tests and embedding
 */
export interface AppDependencies {
  dns?: DnsProber;
  http?: HttpProber;
}

/**
 * Runs a single scan: wordlist → scheduler → aggregator → formatter
 */
export class App {
  private config: ScanConfig;
  private dns: DnsProber;
  private http?: HttpProber;
  private ownedHttp?: HttpProbe;

  constructor(config: ScanConfig, deps: AppDependencies = {}) {
    this.config = config;
    this.dns = deps.dns ?? new DnsProbe(systemResolverFactory(config.resolvers));

    if (deps.http) {
      this.http = deps.http;
    } else if (config.methods.includes('http')) {
      this.ownedHttp = new HttpProbe({ insecure: config.insecure, connectTimeout: config.timeoutMs });
      this.http = this.ownedHttp;
    }

    // Configure logger
    logger.setQuiet(config.quiet);
    logger.setLevel(config.verbose ? 'debug' : 'info');
  }

  /**
   * Run the complete scan workflow
   */
  async run(): Promise<ScanReport> {
    const startedAt = new Date();
    const { domain } = this.config;

    try {
      const words = await this.loadWords();

      logger.info(chalk.cyan.bold('Step 1/2') + chalk.cyan(`  Probing candidates for ${domain}...`));
      const scheduler = new ScanScheduler(
        { dns: this.dns, http: this.http },
        new ResultAggregator(),
        {
          concurrency: this.config.concurrency,
          timeout: this.config.timeoutMs,
          methods: this.config.methods,
          schemes: this.config.schemes,
          retries: this.config.retries,
          scanTimeout: this.config.scanTimeoutMs,
          hooks: this.hooks(),
          signal: this.config.signal,
        }
      );

      const run = await scheduler.run(generateCandidates(domain, words));

      const finishedAt = new Date();
      const { statistics } = run.resultSet;
      logger.info(
        `Checked ${statistics.attempted} candidates: ${statistics.resolved} live, ` +
          `${statistics.unreachable} unreachable, ${statistics.timedOut} timed out, ${statistics.errored} errored`
      );

      const report: ScanReport = {
        domain,
        methods: this.config.methods,
        resultSet: run.resultSet,
        startedAt,
        finishedAt,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        deadlineReached: run.deadlineReached,
        interrupted: run.interrupted,
      };

      logger.info(chalk.cyan.bold('Step 2/2') + chalk.cyan('  Writing results...'));
      try {
        await this.outputResults(report);
      } catch (error) {
        report.outputError = toError(error);
        logger.error(`Could not write results to ${this.config.output ?? 'stdout'}:`, report.outputError);
      }

      return report;
    } catch (error) {
      logger.error('Scan failed:', toError(error));
      throw error;
    } finally {
      await this.ownedHttp?.close();
    }
  }

  private async loadWords(): Promise<Iterable<string>> {
    if (this.config.words) {
      return this.config.words;
    }
    if (this.config.wordlist) {
      return loadWordlist(this.config.wordlist);
    }
    return loadDefaultWordlist();
  }

  /**
   * Logging hooks wrapped around the caller's own
   */
  private hooks(): ScanHooks {
    const user = this.config.hooks;
    return {
      onCandidateState: user.onCandidateState,
      onResult: (result: ScanResult) => {
        const addresses = result.addresses.length > 0 ? ` [${result.addresses.join(', ')}]` : '';
        logger.success(`Found: ${result.name}${addresses}`);
        user.onResult?.(result);
      },
      onProgress: (checked: number) => {
        logger.progress('Candidates checked', checked);
        user.onProgress?.(checked);
      },
    };
  }

  /**
   * Print results and, when requested, write them to the output file.
   * Quiet mode only skips stdout when a file receives the results.
   */
  private async outputResults(report: ScanReport): Promise<void> {
    const output = formatResults(report.resultSet, this.config.format);

    if (output && (!this.config.quiet || !this.config.output)) {
      console.log(output);
    }

    if (this.config.output) {
      await writeFile(this.config.output, `${output}\n`, 'utf-8');
      logger.info(`Results exported to: ${this.config.output}`);
    }
  }
}
