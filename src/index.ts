/**
 * subprobe - wordlist subdomain enumerator with active DNS/HTTP verification
 * Main entry point for programmatic usage
 */

import { App, type AppDependencies } from './core/app.js';
import { resolveScanConfig } from './core/config.js';
import type { ScanOptions, ScanReport } from './core/types.js';

export { App } from './core/app.js';
export type { AppDependencies } from './core/app.js';
export { ScanScheduler } from './core/scheduler.js';
export { ResultAggregator } from './core/aggregator.js';
export { DnsProbe, systemResolverFactory } from './core/dns-probe.js';
export { HttpProbe } from './core/http-probe.js';
export { generateCandidates, loadWordlist, loadDefaultWordlist } from './core/generator.js';
export { formatResults, formatText, formatJSON, formatCSV, inferFormat } from './core/formatter.js';
export { resolveScanConfig, DEFAULTS } from './core/config.js';
export * from './core/errors.js';
export * from './core/types.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Scan a domain and return its verified subdomains
 * @example
 * ```typescript
 * import { scan } from 'subprobe';
 *
 * const report = await scan('example.com', {
 *   concurrency: 20,
 *   timeout: 3,
 *   methods: ['dns'],
 *   quiet: true,
 * });
 * console.log(report.resultSet.statistics);
 * ```
 */
export async function scan(
  domain: string,
  options: ScanOptions = {},
  deps: AppDependencies = {}
): Promise<ScanReport> {
  const config = resolveScanConfig(domain, options);
  return await new App(config, deps).run();
}
