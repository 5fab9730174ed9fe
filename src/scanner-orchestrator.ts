import type { Logger } from 'winston';
import { ScanCounters } from './scanner/counters.js';
import { DnsCache } from './scanner/dns-cache.js';
import { isExcludedHost } from './scanner/host-enumerator.js';
import { StatsReporter } from './scanner/stats-reporter.js';
import { TcpScanner } from './scanner/tcp-scanner.js';
import { ResultWriter } from './output/result-writer.js';
import { formatSummary } from './output/summary.js';
import { createDiagnosticLogger, createLogger, type DiagnosticLogger } from './utils/logger.js';
import { abortableDelay } from './utils/delay.js';
import { isPrivateIpv4 } from './utils/ip-utils.js';
import type { ScanConfig } from './schemas/config.js';
import type { ScanPlan } from './scanner/scan-plan.js';
import type {
  PortConnector,
  ResultSink,
  RunReport,
  ScanResult,
  TerminationReason,
} from './types/scanner.js';

export const LAN_TIMEOUT_MS = 70;
export const WAN_TIMEOUT_MS = 180;
export const PASS_DELAY_MS = 700;

const BELL = '\x07';

export interface ScanOrchestratorDeps {
  connector?: PortConnector | undefined;
  sink?: ResultSink | undefined;
  createDnsCache?: ((timeoutMs: number) => DnsCache) | undefined;
  logger?: Logger | undefined;
  diagnostics?: DiagnosticLogger | undefined;
  print?: ((line: string) => void) | undefined;
  passDelayMs?: number | undefined;
}

export function selectTimeout(host: string, configured?: number): number {
  if (configured !== undefined) return configured;
  return isPrivateIpv4(host) ? LAN_TIMEOUT_MS : WAN_TIMEOUT_MS;
}

function hasValue(result: ScanResult, value: boolean): boolean {
  for (const open of result.values()) {
    if (open === value) return true;
  }
  return false;
}

/**
 * Drives repeated passes of host scans over the host sequence according to the
 * configured loop policy, then stops the stats reporter and prints the summary.
 */
export class ScanOrchestrator {
  private readonly config: ScanConfig;
  private readonly counters: ScanCounters;
  private readonly sink: ResultSink;
  private readonly ownedWriter: ResultWriter | null;
  private readonly createDnsCache: (timeoutMs: number) => DnsCache;
  private readonly connector: PortConnector | undefined;
  private readonly logger: Logger;
  private readonly diagnostics: DiagnosticLogger;
  private readonly print: (line: string) => void;
  private readonly passDelayMs: number;
  private scanner: TcpScanner | null;
  private isRunning: boolean;

  constructor(config: ScanConfig, deps: ScanOrchestratorDeps = {}) {
    this.config = config;
    this.counters = new ScanCounters();
    if (deps.sink) {
      this.sink = deps.sink;
      this.ownedWriter = null;
    } else {
      const writer = new ResultWriter({ outputFile: config.outputFile });
      this.sink = writer;
      this.ownedWriter = writer;
    }
    this.createDnsCache = deps.createDnsCache ?? ((timeout) => new DnsCache({ timeout }));
    this.connector = deps.connector;
    this.logger = deps.logger ?? createLogger({ name: 'scanner', level: config.logLevel });
    this.diagnostics = deps.diagnostics ?? createDiagnosticLogger();
    this.print = deps.print ?? ((line) => console.log(line));
    this.passDelayMs = deps.passDelayMs ?? PASS_DELAY_MS;
    this.scanner = null;
    this.isRunning = false;
  }

  async run(plan: ScanPlan, signal?: AbortSignal): Promise<RunReport> {
    if (this.isRunning) {
      throw new Error('Scan is already running');
    }
    this.isRunning = true;

    const { loop } = this.config;
    const maxPasses = loop.kind === 'count' ? loop.passes : Number.POSITIVE_INFINITY;
    const repeating = loop.kind !== 'count' || loop.passes > 1;

    this.logger.info(`Scanning ${plan.hosts.length} host(s), ${plan.ports.length} port(s), policy: ${loop.kind}`);

    const reporter = this.config.runtimeStatsSeconds !== undefined
      ? new StatsReporter(this.counters, this.diagnostics, { intervalSeconds: this.config.runtimeStatsSeconds })
      : null;
    reporter?.start(signal);

    const startTime = Date.now();
    let passes = 0;
    let reason: TerminationReason = 'completed';

    try {
      while (passes < maxPasses) {
        if (signal?.aborted) {
          reason = 'interrupted';
          break;
        }

        const last = await this.runPass(plan, signal);
        if (signal?.aborted) {
          reason = 'interrupted';
          break;
        }

        passes++;
        if (repeating) {
          this.diagnostics.info(`completed loops:${passes}`);
        }

        if (loop.kind === 'until-open' || loop.kind === 'until-closed') {
          if (last === null) {
            this.logger.warn('Every host was excluded; nothing left to repeat');
            break;
          }
          if (loop.kind === 'until-open' && !hasValue(last, false)) {
            reason = 'all-open';
            this.print(BELL);
            break;
          }
          if (loop.kind === 'until-closed' && !hasValue(last, true)) {
            reason = 'all-closed';
            this.print(BELL);
            break;
          }
        }

        if (passes < maxPasses) {
          await abortableDelay(this.passDelayMs, signal);
        }
      }
    } finally {
      reporter?.stop();
      this.ownedWriter?.close();
      this.isRunning = false;
    }

    reporter?.flush();

    const report: RunReport = {
      reason,
      passes,
      elapsedMs: Date.now() - startTime,
      counters: this.counters.snapshot(),
    };

    this.logger.info(`Scan finished (${reason}) after ${passes} pass(es)`);
    for (const line of formatSummary(report, this.config.verbose)) {
      this.print(line);
    }

    return report;
  }

  /**
   * One pass over every host. Returns the result of the last host scanned, or
   * null when no host was scanned.
   */
  private async runPass(plan: ScanPlan, signal?: AbortSignal): Promise<ScanResult | null> {
    let last: ScanResult | null = null;

    for (const host of plan.hosts) {
      if (signal?.aborted) break;

      if (isExcludedHost(host, plan.excludedNetwork)) {
        this.counters.hostSkipped();
        if (this.config.verbose) {
          this.sink.emit({ host, port: 'n/a', status: 'host-excluded' });
        }
        continue;
      }

      this.logger.debug(`Scanning ${host}`);
      last = await this.scannerFor(host, plan).scanHost(host, plan.ports, signal);
    }

    return last;
  }

  // The connect timeout, which also bounds reverse lookups, is fixed by the first host actually scanned
  private scannerFor(host: string, plan: ScanPlan): TcpScanner {
    if (!this.scanner) {
      const timeout = selectTimeout(host, this.config.timeoutMs);
      this.logger.debug(`Connect timeout: ${timeout}ms`);
      this.scanner = new TcpScanner(
        {
          timeout,
          concurrency: this.config.workers,
          excludedPorts: plan.excludedPorts,
          shufflePorts: this.config.shufflePorts,
          showClosed: this.config.showClosed,
          verbose: this.config.verbose,
          resolveDns: this.config.resolveDns,
          connector: this.connector,
        },
        this.counters,
        this.sink,
        this.createDnsCache(timeout)
      );
    }
    return this.scanner;
  }
}
