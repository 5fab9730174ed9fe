export { ScanOrchestrator, selectTimeout, LAN_TIMEOUT_MS, WAN_TIMEOUT_MS, PASS_DELAY_MS } from './scanner-orchestrator.js';
export type { ScanOrchestratorDeps } from './scanner-orchestrator.js';
export { TcpScanner, checkPort } from './scanner/tcp-scanner.js';
export { ScanCounters } from './scanner/counters.js';
export { DnsCache } from './scanner/dns-cache.js';
export { StatsReporter } from './scanner/stats-reporter.js';
export { createScanPlan, type ScanPlan } from './scanner/scan-plan.js';
export { enumerateHosts, parseExcludedNetwork, isExcludedHost } from './scanner/host-enumerator.js';
export { parsePortSpec, resolvePortSpec, buildExcludedPorts } from './scanner/port-spec.js';
export { getDefaultPorts } from './scanner/port-profiles.js';
export { TcpListener } from './listener/tcp-listener.js';
export { ResultWriter } from './output/result-writer.js';
export { formatSummary } from './output/summary.js';
export { loadConfig, ScanOptionsSchema, type ScanConfig } from './schemas/config.js';
export {
  ScanError,
  InvalidSpecError,
  InvalidTargetError,
  UnresolvableHostError,
  ConfigError,
} from './utils/errors.js';
export type * from './types/index.js';
