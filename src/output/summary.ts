import type { RunReport } from '../types/scanner.js';

export function formatDuration(ms: number): string {
  const totalSeconds = ms / 1000;
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = (totalSeconds % 60).toFixed(3).padStart(6, '0');
  return `${hours}:${String(minutes).padStart(2, '0')}:${seconds}`;
}

/**
 * Lines of the end-of-run summary. The full block is printed when verbose;
 * otherwise a short block appears only when nothing was found open.
 */
export function formatSummary(report: RunReport, verbose: boolean): string[] {
  const { counters } = report;

  if (verbose) {
    return [
      '',
      `Scan Time      :  ${formatDuration(report.elapsedMs)}`,
      `Active Hosts   :  ${counters.activeHosts}`,
      `Hosts Scanned  :  ${counters.hostsScanned}`,
      `Skipped Hosts  :  ${counters.hostsSkipped}`,
      `Opened Ports   :  ${counters.portsOpened}`,
      `Skipped Ports  :  ${counters.portsSkipped}`,
      `Ports Scanned  :  ${counters.portsScanned}`,
      `Completed Loops:  ${report.passes}`,
      '',
    ];
  }

  if (counters.portsOpened === 0) {
    return [
      '',
      `Opened Ports :  ${counters.portsOpened}`,
      `Hosts Scanned:  ${counters.hostsScanned}`,
      `Ports Scanned:  ${counters.portsScanned}`,
      '',
    ];
  }

  return [];
}
