import winston from 'winston';
import { resultFields } from '../output/result-writer.js';
import type { PortConnector, ResultLine, ResultSink } from '../types/scanner.js';

export class MemorySink implements ResultSink {
  readonly lines: string[] = [];

  emit(line: ResultLine): void {
    this.lines.push(resultFields(line).join('\t'));
  }
}

export function silentLogger(): winston.Logger {
  return winston.createLogger({ silent: true, transports: [new winston.transports.Console()] });
}

/**
 * Connector that treats the given ports as open on every host and records
 * each attempt and the peak number of attempts in flight.
 */
export function fakeConnector(openPorts: Iterable<number>, latencyMs = 1): {
  connector: PortConnector;
  attempts: Array<{ host: string; port: number }>;
  maxInFlight: () => number;
} {
  const open = new Set(openPorts);
  const attempts: Array<{ host: string; port: number }> = [];
  let inFlight = 0;
  let peak = 0;

  const connector: PortConnector = async (host, port) => {
    attempts.push({ host, port });
    inFlight++;
    peak = Math.max(peak, inFlight);
    await new Promise((resolve) => setTimeout(resolve, latencyMs));
    inFlight--;
    return open.has(port);
  };

  return { connector, attempts, maxInFlight: () => peak };
}
