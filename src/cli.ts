#!/usr/bin/env node
import fs from 'fs';
import { pathToFileURL } from 'url';
import { Command } from 'commander';
import { TcpListener } from './listener/tcp-listener.js';
import { ScanOrchestrator } from './scanner-orchestrator.js';
import { createScanPlan } from './scanner/scan-plan.js';
import { resolvePortSpec } from './scanner/port-spec.js';
import { getDefaultPorts } from './scanner/port-profiles.js';
import { loadConfig, type RawScanOptions, type ScanConfig } from './schemas/config.js';
import { createLogger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  return new Command()
    .name('tcpsweep')
    .description('Concurrent IPv4 TCP connect scanner')
    .version(VERSION)
    .argument('[target]', 'e.g. 192.168.1.0/24, 192.168.1.100 or www.example.com', '127.0.0.1')
    .option('-x, --skip-network <cidr>', 'skip a sub-network, e.g. 192.168.1.96/28')
    .option('-X, --skip-ports <ports>', 'exclude a subset of ports, e.g. 135-139')
    .option(
      '-p, --ports <ports>',
      `comma list, hyphen range or "all", e.g. 22,80,443 or 80-515 (default: ${getDefaultPorts().length} common ports)`
    )
    .option('-T, --threads <count>', 'number of concurrent connection attempts', '100')
    .option('-t, --timeout <seconds>', 'seconds to wait for a connect (default: 0.07 on LAN, 0.18 on WAN)')
    .option('-s, --shuffle-hosts', 'randomize the order hosts are scanned')
    .option('-S, --shuffle-ports', 'randomize the order ports are scanned')
    .option('-c, --closed', 'output ports that are closed')
    .option('-o, --output <file>', 'also write results to a CSV file')
    .option('-d, --dns', 'resolve IPs to host names')
    .option('-v, --verbose', 'output statistics and excluded hosts/ports')
    .option('-r, --runtime <seconds>', 'display runtime stats every N seconds on stderr')
    .option('-l, --loop <count>', 'repeat the scan N times, 0 for continuous')
    .option('--loop-open', 'repeat the scan until all ports are open')
    .option('--loop-closed', 'repeat the scan until all ports are closed')
    .option('-L, --listen', 'listen on the given ports for incoming connections instead of scanning')
    .option('--log-level <level>', 'error, warn, info or debug', 'warn');
}

export function parseOptions(argv: readonly string[], from: 'node' | 'user' = 'node'): RawScanOptions {
  const program = createProgram();
  program.parse([...argv], { from });
  const target: unknown = program.processedArgs[0];
  return { ...program.opts(), target };
}

async function runListener(config: ScanConfig, signal: AbortSignal): Promise<void> {
  const logger = createLogger({ name: 'listener', level: config.logLevel });
  const listener = new TcpListener(
    { resolveDns: config.resolveDns, outputFile: config.outputFile },
    { logger }
  );
  const ports = resolvePortSpec(config.ports ?? '');
  console.log('\nPress Ctrl-C to exit.\n');
  await listener.listen(ports, signal);
}

/**
 * The first signal aborts the run so it can finish up; a second one exits
 * straight away with status 130.
 */
export function createSignalHandler(
  controller: AbortController,
  exit: (code: number) => void = (code) => process.exit(code)
): () => void {
  return () => {
    if (controller.signal.aborted) {
      console.error('\nForced exit');
      exit(130);
      return;
    }
    console.error('\nInterrupted, finishing up... (press Ctrl-C again to exit now)');
    controller.abort();
  };
}

/**
 * Run the command line and resolve the process exit status
 */
export async function main(argv: readonly string[] = process.argv): Promise<number> {
  const controller = new AbortController();
  const onSignal = createSignalHandler(controller);

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const config = loadConfig(parseOptions(argv));

    if (config.listen) {
      await runListener(config, controller.signal);
      return 0;
    }

    const plan = await createScanPlan(config);
    const orchestrator = new ScanOrchestrator(config);
    await orchestrator.run(plan, controller.signal);
    return 0;
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    }
  );
}
