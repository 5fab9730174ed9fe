import fs from 'fs';
import net from 'net';
import type { Logger } from 'winston';
import { DnsCache } from '../scanner/dns-cache.js';
import { formatTimestamp } from '../utils/time.js';
import type { ConnectionRecord, TcpListenerOptions } from '../types/listener.js';

const CSV_HEADER = 'Timestamp,Local,Remote';
const DNS_TIMEOUT_MS = 2000;

export interface TcpListenerDeps {
  logger: Logger;
  dnsCache?: DnsCache | undefined;
  print?: ((line: string) => void) | undefined;
  now?: (() => Date) | undefined;
}

function formatEndpoint(address: string | undefined, port: number | undefined): string {
  // IPv4 clients reach a dual-stack socket as ::ffff:a.b.c.d
  const host = (address ?? 'unknown').replace(/^::ffff:/, '');
  return `${host}:${port ?? 0}`;
}

/**
 * Passive mode: accepts connections on each requested port, records where they
 * came from and closes them straight away.
 */
export class TcpListener {
  private readonly host: string;
  private readonly resolveDns: boolean;
  private readonly outputFile: string | undefined;
  private readonly logger: Logger;
  private readonly dnsCache: DnsCache;
  private readonly print: (line: string) => void;
  private readonly now: () => Date;
  private readonly servers: net.Server[] = [];
  private fd: number | null = null;

  constructor(options: TcpListenerOptions, deps: TcpListenerDeps) {
    this.host = options.host ?? '0.0.0.0';
    this.resolveDns = options.resolveDns ?? false;
    this.outputFile = options.outputFile;
    this.logger = deps.logger;
    this.dnsCache = deps.dnsCache ?? new DnsCache({ timeout: DNS_TIMEOUT_MS });
    this.print = deps.print ?? ((line) => console.log(line));
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Bind every port, then resolve once the signal aborts and all servers closed.
   */
  async listen(ports: readonly number[], signal: AbortSignal): Promise<void> {
    this.openLog();

    try {
      for (const port of ports) {
        const server = await this.bind(port);
        this.servers.push(server);
        const address = server.address();
        const boundPort = address !== null && typeof address === 'object' ? address.port : port;
        this.print(`Listening for incoming TCP connections on ${this.host}:${boundPort}`);
      }

      if (!signal.aborted) {
        await new Promise<void>((resolve) => {
          signal.addEventListener('abort', () => resolve(), { once: true });
        });
      }
    } finally {
      await this.close();
    }
  }

  /**
   * Addresses actually bound, useful when listening on port 0
   */
  boundPorts(): number[] {
    return this.servers.flatMap((server) => {
      const address = server.address();
      return address !== null && typeof address === 'object' ? [address.port] : [];
    });
  }

  private bind(port: number): Promise<net.Server> {
    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        this.handleConnection(socket).catch((error: unknown) => {
          const errorMessage = error instanceof Error ? error.message : 'Unknown error';
          this.logger.error('Failed to record connection', { error: errorMessage });
        });
      });

      server.once('error', reject);
      server.listen(port, this.host, () => {
        server.off('error', reject);
        server.on('error', (error) => {
          this.logger.error(`Listener on port ${port} failed`, { error: error.message });
        });
        resolve(server);
      });
    });
  }

  private async handleConnection(socket: net.Socket): Promise<void> {
    const timestamp = formatTimestamp(this.now());
    const local = formatEndpoint(socket.localAddress, socket.localPort);
    const remoteAddress = (socket.remoteAddress ?? 'unknown').replace(/^::ffff:/, '');
    const remotePort = socket.remotePort;
    socket.on('error', () => socket.destroy());

    let remoteName = remoteAddress;
    if (this.resolveDns) {
      const name = await this.dnsCache.reverse(remoteAddress);
      if (name !== '') remoteName = name;
    }

    const record: ConnectionRecord = {
      timestamp,
      local,
      remote: formatEndpoint(remoteName, remotePort),
    };

    this.print(`[${record.timestamp}] Incoming connection on ${record.local} from ${record.remote}`);
    if (this.fd !== null) {
      fs.writeSync(this.fd, `${record.timestamp},${record.local},${record.remote}\n`);
    }
    socket.end();
  }

  private openLog(): void {
    if (!this.outputFile || this.fd !== null) return;
    const isNew = !fs.existsSync(this.outputFile);
    this.fd = fs.openSync(this.outputFile, 'a');
    if (isNew) {
      fs.writeSync(this.fd, `${CSV_HEADER}\n`);
    }
  }

  private async close(): Promise<void> {
    const servers = this.servers.splice(0);
    await Promise.all(
      servers.map(
        (server) =>
          new Promise<void>((resolve) => {
            server.close(() => resolve());
          })
      )
    );
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }
}
