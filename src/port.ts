import { createServer } from 'node:net';
import { PortExhaustedError, PgFixtureError } from './errors.js';

const MAX_PORT = 65535;
const FIRST_UNPRIVILEGED_PORT = 1024;

/**
 * Asks the OS for a free port by binding to port 0.
 *
 * Racy: nothing stops another process from taking the port between this call
 * and the server binding it. Postgres cannot listen on port 0 itself, so this
 * is the only option.
 */
export async function findFreePort(host = '127.0.0.1'): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.unref();
    server.on('error', reject);
    server.listen(0, host, () => {
      const addr = server.address();
      if (addr && typeof addr === 'object') {
        const port = addr.port;
        server.close(() => resolve(port));
      } else {
        server.close(() => reject(new PgFixtureError('Failed to get port')));
      }
    });
  });
}

/**
 * Process-local bookkeeping of ports handed to instances.
 *
 * Claims are in-memory only; they keep two instances of this process apart but
 * reserve nothing at the OS level.
 */
export class PortAllocator {
  private readonly claimed = new Set<number>();

  constructor(private readonly lookup: () => Promise<number> = () => findFreePort()) {}

  async allocate(requested?: number, reuseAllowed = false): Promise<number> {
    if (requested !== undefined && reuseAllowed) {
      return requested;
    }
    const start = requested ?? (await this.lookup());
    return this.claim(start);
  }

  /**
   * Claims `start`, or the next unclaimed port after it. Past 65535 the scan
   * wraps to 1024, or to 1 when `start` itself is privileged; 0 is never used.
   */
  claim(start: number): number {
    const floor = start < FIRST_UNPRIVILEGED_PORT ? 1 : FIRST_UNPRIVILEGED_PORT;
    const slots = MAX_PORT - floor + 1;

    let port = start;
    for (let scanned = 0; scanned < slots; scanned++) {
      if (!this.claimed.has(port)) {
        this.claimed.add(port);
        return port;
      }
      port = port >= MAX_PORT ? floor : port + 1;
    }
    throw new PortExhaustedError(start);
  }

  release(port: number): void {
    this.claimed.delete(port);
  }

  isClaimed(port: number): boolean {
    return this.claimed.has(port);
  }

  get claimedPorts(): number[] {
    return [...this.claimed].sort((a, b) => a - b);
  }
}
