import WebSocket from 'ws';
import { METADATA_TIMINGS } from '@/config/timings';
import type { MetadataConnection, MetadataConnector } from '@/ports/MetadataConnectionPort';
import { bestEffortSync } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

const log = createLogger('Metadata', 'Socket');

export interface WsConnectorOptions {
  pingIntervalMs?: number;
  connectTimeoutMs?: number;
}

/**
 * Buffers text frames of an open socket and hands them out one at a time.
 * A pong missing for two ping intervals terminates the socket.
 */
class WsMetadataConnection implements MetadataConnection {
  private readonly frames: string[] = [];
  private readonly waiters = new Set<() => void>();
  private closed = false;
  private lastPong = Date.now();
  private readonly heartbeatTimer: NodeJS.Timeout;

  constructor(
    private readonly ws: WebSocket,
    private readonly url: string,
    pingIntervalMs: number,
  ) {
    ws.on('message', (data, isBinary) => {
      if (isBinary) return;
      this.frames.push(data.toString());
      this.wake();
    });
    ws.on('pong', () => {
      this.lastPong = Date.now();
    });
    ws.on('close', () => this.markClosed());
    ws.on('error', (error) => {
      log.debug('socket error', { url, message: error.message });
      this.markClosed();
    });
    this.heartbeatTimer = setInterval(() => {
      if (this.closed) return;
      if (Date.now() - this.lastPong > pingIntervalMs * 2) {
        log.warn('heartbeat lost, dropping connection', { url });
        this.close();
        return;
      }
      bestEffortSync(() => ws.ping(), { fallback: undefined, onError: 'debug', log, label: 'ping failed' });
    }, pingIntervalMs);
  }

  public send(message: string): void {
    this.ws.send(message);
  }

  public next(signal: AbortSignal): Promise<string | null> {
    const frame = this.frames.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (this.closed || signal.aborted) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      const onAbort = (): void => {
        this.waiters.delete(onWake);
        resolve(null);
      };
      const onWake = (): void => {
        signal.removeEventListener('abort', onAbort);
        resolve(this.frames.shift() ?? null);
      };
      this.waiters.add(onWake);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  public close(): void {
    bestEffortSync(() => this.ws.terminate(), { fallback: undefined, onError: 'debug', log });
    this.markClosed();
  }

  private markClosed(): void {
    if (this.closed) return;
    this.closed = true;
    clearInterval(this.heartbeatTimer);
    log.debug('socket closed', { url: this.url });
    this.wake();
  }

  private wake(): void {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const waiter of waiters) {
      waiter();
    }
  }
}

/**
 * Connector backed by the `ws` client.
 */
export function createWsMetadataConnector(options: WsConnectorOptions = {}): MetadataConnector {
  const pingIntervalMs = options.pingIntervalMs ?? METADATA_TIMINGS.pingIntervalMs;
  const connectTimeoutMs = options.connectTimeoutMs ?? METADATA_TIMINGS.connectTimeoutMs;

  return (url, signal) =>
    new Promise<MetadataConnection>((resolve, reject) => {
      if (signal.aborted) {
        reject(new Error('connection aborted'));
        return;
      }
      const ws = new WebSocket(url, { handshakeTimeout: connectTimeoutMs });
      const onAbort = (): void => {
        ws.terminate();
        reject(new Error('connection aborted'));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      ws.once('open', () => {
        signal.removeEventListener('abort', onAbort);
        resolve(new WsMetadataConnection(ws, url, pingIntervalMs));
      });
      ws.once('error', (error) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      });
      ws.once('close', (code) => {
        signal.removeEventListener('abort', onAbort);
        reject(new Error(`socket closed before open (code ${code})`));
      });
    });
}
