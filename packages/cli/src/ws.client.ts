import { EventEmitter } from 'node:events';
import { WebSocket } from 'ws';
import type {
  ClientMessage,
  CoordinatorState,
  ServerMessage,
  Status,
} from '@auditray/shared';

// ---------------------------------------------------------------------------
// StatusSource: what the display depends on
// ---------------------------------------------------------------------------

/** Anything that delivers statuses to the display and accepts check requests. */
export interface StatusSource extends EventEmitter {
  on(event: 'status', listener: (status: Status) => void): this;
  on(event: 'coordinator:state', listener: (state: CoordinatorState) => void): this;
  on(event: 'server:error', listener: (message: string) => void): this;
  on(event: 'ws:error', listener: (err: Error) => void): this;

  off(event: 'status', listener: (status: Status) => void): this;
  off(event: 'coordinator:state', listener: (state: CoordinatorState) => void): this;
  off(event: 'server:error', listener: (message: string) => void): this;
  off(event: 'ws:error', listener: (err: Error) => void): this;

  /** Ask the daemon for a check. */
  checkNow(): void;
}

// ---------------------------------------------------------------------------
// AuditrayWsClient
// ---------------------------------------------------------------------------

/**
 * WebSocket client for the daemon's StatusServer.
 *
 * Translates ServerMessages into EventEmitter events. Statuses are emitted in
 * the order the server sent them.
 *
 * Usage:
 *   const client = new AuditrayWsClient('ws://127.0.0.1:7433');
 *   await client.connect();
 *   client.on('status', render);
 */
export class AuditrayWsClient extends EventEmitter implements StatusSource {
  private ws: WebSocket | null = null;

  // Reconnection state
  private reconnectAttempt = 0;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectBaseMs: number;
  private isReconnecting = false;
  private closed = false;

  constructor(
    private readonly url: string,
    options: { maxReconnectAttempts?: number; reconnectBaseMs?: number } = {},
  ) {
    super();
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 4;
    this.reconnectBaseMs = options.reconnectBaseMs ?? 2000;
  }

  // ---------------------------------------------------------------------------
  // Connection
  // ---------------------------------------------------------------------------

  /** Open the WebSocket connection. Resolves when the connection is established. */
  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.on('message', (raw) => {
        let msg: ServerMessage;
        try {
          msg = JSON.parse(raw.toString()) as ServerMessage;
        } catch {
          this.emit('ws:error', new Error('Received malformed message from daemon'));
          return;
        }
        this.handleServerMessage(msg);
      });

      ws.once('open', () => {
        this.reconnectAttempt = 0;
        this.isReconnecting = false;
        ws.off('error', reject);

        ws.on('error', (err) => {
          this.emit('ws:error', err);
        });

        ws.on('close', (code) => {
          // Only reconnect on abnormal closure (not intentional close with code 1000)
          if (code !== 1000 && !this.closed) {
            this.scheduleReconnect();
          }
        });

        resolve();
      });

      ws.once('error', reject);
    });
  }

  /** Close the WebSocket connection for good. */
  close(): void {
    this.closed = true;
    this.ws?.close(1000);
  }

  checkNow(): void {
    this.send({ type: 'CHECK_NOW', payload: {} });
  }

  // ---------------------------------------------------------------------------
  // Reconnection
  // ---------------------------------------------------------------------------

  /** Schedule a reconnect attempt with exponential backoff (2s, 4s, 8s, 16s). */
  private scheduleReconnect(): void {
    if (this.isReconnecting) return;
    if (this.reconnectAttempt >= this.maxReconnectAttempts) {
      this.emit('ws:error', new Error('Daemon disconnected; max reconnect attempts reached'));
      return;
    }
    this.isReconnecting = true;
    this.reconnectAttempt++;
    const delayMs = this.reconnectBaseMs * Math.pow(2, this.reconnectAttempt - 1);
    this.emit(
      'ws:error',
      new Error(
        `Daemon disconnected. Reconnecting in ${delayMs / 1000}s ` +
          `(attempt ${this.reconnectAttempt}/${this.maxReconnectAttempts})...`,
      ),
    );
    setTimeout(() => {
      if (this.closed) return;
      this.connect()
        .then(() => {
          this.isReconnecting = false;
        })
        .catch(() => {
          this.isReconnecting = false;
          this.scheduleReconnect();
        });
    }, delayMs);
  }

  // ---------------------------------------------------------------------------
  // Messages
  // ---------------------------------------------------------------------------

  private send(msg: ClientMessage): void {
    if (this.ws?.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(msg));
    } else {
      this.emit('ws:error', new Error('Not connected to the daemon'));
    }
  }

  private handleServerMessage(msg: ServerMessage): void {
    switch (msg.type) {
      case 'STATUS':
        this.emit('status', msg.payload);
        break;
      case 'COORDINATOR_STATE':
        this.emit('coordinator:state', msg.payload.state);
        break;
      case 'ERROR':
        this.emit('server:error', msg.payload.message);
        break;
    }
  }
}
