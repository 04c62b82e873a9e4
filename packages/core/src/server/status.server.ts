import { WebSocketServer, WebSocket } from 'ws';
import type {
  ClientMessage,
  CoordinatorState,
  ServerMessage,
  Status,
} from '@auditray/shared';
import type { TriggerChannel } from '../channels/trigger.channel.js';
import type { ResultChannel } from '../channels/result.channel.js';
import type { UpdateCoordinator } from '../coordinator/update.coordinator.js';
import { FatalError, errorMessage } from '../errors.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('server');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StatusServerOptions {
  triggers: TriggerChannel;
  results: ResultChannel;
  coordinator: UpdateCoordinator;
  /** WebSocket port on 127.0.0.1. 0 picks a free one. Defaults to 7433. */
  port?: number;
}

// ---------------------------------------------------------------------------
// StatusServer
// ---------------------------------------------------------------------------

/**
 * Serves the update pipeline to displays over localhost WebSockets.
 *
 * The server is the single consumer of the result channel: every Status the
 * coordinator publishes is broadcast to all connected displays, in order.
 * Displays ask for a check with CHECK_NOW, which becomes a `user_click`
 * trigger. A display that connects late is sent the latest Status and
 * coordinator state straight away.
 *
 * Lifecycle:
 *   new StatusServer(options) → await server.start() → await server.close()
 */
export class StatusServer {
  private readonly triggers: TriggerChannel;
  private readonly results: ResultChannel;
  private readonly coordinator: UpdateCoordinator;
  private readonly requestedPort: number;
  private wss: WebSocketServer | null = null;

  private latestStatus: Status | null = null;

  private readonly onState = (state: CoordinatorState) => {
    this.broadcast({ type: 'COORDINATOR_STATE', payload: { state } });
  };

  constructor(options: StatusServerOptions) {
    this.triggers = options.triggers;
    this.results = options.results;
    this.coordinator = options.coordinator;
    this.requestedPort = options.port ?? 7433;
  }

  /** The port actually bound. Only valid after start(). */
  get port(): number {
    const address = this.wss?.address();
    if (!address || typeof address === 'string') {
      throw new Error('StatusServer is not listening');
    }
    return address.port;
  }

  /** The last Status delivered through the result channel, if any. */
  get status(): Status | null {
    return this.latestStatus;
  }

  /**
   * Bind the port, then start consuming results and coordinator events.
   * Rejects with FatalError when the port cannot be bound.
   */
  async start(): Promise<void> {
    if (this.wss) return;

    const wss = new WebSocketServer({ host: '127.0.0.1', port: this.requestedPort });
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        wss.off('listening', onListening);
        reject(
          new FatalError(`Cannot listen on port ${this.requestedPort}: ${err.message}`, {
            cause: err,
          }),
        );
      };
      const onListening = () => {
        wss.off('error', onError);
        resolve();
      };
      wss.once('error', onError);
      wss.once('listening', onListening);
    });

    this.wss = wss;
    wss.on('error', (err) => log.error(`server error: ${err.message}`));
    wss.on('connection', (ws) => this.handleConnection(ws));

    this.coordinator.on('state', this.onState);
    this.results.attach((status) => {
      this.latestStatus = status;
      this.broadcast({ type: 'STATUS', payload: status });
    });

    log.info(`listening on ws://127.0.0.1:${this.port}`);
  }

  /** Detach from the pipeline and close every connection. */
  close(): Promise<void> {
    const wss = this.wss;
    if (!wss) return Promise.resolve();
    this.wss = null;

    this.results.detach();
    this.coordinator.off('state', this.onState);

    return new Promise((resolve) => {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close(() => resolve());
    });
  }

  // ---------------------------------------------------------------------------
  // Connection handling
  // ---------------------------------------------------------------------------

  private handleConnection(ws: WebSocket): void {
    this.send(ws, { type: 'COORDINATOR_STATE', payload: { state: this.coordinator.state } });
    if (this.latestStatus) {
      this.send(ws, { type: 'STATUS', payload: this.latestStatus });
    }

    ws.on('message', (raw) => {
      let msg: unknown;
      try {
        msg = JSON.parse(raw.toString());
      } catch {
        this.send(ws, { type: 'ERROR', payload: { message: 'Invalid JSON message' } });
        return;
      }

      try {
        this.handleClientMessage(parseClientMessage(msg));
      } catch (err) {
        this.send(ws, { type: 'ERROR', payload: { message: errorMessage(err) } });
      }
    });

    ws.on('error', (err) => log.warn(`client error: ${err.message}`));
  }

  private handleClientMessage(msg: ClientMessage): void {
    switch (msg.type) {
      case 'CHECK_NOW':
        this.triggers.send('user_click');
        break;
    }
  }

  // ---------------------------------------------------------------------------
  // Broadcast helpers
  // ---------------------------------------------------------------------------

  /** Send a message to all connected clients. */
  private broadcast(msg: ServerMessage): void {
    if (!this.wss) return;
    const json = JSON.stringify(msg);
    this.wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(json);
      }
    });
  }

  /** Send a message to a single client. */
  private send(ws: WebSocket, msg: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(msg));
    }
  }
}

function parseClientMessage(msg: unknown): ClientMessage {
  const type: unknown = msg !== null && typeof msg === 'object' ? Reflect.get(msg, 'type') : undefined;
  if (type === 'CHECK_NOW') {
    return { type: 'CHECK_NOW', payload: {} };
  }
  throw new Error(`Unknown message type: ${JSON.stringify(type ?? null)}`);
}
