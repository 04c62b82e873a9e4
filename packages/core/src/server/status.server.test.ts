import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { WebSocket } from 'ws';
import type { ServerMessage, Status, Update } from '@auditray/shared';
import { StatusServer } from './status.server.js';
import { TriggerChannel } from '../channels/trigger.channel.js';
import { ResultChannel } from '../channels/result.channel.js';
import { UpdateCoordinator, type Checker } from '../coordinator/update.coordinator.js';
import { FatalError } from '../errors.js';
import { configureLogging } from '../logging/logger.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Client {
  ws: WebSocket;
  msgs: ServerMessage[];
}

/** Connect a client that records every message it receives. */
function connect(port: number): Promise<Client> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    const msgs: ServerMessage[] = [];
    ws.on('message', (raw) => {
      msgs.push(JSON.parse(raw.toString()) as ServerMessage);
    });
    ws.once('open', () => resolve({ ws, msgs }));
    ws.once('error', reject);
  });
}

const UPDATES: Update[] = [
  { text: 'openssl: arbitrary code execution (High)', link: 'https://example.test/AVG-1' },
];

let triggers: TriggerChannel;
let results: ResultChannel;
let coordinator: UpdateCoordinator;
let server: StatusServer;
let clients: WebSocket[];

function makeServer(checker: Checker): void {
  triggers = new TriggerChannel();
  results = new ResultChannel();
  coordinator = new UpdateCoordinator({ triggers, results, checker });
  server = new StatusServer({ triggers, results, coordinator, port: 0 });
}

async function connectTracked(): Promise<Client> {
  const client = await connect(server.port);
  clients.push(client.ws);
  return client;
}

beforeAll(() => {
  configureLogging({ level: 'silent' });
});

beforeEach(() => {
  clients = [];
});

afterEach(async () => {
  for (const ws of clients) ws.terminate();
  triggers.close();
  await server.close();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('StatusServer', () => {
  it('sends the coordinator state to a new client', async () => {
    makeServer({ check: async () => [] });
    await server.start();

    const client = await connectTracked();
    await vi.waitFor(() => expect(client.msgs).toHaveLength(1));

    expect(client.msgs[0]).toEqual({ type: 'COORDINATOR_STATE', payload: { state: 'idle' } });
  });

  it('turns CHECK_NOW into a check and broadcasts the result', async () => {
    const check = vi.fn(async () => UPDATES);
    makeServer({ check });
    await server.start();
    void coordinator.run();

    const a = await connectTracked();
    const b = await connectTracked();
    a.ws.send(JSON.stringify({ type: 'CHECK_NOW', payload: {} }));

    const expected: ServerMessage = {
      type: 'STATUS',
      payload: { kind: 'missing_updates', updates: UPDATES },
    };
    await vi.waitFor(() => expect(a.msgs).toContainEqual(expected));
    await vi.waitFor(() => expect(b.msgs).toContainEqual(expected));
    expect(check).toHaveBeenCalledOnce();
    expect(server.status).toEqual(expected.payload);
  });

  it('broadcasts running and idle around a check, then the status', async () => {
    makeServer({ check: async () => [] });
    await server.start();
    void coordinator.run();

    const client = await connectTracked();
    await vi.waitFor(() => expect(client.msgs).toHaveLength(1));
    triggers.send('file_changed');

    await vi.waitFor(() =>
      expect(client.msgs.map((m) => m.type)).toEqual([
        'COORDINATOR_STATE',
        'COORDINATOR_STATE',
        'COORDINATOR_STATE',
        'STATUS',
      ]),
    );
    // The state change is immediate; the status follows on the next turn.
    expect(client.msgs[1]).toEqual({ type: 'COORDINATOR_STATE', payload: { state: 'running' } });
    expect(client.msgs[2]).toEqual({ type: 'COORDINATOR_STATE', payload: { state: 'idle' } });
    expect(client.msgs[3]).toEqual({ type: 'STATUS', payload: { kind: 'up_to_date' } });
  });

  it('delivers statuses published before start to late clients', async () => {
    makeServer({ check: async () => [] });
    const early: Status = { kind: 'error', message: 'tool not found' };
    results.publish(early);
    await server.start();

    await vi.waitFor(() => expect(server.status).toEqual(early));
    const client = await connectTracked();
    await vi.waitFor(() => expect(client.msgs).toHaveLength(2));

    expect(client.msgs[1]).toEqual({ type: 'STATUS', payload: early });
  });

  it('answers malformed JSON with an ERROR', async () => {
    makeServer({ check: async () => [] });
    await server.start();

    const client = await connectTracked();
    client.ws.send('{not json');

    await vi.waitFor(() =>
      expect(client.msgs).toContainEqual({
        type: 'ERROR',
        payload: { message: 'Invalid JSON message' },
      }),
    );
  });

  it('answers unknown message types with an ERROR', async () => {
    makeServer({ check: async () => [] });
    await server.start();

    const client = await connectTracked();
    client.ws.send(JSON.stringify({ type: 'SELF_DESTRUCT' }));

    await vi.waitFor(() =>
      expect(client.msgs).toContainEqual({
        type: 'ERROR',
        payload: { message: 'Unknown message type: "SELF_DESTRUCT"' },
      }),
    );
    expect(triggers.pending).toBe(0);
  });

  it('rejects with FatalError when the port is taken', async () => {
    makeServer({ check: async () => [] });
    await server.start();

    const rival = new StatusServer({
      triggers,
      results: new ResultChannel(),
      coordinator,
      port: server.port,
    });
    await expect(rival.start()).rejects.toBeInstanceOf(FatalError);
  });
});
