import { describe, it, expect, afterEach } from 'vitest';
import { TunnelTransport, TransportError, Messages } from '../../src/index.js';
import type { DisconnectReason, LinkMessage, TunnelTransportOptions } from '../../src/index.js';
import { LineClient } from '../helpers/line-peer.js';
import { waitFor } from '../helpers/wait-for.js';

describe('TunnelTransport', () => {
  const transports: TunnelTransport[] = [];
  const clients: LineClient[] = [];

  afterEach(async () => {
    for (const client of clients.splice(0)) client.destroy();
    await Promise.all(transports.splice(0).map((t) => t.stop()));
  });

  async function startTunnel(options: TunnelTransportOptions = {}) {
    const tunnel = new TunnelTransport({ port: 0, localName: 'Test Rig', ...options });
    transports.push(tunnel);

    const messages: LinkMessage[] = [];
    const disconnects: DisconnectReason[] = [];
    tunnel.on('message', (message) => messages.push(message));
    tunnel.on('disconnected', (reason) => disconnects.push(reason));

    await tunnel.start();
    const port = tunnel.getListeningPort();
    if (port === null) throw new Error('tunnel is not listening');
    return { tunnel, port, messages, disconnects };
  }

  async function connect(port: number): Promise<LineClient> {
    const client = await LineClient.connect(port);
    clients.push(client);
    return client;
  }

  async function handshake(port: number, hello = 'CB/2 auth=psk1 name=Studio Mac.local'): Promise<LineClient> {
    const client = await connect(port);
    client.send(hello);
    await waitFor(() => client.lines().length > 0, { message: 'handshake reply' });
    return client;
  }

  describe('lifecycle', () => {
    it('listens on loopback after start and waits in listening', async () => {
      const { tunnel } = await startTunnel();
      expect(tunnel.isListening()).toBe(true);
      expect(tunnel.getSnapshot().state).toEqual({ phase: 'listening' });
      expect(tunnel.isActive()).toBe(false);
    });

    it('stop closes the listener and returns to idle', async () => {
      const { tunnel, port, disconnects } = await startTunnel();
      const client = await handshake(port);

      await tunnel.stop();

      expect(tunnel.isListening()).toBe(false);
      expect(tunnel.getSnapshot().state).toEqual({ phase: 'idle' });
      expect(disconnects).toEqual(['user']);
      await waitFor(() => client.closed, { message: 'client closed' });
    });

    it('reports a bind failure and schedules a retry', async () => {
      const first = await startTunnel();
      const errors: Error[] = [];
      const second = new TunnelTransport({ port: first.port, backoff: () => 60000 });
      transports.push(second);
      second.on('error', (error) => errors.push(error));

      await second.start();

      expect(second.isListening()).toBe(false);
      expect(errors[0]).toBeInstanceOf(TransportError);
      expect(errors[0]).toMatchObject({ code: 'bind_failed', transport: 'tunnel' });
      expect(second.getSnapshot()).toMatchObject({ consecutiveFailures: 1, reconnectPending: true });
    });
  });

  describe('handshake', () => {
    it('answers a line hello with OK and goes active', async () => {
      const { tunnel, port } = await startTunnel();
      const actives: string[] = [];
      tunnel.on('active', (snapshot) => actives.push(snapshot.peer?.name ?? ''));

      const client = await handshake(port);

      expect(client.lines()[0]).toBe('OK/2 hmac=');
      await waitFor(() => tunnel.isActive());
      expect(actives).toEqual(['Studio Mac']);
      expect(tunnel.getSnapshot()).toMatchObject({
        state: { phase: 'active' },
        protocolMajor: 2,
        peer: { kind: 'tunnel', address: '127.0.0.1', name: 'Studio Mac' },
      });
    });

    it('echoes a v1 hello with OK/1', async () => {
      const { port } = await startTunnel();
      const client = await handshake(port, 'CB/1 auth=psk1');
      expect(client.lines()[0]).toBe('OK/1 hmac=');
    });

    it('acknowledges the legacy hello', async () => {
      const { tunnel, port } = await startTunnel();
      const client = await handshake(port, 'CB/1 HELLO');
      expect(client.lines()[0]).toBe('CB/1 HELLO_ACK');
      await waitFor(() => tunnel.isActive());
    });

    it('stays awaiting the handshake when the first line is not a hello', async () => {
      const { tunnel, port, messages } = await startTunnel();
      const client = await connect(port);

      client.sendJson({ type: 'midi_cc', channel: 1, cc: 74, value: 100 });
      await waitFor(() => tunnel.getSnapshot().state.phase === 'awaiting_handshake');
      await new Promise((resolve) => setTimeout(resolve, 50));

      expect(tunnel.isActive()).toBe(false);
      expect(messages).toEqual([]);
      expect(client.lines()).toEqual([]);

      client.send('CB/2 auth=psk1');
      await waitFor(() => tunnel.isActive());
      expect(client.lines()).toEqual(['OK/2 hmac=']);
    });

    it('ignores an unsupported major and keeps waiting', async () => {
      const { tunnel, port } = await startTunnel();
      const client = await connect(port);

      client.send('CB/9 auth=psk1');
      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(client.lines()).toEqual([]);
      expect(tunnel.isActive()).toBe(false);

      client.send('CB/2 auth=psk1');
      await waitFor(() => tunnel.isActive());
      expect(client.lines()).toEqual(['OK/2 hmac=']);
    });

    it('takes the JSON handshake only when enabled', async () => {
      const { tunnel, port } = await startTunnel({ acceptJsonHandshake: true });
      const client = await connect(port);

      client.sendJson({ type: 'handshake', client: 'Bridge' });
      await waitFor(() => tunnel.isActive());
      expect(client.frames()[0]).toEqual({
        type: 'handshake_response',
        server: 'Test Rig',
        ok: true,
        proto: 1,
      });
      expect(tunnel.getSnapshot().peer?.name).toBe('Bridge');
    });

    it('times out a connection that never says hello', async () => {
      const { tunnel, port, disconnects } = await startTunnel({ handshakeTimeoutMs: 100 });
      const client = await connect(port);

      await waitFor(() => client.closed, { message: 'client closed after handshake timeout' });
      expect(disconnects).toEqual(['error']);
      expect(tunnel.getSnapshot().state).toEqual({ phase: 'listening' });
      expect(tunnel.isListening()).toBe(true);
    });
  });

  describe('traffic', () => {
    it('delivers validated inbound messages, batches included', async () => {
      const { tunnel, port, messages } = await startTunnel();
      const client = await handshake(port);
      await waitFor(() => tunnel.isActive());

      client.sendJson({ type: 'midi_cc', channel: 1, cc: 74, value: 100, label: 'Cutoff' });
      client.sendJson({
        type: 'batch',
        messages: [
          JSON.stringify({ type: 'midi_note', channel: 10, note: 36, velocity: 127 }),
          JSON.stringify({ type: 'midi_cc', channel: 1, cc: 300, value: 1 }),
        ],
      });
      client.send('{broken');

      await waitFor(() => messages.length >= 2);
      expect(messages).toEqual([
        { type: 'midi_cc', channel: 1, cc: 74, value: 100, label: 'Cutoff' },
        { type: 'midi_note', channel: 10, note: 36, velocity: 127 },
      ]);
      expect(tunnel.isActive()).toBe(true);
    });

    it('delivers a data line that arrives in the same packet as the hello', async () => {
      const { tunnel, port, messages } = await startTunnel();
      const client = await connect(port);

      client.send(`CB/2 auth=psk1\n${JSON.stringify({ type: 'midi_cc', channel: 2, cc: 1, value: 5 })}`);

      await waitFor(() => messages.length === 1);
      expect(tunnel.isActive()).toBe(true);
      expect(messages).toEqual([{ type: 'midi_cc', channel: 2, cc: 1, value: 5 }]);
    });

    it('delivers complete lines that share a chunk with an oversized tail', async () => {
      const { tunnel, port, messages } = await startTunnel({ maxLineBytes: 64 });
      const client = await handshake(port);
      await waitFor(() => tunnel.isActive());

      client.socket.write(`${JSON.stringify({ type: 'midi_cc', channel: 3, cc: 7, value: 90 })}\n${'x'.repeat(100)}`);

      await waitFor(() => messages.length === 1);
      expect(messages).toEqual([{ type: 'midi_cc', channel: 3, cc: 7, value: 90 }]);
      expect(tunnel.isActive()).toBe(true);
    });

    it('sends outbound messages once active, not before', async () => {
      const { tunnel, port } = await startTunnel();
      expect(tunnel.send(Messages.cc(1, 7, 64))).toBe(false);

      const client = await handshake(port);
      await waitFor(() => tunnel.isActive());

      expect(tunnel.send(Messages.cc(1, 7, 64))).toBe(true);
      await waitFor(() => client.frames().length > 0);
      expect(client.frames()[0]).toEqual({ type: 'midi_cc', channel: 1, cc: 7, value: 64 });
    });

    it('a newer socket supersedes the current connection', async () => {
      const { tunnel, port } = await startTunnel();
      const first = await handshake(port);
      await waitFor(() => tunnel.isActive());

      const second = await connect(port);
      await waitFor(() => first.closed, { message: 'first client closed' });
      second.send('CB/2 auth=psk1 name=Second');
      await waitFor(() => tunnel.isActive() && tunnel.getSnapshot().peer?.name === 'Second');
    });
  });

  describe('liveness', () => {
    it('drops a silent connection as stale and schedules a reconnect', async () => {
      const { tunnel, port, disconnects } = await startTunnel({
        heartbeatIntervalMs: 50,
        livenessMs: 150,
        backoff: () => 20,
      });
      const reconnects: number[] = [];
      tunnel.on('reconnecting', (failures) => reconnects.push(failures));

      const client = await handshake(port);
      await waitFor(() => tunnel.isActive());

      await waitFor(() => disconnects.length > 0, { message: 'stale disconnect' });
      expect(disconnects).toEqual(['stale']);
      expect(reconnects).toEqual([1]);
      expect(client.frames().some((frame) => frame['type'] === 'heartbeat')).toBe(true);
      await waitFor(() => client.closed);
      expect(tunnel.isListening()).toBe(true);
    });

    it('stays alive while the peer keeps talking', async () => {
      const { tunnel, port, disconnects } = await startTunnel({ heartbeatIntervalMs: 50, livenessMs: 150 });
      const client = await handshake(port);
      await waitFor(() => tunnel.isActive());

      for (let i = 0; i < 8; i++) {
        client.sendJson({ type: 'heartbeat', timestamp: 1 });
        await new Promise((resolve) => setTimeout(resolve, 40));
      }

      expect(disconnects).toEqual([]);
      expect(tunnel.isActive()).toBe(true);
    });
  });

  describe('suspend / resume', () => {
    it('closes the listener while suspended and listens again on resume', async () => {
      const { tunnel, port, disconnects } = await startTunnel();
      const client = await handshake(port);
      await waitFor(() => tunnel.isActive());

      tunnel.suspend();
      expect(tunnel.isSuspended()).toBe(true);
      expect(disconnects).toEqual(['user']);
      await waitFor(() => !tunnel.isListening() && client.closed);
      expect(tunnel.getSnapshot().reconnectPending).toBe(false);

      tunnel.resume();
      await waitFor(() => tunnel.isListening(), { message: 'listening after resume' });
    });
  });
});
