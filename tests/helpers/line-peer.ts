import * as net from 'node:net';
import { once } from 'node:events';

/**
 * Test peer speaking the line protocol over a raw socket.
 */
export class LineClient {
  received = '';
  closed = false;

  private constructor(readonly socket: net.Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.received += chunk.toString('utf8');
    });
    socket.on('close', () => {
      this.closed = true;
    });
    socket.on('error', () => {
      this.closed = true;
    });
  }

  static async connect(port: number, host = '127.0.0.1'): Promise<LineClient> {
    const socket = net.createConnection({ host, port });
    await once(socket, 'connect');
    return new LineClient(socket);
  }

  static wrap(socket: net.Socket): LineClient {
    return new LineClient(socket);
  }

  send(line: string): void {
    this.socket.write(line.endsWith('\n') ? line : `${line}\n`);
  }

  sendJson(value: unknown): void {
    this.send(JSON.stringify(value));
  }

  /** Complete lines received so far */
  lines(): string[] {
    return this.received.split('\n').filter((line, i, all) => line.length > 0 && i < all.length - 1);
  }

  /** Parsed JSON lines, skipping anything that is not JSON */
  frames(): Array<Record<string, unknown>> {
    const out: Array<Record<string, unknown>> = [];
    for (const line of this.lines()) {
      if (!line.startsWith('{')) continue;
      const value: unknown = JSON.parse(line);
      if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
        out.push(Object.fromEntries(Object.entries(value)));
      }
    }
    return out;
  }

  destroy(): void {
    this.socket.destroy();
  }
}

/**
 * TCP server that answers `CB/<n>` hellos with `OK/<n> hmac=`, the way a
 * controller does on the LAN.
 */
export class ResponderPeer {
  readonly hellos: string[] = [];
  readonly clients: LineClient[] = [];
  reply = true;

  private constructor(private readonly server: net.Server) {}

  static async listen(): Promise<ResponderPeer> {
    const server = net.createServer();
    const peer = new ResponderPeer(server);
    server.on('connection', (socket) => peer.accept(socket));
    server.listen(0, '127.0.0.1');
    await once(server, 'listening');
    return peer;
  }

  get port(): number {
    const address = this.server.address();
    return typeof address === 'object' && address !== null ? address.port : 0;
  }

  get latest(): LineClient | undefined {
    return this.clients[this.clients.length - 1];
  }

  async close(): Promise<void> {
    for (const client of this.clients) client.destroy();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }

  private accept(socket: net.Socket): void {
    const client = LineClient.wrap(socket);
    this.clients.push(client);

    let answered = false;
    socket.on('data', () => {
      if (answered) return;
      const hello = client.lines().find((line) => line.startsWith('CB/'));
      if (!hello) return;
      answered = true;
      this.hellos.push(hello);
      if (this.reply) {
        const major = /^CB\/(\d+)/.exec(hello)?.[1] ?? '1';
        client.send(`OK/${major} hmac=`);
      }
    });
  }
}
