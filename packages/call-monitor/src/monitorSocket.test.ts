import { describe, it, expect, afterEach } from 'vitest';
import net from 'net';
import { delay } from 'tr064-core';
import { MAX_BUFFERED_BYTES, TcpMonitorSocket } from './monitorSocket';

describe('TcpMonitorSocket', () => {
  const servers: net.Server[] = [];
  const sockets: TcpMonitorSocket[] = [];

  afterEach(async () => {
    sockets.splice(0).forEach(socket => socket.close());
    await Promise.all(servers.splice(0).map(server => new Promise<void>(resolve => server.close(() => resolve()))));
  });

  const serve = async (onConnection: (socket: net.Socket) => void): Promise<TcpMonitorSocket> => {
    const server = net.createServer(onConnection);
    servers.push(server);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    const connection = await new Promise<net.Socket>((resolve, reject) => {
      const client = net.createConnection({ host: '127.0.0.1', port: address.port }, () => resolve(client));
      client.once('error', reject);
    });
    const socket = new TcpMonitorSocket(connection);
    sockets.push(socket);
    return socket;
  };

  it('returns buffered data and then reports the closed connection', async () => {
    const socket = await serve(connection => connection.end('RING\n'));
    const received: string[] = [];
    for (;;) {
      const result = await socket.read(1000);
      if (result.type === 'closed') break;
      if (result.type === 'data') received.push(result.data.toString('utf-8'));
    }
    expect(received.join('')).toBe('RING\n');
  });

  it('stops receiving while unread data piles up', async () => {
    const payload = Buffer.alloc(1024 * 1024, 0x61);
    const socket = await serve(connection => connection.end(payload));

    await delay(200);
    expect(socket.bufferedBytes).toBeGreaterThanOrEqual(MAX_BUFFERED_BYTES);
    expect(socket.bufferedBytes).toBeLessThan(payload.length);

    let received = 0;
    for (;;) {
      const result = await socket.read(1000);
      if (result.type === 'closed') break;
      if (result.type === 'data') received += result.data.length;
    }
    expect(received).toBe(payload.length);
  });

  it('reports a timeout when nothing arrives', async () => {
    const socket = await serve(() => undefined);
    await expect(socket.read(20)).resolves.toEqual({ type: 'timeout' });
  });
});
