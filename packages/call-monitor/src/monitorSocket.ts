import * as net from 'net';
import { MonitorConnectionError } from './errors';

export type ReadResult =
  | { type: 'data'; data: Buffer }
  | { type: 'timeout' }
  | { type: 'closed' };

/**
 * @hebrew שקע הזרם שמשימת ההאזנה קוראת ממנו. read מחזירה נתונים, timeout או closed ואינה זורקת.
 */
export interface MonitorSocket {
  read(timeoutMs: number, signal?: AbortSignal): Promise<ReadResult>;
  close(): void;
}

export type SocketFactory = (host: string, port: number, timeoutMs: number) => Promise<MonitorSocket>;

// מעבר לכמות זו השקע מושהה עד הקריאה הבאה, וחלון ה-TCP מתמלא
export const MAX_BUFFERED_BYTES = 4096;

/**
 * @hebrew עוטף net.Socket: אוגר את הנתונים שהגיעו עד לקריאה הבאה.
 */
export class TcpMonitorSocket implements MonitorSocket {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private closed = false;
  private wake: (() => void) | null = null;

  constructor(private readonly socket: net.Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
      if (this.buffered >= MAX_BUFFERED_BYTES) {
        socket.pause();
      }
      this.notify();
    });
    const onClosed = () => {
      this.closed = true;
      this.notify();
    };
    socket.on('end', onClosed);
    socket.on('close', onClosed);
    // שגיאה אחרי ההתחברות מטופלת כסגירה; אירוע close יגיע אחריה
    socket.on('error', onClosed);
  }

  /** בתים שהתקבלו וטרם נקראו. */
  get bufferedBytes(): number {
    return this.buffered;
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  async read(timeoutMs: number, signal?: AbortSignal): Promise<ReadResult> {
    if (this.chunks.length === 0 && !this.closed && !signal?.aborted) {
      await new Promise<void>(resolve => {
        const finish = () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', finish);
          this.wake = null;
          resolve();
        };
        const timer = setTimeout(finish, timeoutMs);
        signal?.addEventListener('abort', finish, { once: true });
        this.wake = finish;
      });
    }
    if (this.chunks.length > 0) {
      const data = Buffer.concat(this.chunks);
      this.chunks = [];
      this.buffered = 0;
      if (this.socket.isPaused() && !this.closed) {
        this.socket.resume();
      }
      return { type: 'data', data };
    }
    return this.closed ? { type: 'closed' } : { type: 'timeout' };
  }

  close(): void {
    this.closed = true;
    this.socket.destroy();
  }
}

/**
 * @hebrew פותח חיבור TCP עם keep-alive ומגבלת זמן להתחברות.
 * @throws MonitorConnectionError כאשר ההתחברות נכשלה או שפג הזמן.
 */
export const connectTcpSocket: SocketFactory = (host, port, timeoutMs) =>
  new Promise<MonitorSocket>((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new MonitorConnectionError(`Unable to connect to '${host}:${port}' within ${timeoutMs}ms`));
    }, timeoutMs);
    socket.once('error', (error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(new MonitorConnectionError(`Unable to connect to '${host}:${port}': ${error.message}`, { cause: error }));
    });
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeAllListeners('error');
      socket.setKeepAlive(true);
      resolve(new TcpMonitorSocket(socket));
    });
  });
