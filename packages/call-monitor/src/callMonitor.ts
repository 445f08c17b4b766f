import { EventEmitter } from 'events';
import { TextDecoder } from 'util';
import { createNullLogger, delay, loadConfig, retry, type ModuleLogger, type Tr064Config } from 'tr064-core';
import { BoundedQueue } from './boundedQueue';
import { EventReporter } from './eventReporter';
import { MonitorError, MonitorStateError } from './errors';
import { connectTcpSocket, type MonitorSocket, type SocketFactory } from './monitorSocket';

export type MonitorState = 'idle' | 'connecting' | 'listening' | 'reconnecting' | 'stopped';

export const MIN_RECONNECT_DELAY_MS = 20;
export const RECONNECT_DELAY_FACTOR = 10;

export interface CallMonitorOptions {
  address?: string;
  port?: number;
  // זמן מרבי להתחברות ולכל קריאה מהשקע
  timeoutMs?: number;
  encoding?: string;
  logger?: ModuleLogger;
  socketFactory?: SocketFactory;
  // ברירת מחדל: loadConfig()
  config?: Tr064Config;
}

export interface MonitorStartOptions {
  queueSize?: number;
  blockOnFilledQueue?: boolean;
  // ההשהיה המרבית בין ניסיונות התחברות מחדש
  reconnectDelayMs?: number;
  reconnectTries?: number;
}

// failure קיים רק כאשר המשימה הסתיימה שלא דרך stop
interface LoopOutcome {
  failure?: Error;
}

interface MonitorSettings {
  blockOnFilledQueue: boolean;
  reconnectDelayMs: number;
  reconnectTries: number;
}

/**
 * @hebrew מחשב את ההשהיה לפני ניסיון התחברות מחדש: מתחילה ב-20ms, גדלה פי 10 בכל ניסיון
 * ומוגבלת ב-maxDelayMs.
 * @param attempt - מספר הניסיון, מתחיל ב-1.
 */
export function reconnectDelayFor(attempt: number, maxDelayMs: number): number {
  const minDelay = Math.min(MIN_RECONNECT_DELAY_MS, maxDelayMs);
  return Math.min(minDelay * RECONNECT_DELAY_FACTOR ** (attempt - 1), maxDelayMs);
}

/**
 * @hebrew מאזין לשירות ניטור השיחות של הנתב (TCP, פורט 1012 כברירת מחדל).
 * משימת רקע אחת לכל מופע קוראת מהשקע, מרכיבה שורות ומעבירה אותן לתור.
 * מצבים: idle -> connecting -> listening -> (reconnecting <-> listening) -> stopped.
 *
 * אירועים: 'state' (MonitorState), 'terminated' (Error) כאשר המשימה הסתיימה שלא דרך stop.
 */
export class CallMonitor extends EventEmitter {
  readonly address: string;
  readonly port: number;
  readonly timeoutMs: number;
  readonly encoding: string;
  private readonly logger: ModuleLogger;
  private readonly socketFactory: SocketFactory;
  private readonly defaults: Tr064Config['monitor'];
  private _state: MonitorState = 'idle';
  private task: Promise<void> | null = null;
  private starting: Promise<BoundedQueue<string>> | null = null;
  private abortController: AbortController | null = null;

  constructor(options: CallMonitorOptions = {}) {
    super();
    const config = options.config ?? loadConfig();
    this.defaults = config.monitor;
    this.address = options.address ?? config.connection.address;
    this.port = options.port ?? config.monitor.port;
    this.timeoutMs = options.timeoutMs ?? config.monitor.timeoutMs;
    this.encoding = options.encoding ?? config.monitor.encoding;
    this.logger = options.logger ?? createNullLogger();
    this.socketFactory = options.socketFactory ?? connectTcpSocket;
  }

  get state(): MonitorState {
    return this._state;
  }

  /** האם נוצרה משימת האזנה (בין start ל-stop או לסיום המשימה). */
  get hasMonitorTask(): boolean {
    return this.task !== null;
  }

  /**
   * @hebrew האם משימת ההאזנה חיה. מיועד לבדיקת חיות תקופתית של הקורא, שכן שקט בקו הוא מצב רגיל.
   */
  get isAlive(): boolean {
    return this.task !== null && this._state !== 'stopped';
  }

  private setState(state: MonitorState): void {
    if (this._state === state) return;
    this.logger.debug(`[CallMonitor] state ${this._state} -> ${state}`);
    this._state = state;
    this.emit('state', state);
  }

  private connect(): Promise<MonitorSocket> {
    return this.socketFactory(this.address, this.port, this.timeoutMs);
  }

  /**
   * @hebrew מתחבר ומפעיל את משימת ההאזנה.
   * @returns התור שאליו יגיעו שורות האירועים.
   * @throws MonitorStateError אם משימה כבר רצה; MonitorConnectionError אם ההתחברות נכשלה.
   */
  async start(options: MonitorStartOptions = {}): Promise<BoundedQueue<string>> {
    if (this.task || this.abortController) {
      throw new MonitorStateError('A monitor task is already running');
    }
    const starting = this.open(options);
    this.starting = starting;
    try {
      return await starting;
    } finally {
      this.starting = null;
    }
  }

  private async open(options: MonitorStartOptions): Promise<BoundedQueue<string>> {
    const settings: MonitorSettings = {
      blockOnFilledQueue: options.blockOnFilledQueue ?? this.defaults.blockOnFilledQueue,
      reconnectDelayMs: options.reconnectDelayMs ?? this.defaults.reconnectDelayMs,
      reconnectTries: options.reconnectTries ?? this.defaults.reconnectTries,
    };
    // בודק את הקידוד לפני ההתחברות
    const decoder = new TextDecoder(this.encoding);
    const abortController = new AbortController();
    this.abortController = abortController;

    this.setState('connecting');
    let socket: MonitorSocket;
    try {
      socket = await this.connect();
    } catch (error) {
      this.abortController = null;
      this.setState('idle');
      throw error;
    }
    if (abortController.signal.aborted) {
      socket.close();
      this.abortController = null;
      this.setState('stopped');
      throw new MonitorError(`Monitor for '${this.address}:${this.port}' was stopped while connecting`);
    }

    const queue = new BoundedQueue<string>(options.queueSize ?? this.defaults.queueSize);
    this.setState('listening');
    this.task = this.monitorLoop(socket, queue, decoder, settings, abortController.signal)
      .catch((error: unknown): LoopOutcome => {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`[CallMonitor] listener of monitor task failed: ${failure.message}`);
        return { failure };
      })
      .then(outcome => {
        this.task = null;
        this.abortController = null;
        if (outcome.failure) {
          this.reportTermination(outcome.failure);
        }
      });
    this.logger.info(`[CallMonitor] listening on ${this.address}:${this.port}`);
    return queue;
  }

  /**
   * @hebrew עוצר את משימת ההאזנה וממתין לסיומה. לאחר מכן ניתן להפעיל את המופע מחדש.
   * קריאה בזמן ש-start עדיין מתחבר גורמת ל-start להיכשל עם MonitorError.
   */
  async stop(): Promise<void> {
    const abortController = this.abortController;
    if (!abortController) {
      return;
    }
    abortController.abort();
    if (this.starting) {
      await Promise.allSettled([this.starting]);
    }
    if (this.task) {
      await this.task;
    }
    this.logger.info('[CallMonitor] stopped');
  }

  private reportTermination(failure: Error): void {
    this.logger.error(`[CallMonitor] monitor task terminated: ${failure.message}`);
    try {
      this.emit('terminated', failure);
    } catch (error) {
      this.logger.error(`[CallMonitor] listener of 'terminated' failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async monitorLoop(
    initialSocket: MonitorSocket,
    queue: BoundedQueue<string>,
    decoder: TextDecoder,
    settings: MonitorSettings,
    signal: AbortSignal,
  ): Promise<LoopOutcome> {
    const reporter = new EventReporter(queue, {
      blockOnFilledQueue: settings.blockOnFilledQueue,
      signal,
      logger: this.logger,
    });
    let socket: MonitorSocket | null = initialSocket;
    let failure: Error | undefined;

    try {
      while (!signal.aborted && socket) {
        const result = await socket.read(this.timeoutMs, signal);
        if (signal.aborted) break;
        if (result.type === 'timeout') continue;
        if (result.type === 'closed') {
          this.logger.warn(`[CallMonitor] connection to ${this.address}:${this.port} lost, reconnecting`);
          socket.close();
          socket = null;
          // שארית מהחיבור שנסגר אינה ממשיכה בחיבור החדש
          const partial = decoder.decode() + reporter.reset();
          if (partial !== '') {
            this.logger.debug(`[CallMonitor] discarding incomplete line: ${partial}`);
          }
          this.setState('reconnecting');
          socket = await this.reconnect(settings, signal);
          if (socket) {
            this.setState('listening');
          } else if (!signal.aborted) {
            failure = new MonitorError(`Unable to reconnect to '${this.address}:${this.port}' after ${settings.reconnectTries} tries`);
          }
          continue;
        }
        await reporter.add(decoder.decode(result.data, { stream: true }));
      }
    } catch (error) {
      failure = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`[CallMonitor] monitor task failed: ${failure.message}`);
    } finally {
      socket?.close();
      this.setState('stopped');
    }

    return { failure };
  }

  /**
   * @hebrew מנסה להתחבר מחדש עד reconnectTries פעמים, עם השהיה גדלה לפני כל ניסיון.
   * @returns שקע מחובר, או null כאשר כל הניסיונות נכשלו או שהמשימה נעצרה.
   */
  private async reconnect(settings: MonitorSettings, signal: AbortSignal): Promise<MonitorSocket | null> {
    if (settings.reconnectTries <= 0) {
      return null;
    }
    await delay(reconnectDelayFor(1, settings.reconnectDelayMs), signal);
    try {
      return await retry(async () => {
        if (signal.aborted) {
          throw new MonitorError('Monitor stopped');
        }
        return this.connect();
      }, {
        retries: settings.reconnectTries,
        delayMs: attempt => reconnectDelayFor(attempt, settings.reconnectDelayMs),
        logger: this.logger,
        signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`[CallMonitor] reconnect gave up: ${message}`);
      return null;
    }
  }
}
