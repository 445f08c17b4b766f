export { CallMonitor, reconnectDelayFor, MIN_RECONNECT_DELAY_MS, RECONNECT_DELAY_FACTOR } from './callMonitor';
export type { CallMonitorOptions, MonitorStartOptions, MonitorState } from './callMonitor';
export { BoundedQueue } from './boundedQueue';
export { EventReporter } from './eventReporter';
export type { EventReporterOptions } from './eventReporter';
export { TcpMonitorSocket, connectTcpSocket, MAX_BUFFERED_BYTES } from './monitorSocket';
export type { MonitorSocket, ReadResult, SocketFactory } from './monitorSocket';
export { parseCallEvent, parseMonitorTimestamp } from './callEvent';
export type { CallEvent, IncomingCallEvent, OutgoingCallEvent, CallStartedEvent, CallFinishedEvent } from './callEvent';
export { MonitorError, MonitorConnectionError, MonitorStateError, QueueEmptyError } from './errors';
