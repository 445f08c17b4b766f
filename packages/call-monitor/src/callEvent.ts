/*
 * פענוח שורות של שירות ניטור השיחות. כל שורה מופרדת בנקודה-פסיק:
 *   <dd.mm.yy HH:MM:SS>;RING;<id>;<caller>;<callee>;<line>;
 *   <dd.mm.yy HH:MM:SS>;CALL;<id>;<extension>;<caller>;<callee>;<line>;
 *   <dd.mm.yy HH:MM:SS>;CONNECT;<id>;<extension>;<number>;
 *   <dd.mm.yy HH:MM:SS>;DISCONNECT;<id>;<duration seconds>;
 */

interface CallEventBase {
  timestamp: Date | null;
  connectionId: string;
  raw: string;
}

export interface IncomingCallEvent extends CallEventBase {
  type: 'incoming';
  caller: string;
  callee: string;
  line: string;
}

export interface OutgoingCallEvent extends CallEventBase {
  type: 'outgoing';
  extension: string;
  caller: string;
  callee: string;
  line: string;
}

export interface CallStartedEvent extends CallEventBase {
  type: 'started';
  extension: string;
  number: string;
}

export interface CallFinishedEvent extends CallEventBase {
  type: 'finished';
  durationSeconds: number;
}

export type CallEvent = IncomingCallEvent | OutgoingCallEvent | CallStartedEvent | CallFinishedEvent;

const TIMESTAMP_PATTERN = /^(\d{2})\.(\d{2})\.(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * @hebrew ממיר חותמת זמן בפורמט "dd.mm.yy HH:MM:SS" ל-Date בזמן מקומי.
 * @returns null כאשר הפורמט אינו תואם.
 */
export function parseMonitorTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [day, month, year, hours, minutes, seconds] = match.slice(1).map(part => parseInt(part, 10));
  return new Date(2000 + year, month - 1, day, hours, minutes, seconds);
}

/**
 * @hebrew מפענח שורת אירוע לאירוע שיחה מטיפוס מוגדר.
 * @returns null עבור שורה שאינה אחד מארבעת סוגי האירועים.
 */
export function parseCallEvent(raw: string): CallEvent | null {
  const fields = raw.trim().split(';');
  if (fields.length < 4) {
    return null;
  }
  const field = (index: number): string => fields[index] ?? '';
  const base = { timestamp: parseMonitorTimestamp(field(0)), connectionId: field(2), raw };

  switch (field(1)) {
    case 'RING':
      return { ...base, type: 'incoming', caller: field(3), callee: field(4), line: field(5) };
    case 'CALL':
      return { ...base, type: 'outgoing', extension: field(3), caller: field(4), callee: field(5), line: field(6) };
    case 'CONNECT':
      return { ...base, type: 'started', extension: field(3), number: field(4) };
    case 'DISCONNECT':
      return { ...base, type: 'finished', durationSeconds: parseInt(field(3), 10) || 0 };
    default:
      return null;
  }
}
