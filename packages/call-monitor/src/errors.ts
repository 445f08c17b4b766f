import type { Tr064ErrorOptions } from 'tr064-core';

/**
 * @hebrew מחלקת הבסיס לשגיאות של מאזין השיחות.
 */
export class MonitorError extends Error {
  constructor(message: string, options: Tr064ErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
  }
}

/** החיבור הראשוני לשקע נכשל (כתובת לא זמינה או פג זמן ההתחברות). */
export class MonitorConnectionError extends MonitorError {}

/** start נקרא בזמן שמשימת האזנה כבר רצה. */
export class MonitorStateError extends MonitorError {}

/** קריאה מתור ריק (מיידית, או לאחר שפג זמן ההמתנה). */
export class QueueEmptyError extends MonitorError {
  constructor(message: string = 'Queue is empty') {
    super(message);
  }
}
