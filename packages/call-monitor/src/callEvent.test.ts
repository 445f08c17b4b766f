import { describe, it, expect } from 'vitest';
import { parseCallEvent, parseMonitorTimestamp } from './callEvent';

describe('parseMonitorTimestamp', () => {
  it('reads the local time of a line', () => {
    expect(parseMonitorTimestamp('05.03.24 14:07:09')).toEqual(new Date(2024, 2, 5, 14, 7, 9));
  });

  it('returns null for other formats', () => {
    expect(parseMonitorTimestamp('20201031')).toBeNull();
  });
});

describe('parseCallEvent', () => {
  it('reads an incoming call', () => {
    const raw = '05.03.24 14:07:09;RING;0;0301234567;0401234;SIP0;';
    expect(parseCallEvent(raw)).toEqual({
      type: 'incoming',
      timestamp: new Date(2024, 2, 5, 14, 7, 9),
      connectionId: '0',
      caller: '0301234567',
      callee: '0401234',
      line: 'SIP0',
      raw,
    });
  });

  it('reads an outgoing call', () => {
    expect(parseCallEvent('05.03.24 14:08:00;CALL;1;11;0401234;0301234567;SIP1;')).toMatchObject({
      type: 'outgoing',
      connectionId: '1',
      extension: '11',
      caller: '0401234',
      callee: '0301234567',
      line: 'SIP1',
    });
  });

  it('reads connect and disconnect', () => {
    expect(parseCallEvent('05.03.24 14:08:05;CONNECT;1;11;0301234567;')).toMatchObject({
      type: 'started',
      extension: '11',
      number: '0301234567',
    });
    expect(parseCallEvent('05.03.24 14:09:05;DISCONNECT;1;60;')).toMatchObject({ type: 'finished', durationSeconds: 60 });
    expect(parseCallEvent('05.03.24 14:09:05;DISCONNECT;1;;')).toMatchObject({ type: 'finished', durationSeconds: 0 });
  });

  it('ignores other lines', () => {
    expect(parseCallEvent('INC;20-10-31;09;76')).toBeNull();
    expect(parseCallEvent('CALL;20201031')).toBeNull();
    expect(parseCallEvent('')).toBeNull();
  });
});
