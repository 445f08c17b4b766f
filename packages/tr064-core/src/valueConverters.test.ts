import { describe, it, expect } from 'vitest';
import {
  booleanConvert,
  datetimeConvert,
  encodeArgumentValue,
  getConvertedValue,
  integerConvert,
  uuidConvert,
} from './valueConverters';

describe('integerConvert', () => {
  it('parses signed integers', () => {
    expect(integerConvert('29938')).toBe(29938);
    expect(integerConvert('-12')).toBe(-12);
    expect(integerConvert(' 7 ')).toBe(7);
  });

  it('rejects anything else', () => {
    expect(() => integerConvert('12.5')).toThrow(RangeError);
    expect(() => integerConvert('12abc')).toThrow(RangeError);
    expect(() => integerConvert('')).toThrow(RangeError);
  });

  it('rejects values beyond the safe integer range', () => {
    expect(integerConvert('9007199254740991')).toBe(9007199254740991);
    expect(() => integerConvert('9007199254740993')).toThrow(RangeError);
  });
});

describe('booleanConvert', () => {
  it('accepts only 1 and 0', () => {
    expect(booleanConvert('1')).toBe(true);
    expect(booleanConvert('0')).toBe(false);
    expect(booleanConvert(' 1 ')).toBe(true);
    expect(() => booleanConvert('true')).toThrow(RangeError);
  });
});

describe('datetimeConvert', () => {
  it('builds a local date', () => {
    const date = datetimeConvert('2024-03-05T14:07:09');
    expect(date.getFullYear()).toBe(2024);
    expect(date.getMonth()).toBe(2);
    expect(date.getDate()).toBe(5);
    expect(date.getHours()).toBe(14);
    expect(date.getMinutes()).toBe(7);
    expect(date.getSeconds()).toBe(9);
  });

  it('rejects dates that do not exist', () => {
    expect(() => datetimeConvert('2021-02-30T10:00:00')).toThrow(RangeError);
    expect(() => datetimeConvert('2021-02-03')).toThrow(RangeError);
  });
});

describe('uuidConvert', () => {
  it('drops the prefix', () => {
    expect(uuidConvert('uuid:739f2409-bccb-40e7-8e6c-001122334455')).toBe('739f2409-bccb-40e7-8e6c-001122334455');
    expect(uuidConvert('739f2409')).toBe('739f2409');
  });
});

describe('getConvertedValue', () => {
  it('converts by data type without regard to case', () => {
    expect(getConvertedValue('ui4', '29938')).toBe(29938);
    expect(getConvertedValue('UI2', '49443')).toBe(49443);
    expect(getConvertedValue('boolean', '1')).toBe(true);
    expect(getConvertedValue('boolean', '0')).toBe(false);
    expect(getConvertedValue('dateTime', '2024-03-05T14:07:09')).toBeInstanceOf(Date);
  });

  it('keeps the raw text when conversion fails', () => {
    expect(getConvertedValue('ui4', 'unknown')).toBe('unknown');
    expect(getConvertedValue('boolean', 'yes')).toBe('yes');
    expect(getConvertedValue('dateTime', '0001-01-01T00:00:00x')).toBe('0001-01-01T00:00:00x');
    expect(getConvertedValue('ui8', '18446744073709551615')).toBe('18446744073709551615');
  });

  it('keeps strings and unknown types as they are', () => {
    expect(getConvertedValue('string', '0815')).toBe('0815');
    expect(getConvertedValue('bin.base64', 'AAEC')).toBe('AAEC');
    expect(getConvertedValue(undefined, '42')).toBe('42');
  });
});

describe('encodeArgumentValue', () => {
  it('encodes booleans and missing values as 1 and 0', () => {
    expect(encodeArgumentValue(true)).toBe('1');
    expect(encodeArgumentValue(false)).toBe('0');
    expect(encodeArgumentValue(null)).toBe('0');
    expect(encodeArgumentValue(undefined)).toBe('0');
  });

  it('encodes everything else as text', () => {
    expect(encodeArgumentValue(5)).toBe('5');
    expect(encodeArgumentValue('PPPoE')).toBe('PPPoE');
  });
});
