import { describe, it, expect } from 'vitest';
import { parseXmltvTimestamp } from './xmltv-time';

describe('parseXmltvTimestamp', () => {
  it('applies the offset', () => {
    expect(parseXmltvTimestamp('20240115183000 +0300')).toEqual({
      ok: true,
      epochMs: Date.UTC(2024, 0, 15, 15, 30, 0),
    });
    expect(parseXmltvTimestamp('20240115183000-0130')).toEqual({
      ok: true,
      epochMs: Date.UTC(2024, 0, 15, 20, 0, 0),
    });
  });

  it('rejects bad formats', () => {
    expect(parseXmltvTimestamp(undefined)).toEqual({ ok: false, reason: 'format' });
    expect(parseXmltvTimestamp('2024-01-15 18:30')).toEqual({ ok: false, reason: 'format' });
    expect(parseXmltvTimestamp('20240115183000')).toEqual({ ok: false, reason: 'format' });
  });

  it('rejects impossible dates and times', () => {
    expect(parseXmltvTimestamp('20240230120000 +0000')).toEqual({ ok: false, reason: 'calendar' });
    expect(parseXmltvTimestamp('20240115250000 +0000')).toEqual({ ok: false, reason: 'calendar' });
    expect(parseXmltvTimestamp('20241315120000 +0000')).toEqual({ ok: false, reason: 'calendar' });
    expect(parseXmltvTimestamp('20240115120000 +0060')).toEqual({ ok: false, reason: 'calendar' });
  });

  it('accepts leap days', () => {
    expect(parseXmltvTimestamp('20240229000000 +0000')).toEqual({
      ok: true,
      epochMs: Date.UTC(2024, 1, 29),
    });
  });
});
