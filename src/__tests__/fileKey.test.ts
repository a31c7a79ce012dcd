import { describe, expect, it } from 'vitest';
import { decodeFileKey, encodeFileKey, siblingPath } from '../fileKey.js';
import { parseIsoDate, toIsoDate } from '../dates.js';

describe('file keys', () => {
  it('encodes device and UTC date', () => {
    expect(encodeFileKey({ device: 'haiku-yard', date: parseIsoDate('2026-01-20') })).toBe('haiku-yard_2026-01-20.csv');
  });

  it('decodes from a bare name or a path', () => {
    const key = decodeFileKey('/data/downloads/haiku-yard_2026-01-20.csv');
    expect(key?.device).toBe('haiku-yard');
    expect(key && toIsoDate(key.date)).toBe('2026-01-20');
  });

  it('splits on the last underscore', () => {
    expect(decodeFileKey('north_field_box_2026-03-01.csv')?.device).toBe('north_field_box');
  });

  it('rejects names that do not round-trip', () => {
    expect(decodeFileKey('yard_2026-02-30.csv')).toBeNull();
    expect(decodeFileKey('yard_2026-1-20.csv')).toBeNull();
    expect(decodeFileKey('yard-2026-01-20.csv')).toBeNull();
    expect(decodeFileKey('_2026-01-20.csv')).toBeNull();
    expect(decodeFileKey('yard_2026-01-20.txt')).toBeNull();
  });

  it('builds sibling paths in the same directory', () => {
    expect(siblingPath('/data/yard_2026-01-20.csv', { device: 'yard', date: parseIsoDate('2026-01-13') })).toBe(
      '/data/yard_2026-01-13.csv'
    );
  });
});
