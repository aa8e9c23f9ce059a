import { describe, expect, it } from 'vitest';
import type { FormatSpec } from '@/types';
import { decodeCoordinates, decodeValue, encodeCoordinateValue, reformatCoordinates } from './coordinates';
import { GerberError } from './errors';

const leading25: FormatSpec = { zero: 'L', coordinates: 'A', integer: 2, decimal: 5 };
const leading24: FormatSpec = { zero: 'L', coordinates: 'A', integer: 2, decimal: 4 };
const trailing24: FormatSpec = { zero: 'T', coordinates: 'A', integer: 2, decimal: 4 };
const trailing33: FormatSpec = { zero: 'T', coordinates: 'A', integer: 3, decimal: 3 };

describe('decodeCoordinates', () => {
  it('pads leading-suppressed digits at the front', () => {
    expect(decodeCoordinates('X123500Y001250', leading25)).toEqual({
      position: { X: 1.235, Y: 0.0125 },
      offset: {},
    });
  });

  it('pads trailing-suppressed digits at the end', () => {
    expect(decodeCoordinates('X15Y-025', trailing24).position).toEqual({ X: 15, Y: -2.5 });
  });

  it('pads after the sign, not before it', () => {
    expect(decodeValue('-500', leading24)).toBe(-0.05);
    expect(decodeValue('+500', leading24)).toBe(0.05);
  });

  it('separates position from arc offset', () => {
    expect(decodeCoordinates('X1000I-500J250', leading24)).toEqual({
      position: { X: 0.1 },
      offset: { I: -0.05, J: 0.025 },
    });
  });

  it('rejects unknown text', () => {
    expect(() => decodeCoordinates('X12Q3', leading24)).toThrow('Invalid coordinate data: X12Q3');
  });

  it('rejects a repeated axis', () => {
    expect(() => decodeCoordinates('X1X2', leading24)).toThrow('Duplicate axis X in coordinate data: X1X2');
  });
});

describe('encodeCoordinateValue', () => {
  it('drops leading zeros under leading suppression', () => {
    expect(encodeCoordinateValue(1.235, leading25)).toBe('123500');
  });

  it('drops trailing zeros under trailing suppression', () => {
    expect(encodeCoordinateValue(-0.5, trailing24)).toBe('-005');
  });

  it('writes zero as a single digit', () => {
    expect(encodeCoordinateValue(0, leading24)).toBe('0');
  });

  it('decodes back to the same value in every format', () => {
    for (const zero of ['L', 'T'] as const) {
      for (let integer = 0; integer <= 7; integer++) {
        for (let decimal = 0; decimal <= 7; decimal++) {
          const length = integer + decimal;
          if (length === 0) continue;

          const format: FormatSpec = { zero, coordinates: 'A', integer, decimal };
          const samples = ['1234567'.slice(0, length), '1'.padEnd(length, '0'), '1'.padStart(length, '0')];
          for (const digits of samples) {
            const value = Number(digits) / Math.pow(10, decimal);
            expect(decodeValue(encodeCoordinateValue(value, format), format)).toBe(value);
            expect(decodeValue(encodeCoordinateValue(-value, format), format)).toBe(-value);
          }
        }
      }
    }
  });

  it('signals a GeometryError when the value is too wide', () => {
    try {
      encodeCoordinateValue(100, leading24);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GerberError);
      if (error instanceof GerberError) {
        expect(error.kind).toBe('GeometryError');
        expect(error.message).toBe('Coordinate 100 does not fit format 2.4');
      }
    }
  });
});

describe('reformatCoordinates', () => {
  it('re-encodes every axis and keeps their order', () => {
    expect(reformatCoordinates('Y002500X123500', leading25, trailing33)).toBe('Y000025X001235');
  });

  it('fails when a value does not fit the target', () => {
    expect(() => reformatCoordinates('X990000', leading24, { ...leading24, integer: 1 })).toThrow(
      'Coordinate 99 does not fit format 1.4'
    );
  });
});
