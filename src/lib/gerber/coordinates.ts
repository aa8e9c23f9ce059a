/**
 * Koordinaten-Codec
 *
 * Ein Koordinaten-Token wie 'X123500Y-1250I500' besteht aus Achsbuchstaben
 * mit ganzzahligen Ziffernfolgen ohne Dezimalpunkt. Wie diese zu lesen
 * sind, bestimmt die Format-Spezifikation:
 *
 * - Feldlänge = Vorkommastellen + Nachkommastellen
 * - Führende Nullunterdrückung: fehlende Stellen sind vorne (nach dem Vorzeichen)
 * - Nachfolgende Nullunterdrückung: fehlende Stellen sind hinten
 *
 * z.B. Format 2.5, führend: '1250' → '0001250' → 0.0125
 */

import type { FormatSpec } from '@/types';
import { GerberError } from './errors';
import { fieldLength } from './format';

export type PositionAxis = 'X' | 'Y';
export type OffsetAxis = 'I' | 'J';

/**
 * Dekodierte Werte eines Tokens, nur die vorhandenen Achsen sind gesetzt
 */
export interface DecodedCoordinates {
  position: Partial<Record<PositionAxis, number>>;
  offset: Partial<Record<OffsetAxis, number>>;
}

const AXIS_FIELD = /([XYIJ])([+-]?\d+)/y;

/**
 * Dekodiert ein Koordinaten-Token
 *
 * @throws GerberError (ParseError) bei unbekanntem Text oder doppelter Achse
 *
 * @example
 * decodeCoordinates('X123500Y001250', { zero: 'L', coordinates: 'A', integer: 2, decimal: 5 })
 * // => { position: { X: 1.235, Y: 0.0125 }, offset: {} }
 */
export function decodeCoordinates(token: string, format: FormatSpec): DecodedCoordinates {
  const result: DecodedCoordinates = { position: {}, offset: {} };
  const seen = new Set<string>();

  let index = 0;

  while (index < token.length) {
    AXIS_FIELD.lastIndex = index;
    const match = AXIS_FIELD.exec(token);
    if (!match) {
      throw new GerberError('ParseError', `Invalid coordinate data: ${token}`);
    }

    const [whole, axis, digits] = match;
    if (seen.has(axis)) {
      throw new GerberError('ParseError', `Duplicate axis ${axis} in coordinate data: ${token}`);
    }
    seen.add(axis);

    const value = decodeValue(digits, format);
    if (axis === 'X' || axis === 'Y') {
      result.position[axis] = value;
    } else if (axis === 'I' || axis === 'J') {
      result.offset[axis] = value;
    }

    index += whole.length;
  }

  return result;
}

/**
 * Dekodiert eine einzelne (ggf. vorzeichenbehaftete) Ziffernfolge
 */
export function decodeValue(digits: string, format: FormatSpec): number {
  let sign = '';
  let body = digits;
  if (body.startsWith('+') || body.startsWith('-')) {
    sign = body.charAt(0);
    body = body.slice(1);
  }

  const missing = fieldLength(format) - body.length;
  if (missing > 0) {
    body = format.zero === 'L' ? '0'.repeat(missing) + body : body + '0'.repeat(missing);
  }

  return Number(sign + body) / Math.pow(10, format.decimal);
}

/**
 * Kodiert einen Dezimalwert als Ziffernfolge im gegebenen Format
 *
 * Das Gegenstück zu decodeValue; Nullen werden gemäß der
 * Nullunterdrückung weggelassen, mindestens eine Ziffer bleibt stehen.
 *
 * @throws GerberError (GeometryError) wenn der Wert nicht in die Feldlänge passt
 *
 * @example
 * encodeCoordinateValue(1.235, { zero: 'L', coordinates: 'A', integer: 2, decimal: 5 }) // => '123500'
 * encodeCoordinateValue(-0.5, { zero: 'T', coordinates: 'A', integer: 2, decimal: 4 })  // => '-005'
 */
export function encodeCoordinateValue(value: number, format: FormatSpec): string {
  const scaled = Math.round(value * Math.pow(10, format.decimal));
  if (scaled === 0) {
    return '0';
  }

  const length = fieldLength(format);
  const digits = Math.abs(scaled).toString();
  if (digits.length > length) {
    throw new GerberError(
      'GeometryError',
      `Coordinate ${value} does not fit format ${format.integer}.${format.decimal}`
    );
  }

  let body = digits.padStart(length, '0');
  body = format.zero === 'L' ? body.replace(/^0+/, '') : body.replace(/0+$/, '');

  return (scaled < 0 ? '-' : '') + body;
}

/**
 * Kodiert ein Koordinaten-Token in ein anderes Format um
 *
 * Achsreihenfolge bleibt erhalten. Für eine Konvertierung zwischen
 * Dateien mit unterschiedlichen Format-Spezifikationen.
 *
 * @throws GerberError (ParseError oder GeometryError)
 */
export function reformatCoordinates(token: string, from: FormatSpec, to: FormatSpec): string {
  const decoded = decodeCoordinates(token, from);
  let out = '';

  for (const axis of token.match(/[XYIJ]/g) ?? []) {
    const value = axisValue(decoded, axis);
    if (value !== undefined) {
      out += axis + encodeCoordinateValue(value, to);
    }
  }

  return out;
}

function axisValue(decoded: DecodedCoordinates, axis: string): number | undefined {
  switch (axis) {
    case 'X':
    case 'Y':
      return decoded.position[axis];
    case 'I':
    case 'J':
      return decoded.offset[axis];
    default:
      return undefined;
  }
}
