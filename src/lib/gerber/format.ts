/**
 * Format-Spezifikation und Einheiten
 *
 * Jedes Feld eines Updates wird einzeln geprüft und sofort übernommen.
 * Schlägt ein Feld fehl, bricht der Aufruf ab: vorher übernommene Felder
 * bleiben gesetzt, das fehlerhafte und alle folgenden nicht.
 */

import type { CoordinateMode, FormatSpec, FormatUpdate, Units, ZeroSuppression } from '@/types';
import { GerberError } from './errors';

/** Größte erlaubte Stellenzahl für Vor- und Nachkommastellen */
export const MAX_FORMAT_DIGITS = 7;

export const DEFAULT_FORMAT: Readonly<FormatSpec> = {
  zero: 'L',
  coordinates: 'A',
  integer: 5,
  decimal: 5,
};

export const DEFAULT_UNITS: Units = 'IN';

/**
 * Erzeugt eine neue Format-Spezifikation mit Standardwerten
 */
export function createFormatSpec(): FormatSpec {
  return { ...DEFAULT_FORMAT };
}

/**
 * Übernimmt ein Teil-Update in die Format-Spezifikation
 *
 * Reihenfolge: zero, coordinates, integer, decimal.
 *
 * @throws GerberError (FormatError) beim ersten ungültigen Feld
 *
 * @example
 * applyFormatUpdate(spec, { zero: 'Leading', integer: 2, decimal: 5 });
 */
export function applyFormatUpdate(spec: FormatSpec, update: FormatUpdate): void {
  if (update.zero !== undefined) {
    spec.zero = parseZeroSuppression(update.zero);
  }

  if (update.coordinates !== undefined) {
    spec.coordinates = parseCoordinateMode(update.coordinates);
  }

  if (update.integer !== undefined) {
    spec.integer = checkDigits('integer', update.integer);
  }

  if (update.decimal !== undefined) {
    spec.decimal = checkDigits('decimal', update.decimal);
  }
}

/**
 * Gesamtlänge eines Koordinatenfelds
 */
export function fieldLength(spec: FormatSpec): number {
  return spec.integer + spec.decimal;
}

/**
 * Prüft ein Einheiten-Token ('IN' oder 'MM')
 *
 * @throws GerberError (ModeError)
 */
export function parseUnits(value: string): Units {
  if (value === 'IN' || value === 'MM') {
    return value;
  }
  throw new GerberError('ModeError', `Invalid mode: ${value}`);
}

function parseZeroSuppression(value: string): ZeroSuppression {
  const first = value.charAt(0).toUpperCase();
  if (first === 'L' || first === 'T') {
    return first;
  }
  throw new GerberError('FormatError', `Invalid zero value: ${value}`);
}

function parseCoordinateMode(value: string): CoordinateMode {
  const first = value.charAt(0).toUpperCase();
  if (first === 'A' || first === 'I') {
    return first;
  }
  throw new GerberError('FormatError', `Invalid coordinates value: ${value}`);
}

function checkDigits(field: 'integer' | 'decimal', value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > MAX_FORMAT_DIGITS) {
    throw new GerberError('FormatError', `Invalid format spec for ${field}: ${value}`);
  }
  return value;
}
