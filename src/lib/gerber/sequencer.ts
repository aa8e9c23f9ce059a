/**
 * Befehlsfolge: Validierung und modale Auswertung
 *
 * Jede Funktion bekommt den modalen Zustand explizit übergeben. Geprüft
 * wird vollständig, bevor irgendetwas verändert wird; ein Fehler hinterlässt
 * also keine halben Änderungen an Zustand oder Bounding Box.
 */

import type {
  Aperture,
  ApertureSelectFunction,
  CommandFunction,
  CommandInput,
  FormatSpec,
  GerberOptions,
  ModalState,
  ParamCallFunction,
  Point,
} from '@/types';
import { isBlankAperture } from './apertures';
import { includeArc, includePoint, samePoint, type Boundaries } from './bounds';
import { decodeCoordinates, type DecodedCoordinates } from './coordinates';
import { GerberError } from './errors';
import { applyFunctionCode, isCircularCode, isKnownFunctionCode, normalizeOperation } from './modal-state';

/**
 * Alles, was die Befehlsfolge vom Dokument braucht
 */
export interface SequencerContext {
  format: Readonly<FormatSpec>;
  apertures: ReadonlyMap<string, Aperture>;
  bounds: Boundaries;
  options: Readonly<GerberOptions>;
}

const TOOL_SELECT_CODE = /G54/;

/**
 * Prüft und verarbeitet einen Befehl
 *
 * @returns Der anzuhängende Datensatz (mit aufgelöster Position bei Koordinaten)
 * @throws GerberError (FunctionValidationError, ParseError)
 */
export function sequenceCommand(
  context: SequencerContext,
  modal: ModalState,
  input: CommandInput
): CommandFunction {
  const { func, coord, op, comment } = input;

  if (func !== undefined && !context.options.ignoreInvalid && !isKnownFunctionCode(func)) {
    throw new GerberError('FunctionValidationError', `Invalid function code: ${func}`);
  }

  // G54D10 ist ein veralteter Werkzeugwechsel und darf einen D-Code >= 10 tragen
  if (op !== undefined && normalizeOperation(op) === null && !(func !== undefined && TOOL_SELECT_CODE.test(func))) {
    throw new GerberError('FunctionValidationError', `Invalid operation code: ${op}`);
  }

  let operation = op;
  if (coord !== undefined && op === undefined) {
    if (!isCircularCode(func) && !context.options.allowOmittedOperationCode) {
      throw new GerberError(
        'FunctionValidationError',
        'Operation code must be provided when coordinate data is provided'
      );
    }
    operation = modal.lastOperation ?? 'D01';
  }

  const decoded = coord !== undefined ? decodeCoordinates(coord, context.format) : null;

  if (func !== undefined) {
    applyFunctionCode(modal, func);
  }

  const record: CommandFunction = { kind: 'command' };
  if (func !== undefined) record.func = func;
  if (coord !== undefined) record.coord = coord;
  if (op !== undefined) record.op = op;
  if (comment !== undefined) record.comment = comment;

  if (decoded && operation !== undefined) {
    record.xyCoords = processCoordinates(context, modal, decoded, operation);
  }

  const normalized = op !== undefined ? normalizeOperation(op) : null;
  if (normalized) {
    modal.lastOperation = normalized;
  }

  return record;
}

/**
 * Aperture-Auswahl
 *
 * Eine unbekannte Aperture wird trotzdem ausgewählt und angehängt;
 * der Fehlertext kommt als `warning` zurück.
 */
export function sequenceApertureSelect(
  context: SequencerContext,
  modal: ModalState,
  code: string
): { record: ApertureSelectFunction; warning: string | null } {
  const warning = context.apertures.has(code) ? null : `Invalid/unknown aperture referenced: ${code}`;
  modal.currentAperture = code;
  return { record: { kind: 'aperture', code }, warning };
}

/**
 * Wiederholbarer Parameter, wird unverändert übernommen
 *
 * @throws GerberError (FunctionValidationError) bei leerem Parameter
 */
export function sequenceParam(raw: string): ParamCallFunction {
  if (raw.length === 0) {
    throw new GerberError('FunctionValidationError', 'Parameter call requires a value');
  }
  return { kind: 'param', raw };
}

/**
 * Löst die Position auf, erweitert die Bounding Box und merkt sich die Position
 *
 * - D02: nur bewegen, Box bleibt unverändert
 * - D01: zeichnen; kam davor ein D02, zählt dessen Ziel mit
 * - sonst (D03): Flash an der Position
 */
function processCoordinates(
  context: SequencerContext,
  modal: ModalState,
  decoded: DecodedCoordinates,
  operation: string
): Point {
  const start = modal.lastPosition;
  const position: Point = {
    x: decoded.position.X ?? start.x,
    y: decoded.position.Y ?? start.y,
  };
  const offset: Point = { x: decoded.offset.I ?? 0, y: decoded.offset.J ?? 0 };

  // Bei linearer Interpolation wirken I/J als Verschiebung der Zielposition
  if (modal.interpolation === 'linear') {
    position.x += offset.x;
    position.y += offset.y;
  }

  const code = normalizeOperation(operation);

  if (code === 'D02') {
    modal.lastWasMove = true;
  } else if (code === 'D01') {
    if (modal.lastWasMove) {
      includePoint(context.bounds, start);
      modal.lastWasMove = false;
    }

    const aperture = modal.currentAperture !== null ? context.apertures.get(modal.currentAperture) : undefined;
    if (!context.options.ignoreBlank || !isBlankAperture(aperture)) {
      extendForDraw(context.bounds, modal, start, position, offset);
    }
  } else {
    includePoint(context.bounds, position);
  }

  modal.lastPosition = { x: position.x, y: position.y };
  return { x: position.x, y: position.y };
}

function extendForDraw(bounds: Boundaries, modal: ModalState, start: Point, end: Point, offset: Point): void {
  switch (modal.interpolation) {
    case 'multi-quadrant-arc':
      includeArc(bounds, start, end, offset, modal.arcDirection);
      break;
    case 'single-quadrant-arc':
      // Einzelquadrant: Start gleich Ende ist kein gültiger Bogen
      if (!samePoint(start, end)) {
        includePoint(bounds, end);
      }
      break;
    default:
      includePoint(bounds, end);
  }
}
