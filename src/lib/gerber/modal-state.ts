/**
 * Modaler Zustand
 *
 * Gerber ist zustandsbehaftet: Position, Aperture und Interpolationsmodus
 * gelten weiter, bis ein späterer Befehl sie ändert.
 */

import type { InterpolationMode, ModalState } from '@/types';

/**
 * Erlaubte Funktionscodes (G- und M-Codes)
 */
export const FUNCTION_CODES: ReadonlySet<string> = new Set([
  'G01', 'G1', 'G02', 'G2', 'G03', 'G3', 'G04', 'G4',
  'G36', 'G37', 'G54', 'G55', 'G70', 'G71', 'G74', 'G75',
  'G90', 'G91', 'M00', 'M01', 'M02',
]);

const LINEAR_CODE = /^G0?1$/;
const CLOCKWISE_CODE = /^G0?2$/;
const COUNTER_CLOCKWISE_CODE = /^G0?3$/;
const OPERATION_CODE = /^D0?([123])$/;

export function createModalState(): ModalState {
  return {
    lastPosition: { x: 0, y: 0 },
    currentAperture: null,
    lastWasMove: false,
    interpolation: 'linear',
    arcDirection: 'clockwise',
    quadrantMode: 'multi',
    lastOperation: null,
  };
}

export function isKnownFunctionCode(func: string): boolean {
  return FUNCTION_CODES.has(func);
}

/**
 * G02/G03 (auch ohne führende Null)
 */
export function isCircularCode(func: string | undefined): boolean {
  return func !== undefined && (CLOCKWISE_CODE.test(func) || COUNTER_CLOCKWISE_CODE.test(func));
}

/**
 * Bringt einen Operationscode auf die zweistellige Form ('D2' → 'D02')
 *
 * @returns null, wenn es kein D01/D02/D03 ist
 */
export function normalizeOperation(op: string): string | null {
  const match = OPERATION_CODE.exec(op);
  return match ? `D0${match[1]}` : null;
}

/**
 * Wendet die Nebenwirkungen eines Funktionscodes auf den Interpolationsmodus an
 *
 * - G01: linear
 * - G02/G03: Bogen im Uhrzeigersinn / gegen den Uhrzeigersinn,
 *   Einzel- oder Mehrquadrant je nach zuletzt gesetztem G74/G75
 * - G74/G75: Einzel- bzw. Mehrquadranten-Bogen; der Quadrantenmodus bleibt
 *   für spätere G02/G03 gespeichert
 */
export function applyFunctionCode(modal: ModalState, func: string): void {
  if (LINEAR_CODE.test(func)) {
    modal.interpolation = 'linear';
  } else if (CLOCKWISE_CODE.test(func)) {
    modal.arcDirection = 'clockwise';
    modal.interpolation = arcMode(modal);
  } else if (COUNTER_CLOCKWISE_CODE.test(func)) {
    modal.arcDirection = 'counter-clockwise';
    modal.interpolation = arcMode(modal);
  } else if (func === 'G74' || func === 'G75') {
    modal.quadrantMode = func === 'G74' ? 'single' : 'multi';
    modal.interpolation = arcMode(modal);
  }
}

function arcMode(modal: ModalState): InterpolationMode {
  return modal.quadrantMode === 'single' ? 'single-quadrant-arc' : 'multi-quadrant-arc';
}
