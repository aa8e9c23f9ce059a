/**
 * Aperture- und Makro-Tabelle
 *
 * Apertures werden über ihren D-Code angesprochen. Codes unter D10 sind
 * für Operationscodes reserviert. Makros werden nur als Liste ihrer
 * Primitive gespeichert, nicht geometrisch ausgewertet.
 */

import type { Aperture, ApertureDefinition, ApertureKind } from '@/types';
import { GerberError } from './errors';

const APERTURE_CODE = /^D(\d+)$/;
const APERTURE_TYPE = /^[a-z_$][a-z0-9_$]*$/i;
const LEADING_NUMBER = /^([0-9.]+)/;

const STANDARD_KINDS: Record<string, ApertureKind> = {
  C: 'circle',
  R: 'rectangle',
  O: 'obround',
  P: 'polygon',
};

/**
 * Prüft einen D-Code für eine Aperture
 *
 * @throws GerberError (ApertureError) bei ungültigem oder reserviertem Code
 */
export function checkApertureCode(code: string): void {
  const match = APERTURE_CODE.exec(code);
  if (!match || Number(match[1]) < 10) {
    throw new GerberError('ApertureError', `Invalid D-Code: ${code}`);
  }
}

/**
 * Erzeugt den Datensatz für eine Aperture-Definition
 *
 * Bei Kreisen wird der Durchmesser aus dem ersten Modifikator gelesen.
 * Fehlt er, wird die Aperture trotzdem angelegt; der Fehlertext kommt
 * als `warning` zurück.
 *
 * @throws GerberError (ApertureError) bei ungültigem Code oder Typ
 */
export function buildAperture(definition: ApertureDefinition): { aperture: Aperture; warning: string | null } {
  checkApertureCode(definition.code);

  if (!APERTURE_TYPE.test(definition.type)) {
    throw new GerberError('ApertureError', `Invalid type: ${definition.type}`);
  }

  const modifiers = definition.modifiers ?? '';
  const aperture: Aperture = {
    code: definition.code,
    type: definition.type,
    kind: STANDARD_KINDS[definition.type] ?? 'macro',
    modifiers,
  };

  let warning: string | null = null;
  if (aperture.kind === 'circle') {
    const match = LEADING_NUMBER.exec(modifiers);
    const diameter = match ? Number(match[1]) : NaN;
    if (Number.isNaN(diameter)) {
      warning = `Modifier does not appear to include diameter for circle: ${modifiers}`;
    } else {
      aperture.diameter = diameter;
    }
  }

  return { aperture, warning };
}

/**
 * Ist die Aperture "geschlossen", also ohne sichtbaren Strich?
 *
 * Unbekannte Apertures und solche ohne Durchmesser gelten als geschlossen.
 */
export function isBlankAperture(aperture: Aperture | undefined): boolean {
  return aperture?.diameter === undefined || aperture.diameter <= 0;
}

/**
 * Zerlegt den Rumpf eines %AM Parameters
 *
 * Der Rumpf ist '<Name>*<Primitiv>*<Primitiv>*...'. Kommentar-Primitive
 * (Nummer 0) werden entfernt, leere Teile ebenso.
 *
 * @example
 * parseMacroBody('OC8*0 octagon*5,1,8,0,0,1.08239X$1,22.5*')
 * // => { name: 'OC8', primitives: ['5,1,8,0,0,1.08239X$1,22.5'] }
 */
export function parseMacroBody(body: string): { name: string; primitives: string[] } {
  const [name, ...parts] = body.split('*');
  const primitives = parts.map((part) => part.trim()).filter((part) => part.length > 0 && !isCommentPrimitive(part));

  if (!name || !APERTURE_TYPE.test(name.trim())) {
    throw new GerberError('ApertureError', `Invalid aperture macro definition: ${body}`);
  }

  return { name: name.trim(), primitives };
}

function isCommentPrimitive(part: string): boolean {
  return /^0(?![\d.])/.test(part);
}
