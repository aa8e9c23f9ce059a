/**
 * Gerber Writer - Dokument zurück in RS-274X Text
 *
 * Reihenfolge: Format, Einheiten, Makros, Apertures, dann alle Befehle
 * in der Reihenfolge, in der sie angehängt wurden. Am Ende steht M02.
 */

import type { GerberFunction } from '@/types';
import type { GerberDocument } from './document';

/**
 * Erzeugt den Dateiinhalt für ein Dokument
 *
 * @example
 * const text = writeGerber(doc);
 * await writeFile('board.gbr', text);
 */
export function writeGerber(document: GerberDocument): string {
  const lines: string[] = [];
  const format = document.getFormat();
  const digits = `${format.integer}${format.decimal}`;

  lines.push(`%FS${format.zero}${format.coordinates}X${digits}Y${digits}*%`);
  lines.push(`%MO${document.getUnits()}*%`);

  for (const [name, primitives] of document.macros()) {
    lines.push(`%AM${name}*`);
    for (const primitive of primitives) {
      lines.push(`${primitive}*`);
    }
    lines.push('%');
  }

  for (const aperture of document.apertures().values()) {
    const modifiers = aperture.modifiers ? `,${aperture.modifiers}` : '';
    lines.push(`%AD${aperture.code}${aperture.type}${modifiers}*%`);
  }

  const functions = document.functions();
  for (const fn of functions) {
    lines.push(writeFunction(fn));
  }

  const last = functions[functions.length - 1];
  if (!(last?.kind === 'command' && last.func === 'M02')) {
    lines.push('M02*');
  }

  return lines.join('\n') + '\n';
}

/**
 * Eine einzelne Funktion als Textzeile
 */
export function writeFunction(fn: Readonly<GerberFunction>): string {
  switch (fn.kind) {
    case 'aperture':
      return `${fn.code}*`;
    case 'param':
      return `%${fn.raw}*%`;
    case 'command':
      return `${fn.func ?? ''}${fn.comment ?? ''}${fn.coord ?? ''}${fn.op ?? ''}*`;
  }
}
