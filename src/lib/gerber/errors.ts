/**
 * Fehlerarten beim Lesen und Verändern von Gerber-Daten
 *
 * Nach außen gibt es nur den letzten Fehlertext (plus Art); intern werfen
 * die reinen Hilfsfunktionen (Codec, Encoder) einen GerberError, den das
 * Dokument auffängt und in seinen Fehlerkanal schreibt.
 */

export type GerberErrorKind =
  | 'FormatError'
  | 'ModeError'
  | 'ApertureError'
  | 'FunctionValidationError'
  | 'ParseError'
  | 'GeometryError';

export class GerberError extends Error {
  readonly kind: GerberErrorKind;

  constructor(kind: GerberErrorKind, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
  }
}

/**
 * Ein gemeldeter Fehler: Art und Text
 */
export interface GerberIssue {
  kind: GerberErrorKind;
  message: string;
}
