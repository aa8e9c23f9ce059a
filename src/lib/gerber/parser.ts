/**
 * Gerber Parser - Zeilenweiser Tokenizer für RS-274X
 *
 * Liest Textzeilen und erzeugt daraus Aufrufe am GerberDocument:
 * - Parameterblöcke (%FS..*%, %MO..*%, %AD..*%, %AM..*%, %LP..*%, %SR..*%),
 *   auch über mehrere Zeilen verteilt
 * - G-Code Befehle, optional mit Koordinaten und D-Code
 * - Aperture-Auswahl (D10 und höher)
 * - Einfache Bewegungen (Koordinaten + D-Code, oder ohne D-Code mit dem
 *   zuletzt verwendeten; veraltet, aber weit verbreitet)
 *
 * Der erste nicht behebbare Fehler bricht das Parsen ab. Die Meldung
 * enthält die Zeilennummer: 'Line 5: ...'.
 *
 * @example
 * const parser = new GerberParser({ ignoreInvalid: true });
 * const doc = parser.parse(content);
 * if (!doc) {
 *   console.warn(parser.error);
 * }
 */

import type { GerberOptions } from '@/types';
import { parseMacroBody } from './apertures';
import { GerberDocument } from './document';
import { GerberError, type GerberErrorKind, type GerberIssue } from './errors';

// ============================================================================
// Zustand
// ============================================================================

/**
 * Zustandsautomat des Tokenizers
 * - idle: normale Zeilen
 * - parameter: ein %-Block ist offen, Zeilen werden gesammelt
 * - ended: M02 gelesen, Rest wird ignoriert
 */
type ParserState =
  | { kind: 'idle' }
  | { kind: 'parameter'; buffer: string; startLine: number }
  | { kind: 'ended' };

// ============================================================================
// Muster
// ============================================================================

const BLANK_LINE = /^\s*\*?\s*$/;
const PARAMETER_OPEN = /^\s*%([^%]*)$/;
const PARAMETER_CLOSE = /%\s*$/;
const PARAMETER_LINE = /^\s*(%[^%]+%\s*)+$/;
const PARAMETER_BLOCK = /%([^%]+)%/g;

const COMMAND = /^(G\d+)(.*)$/;
const COMMAND_DATA = /^(X[+-]?\d+)?(Y[+-]?\d+)?(I[+-]?\d+)?(J[+-]?\d+)?(D\d+)?$/;
const BARE_OPERATION = /^D0|^D\d$/;
const APERTURE_SELECT = /^D[1-9]\d+$/;
const MISC_FUNCTION = /^M\d+$/;
const MOVE_WITH_OPERATION = /^(.+)(D\d+)$/;
const OPERATION_ONLY = /^D0*[1-9]$/;

/**
 * Parameter, die unverändert als wiederholbarer Aufruf übernommen werden
 */
const PASS_THROUGH_PARAMETERS = new Set(['SR', 'TF', 'TA', 'TO', 'TD', 'LM', 'LR', 'LS']);

/**
 * Veraltete Bild-Parameter; nur mit ignoreInvalid erlaubt (werden verworfen)
 */
const DEPRECATED_PARAMETERS = new Set(['IP', 'IN', 'LN', 'OF', 'SF', 'AS', 'MI', 'IR']);

// ============================================================================
// Parser
// ============================================================================

export class GerberParser {
  private readonly options: Partial<GerberOptions>;
  private document: GerberDocument | null = null;
  private state: ParserState = { kind: 'idle' };
  private line = 0;
  private lastOpCode: string | null = null;
  private lastError: GerberIssue | null = null;
  private failed = false;

  constructor(options: Partial<GerberOptions> = {}) {
    this.options = { ...options };
  }

  /** Letzter Fehlertext mit Zeilennummer */
  get error(): string | null {
    return this.lastError?.message ?? null;
  }

  get errorKind(): GerberErrorKind | null {
    return this.lastError?.kind ?? null;
  }

  /** Aktuelle Zeilennummer (1-basiert, 0 vor der ersten Zeile) */
  get lineNumber(): number {
    return this.line;
  }

  /**
   * Parst einen kompletten Text oder eine Liste von Zeilen
   *
   * @returns Das Dokument, oder null bei einem Fehler (siehe `error`)
   */
  parse(data: string | readonly string[]): GerberDocument | null {
    this.begin();
    const lines = typeof data === 'string' ? data.split(/\r\n|\r|\n/) : data;

    for (const line of lines) {
      if (!this.feedLine(line)) {
        return null;
      }
    }

    return this.finish();
  }

  /**
   * Startet ein neues Dokument für zeilenweises Einlesen
   */
  begin(): GerberDocument {
    this.document = new GerberDocument(this.options);
    this.state = { kind: 'idle' };
    this.line = 0;
    this.lastOpCode = null;
    this.lastError = null;
    this.failed = false;
    return this.document;
  }

  /**
   * Verarbeitet eine einzelne Zeile
   *
   * @returns false beim ersten nicht behebbaren Fehler
   */
  feedLine(raw: string): boolean {
    const document = this.document ?? this.begin();
    if (this.failed) {
      return false;
    }

    this.line++;
    const line = raw.replace(/[\r\n]+$/, '');

    if (this.state.kind === 'ended' || BLANK_LINE.test(line)) {
      return true;
    }

    if (this.state.kind === 'parameter') {
      if (!PARAMETER_CLOSE.test(line)) {
        this.state.buffer += line;
        return true;
      }
      const body = this.state.buffer + line.replace(/%/g, '');
      this.state = { kind: 'idle' };
      return this.dispatchParameter(document, body);
    }

    const opening = PARAMETER_OPEN.exec(line);
    if (opening) {
      this.state = { kind: 'parameter', buffer: opening[1], startLine: this.line };
      return true;
    }

    if (PARAMETER_LINE.test(line)) {
      for (const block of line.matchAll(PARAMETER_BLOCK)) {
        if (!this.dispatchParameter(document, block[1])) {
          return false;
        }
      }
      return true;
    }

    return this.dispatchCommands(document, line);
  }

  /**
   * Schließt das Einlesen ab
   *
   * @returns Das Dokument, oder null wenn ein Fehler auftrat oder ein
   * Parameterblock nicht geschlossen wurde
   */
  finish(): GerberDocument | null {
    const document = this.document ?? this.begin();
    if (this.failed) {
      return null;
    }

    if (this.state.kind === 'parameter') {
      this.fail('ParseError', 'Unterminated parameter block', this.state.startLine);
      return null;
    }

    return document;
  }

  // ==========================================================================
  // Befehlszeilen
  // ==========================================================================

  private dispatchCommands(document: GerberDocument, line: string): boolean {
    for (const token of line.split('*')) {
      const command = token.trim();
      if (!command) continue;

      if (COMMAND.test(command)) {
        if (!this.parseCommand(document, command)) return false;
      } else if (BARE_OPERATION.test(command)) {
        if (!this.options.ignoreInvalid) {
          return this.fail('ParseError', `Cannot have operation code alone on line: ${command}`);
        }
        if (!this.parseMove(document, command)) return false;
      } else if (APERTURE_SELECT.test(command)) {
        document.appendApertureSelect(command);
      } else if (command.startsWith('M02')) {
        // Programmende: Rest der Zeile und des Streams wird nicht mehr gelesen
        this.state = { kind: 'ended' };
        return this.apply(document, document.appendCommand({ func: 'M02' }));
      } else if (MISC_FUNCTION.test(command)) {
        if (!this.apply(document, document.appendCommand({ func: command }))) return false;
      } else if (!this.parseMove(document, command)) {
        return false;
      }
    }

    return true;
  }

  private parseCommand(document: GerberDocument, command: string): boolean {
    const match = COMMAND.exec(command);
    if (!match) {
      return this.fail('ParseError', `Invalid command: ${command}`);
    }
    const [, func, rest] = match;

    // Kommentare: der Rest ist Text, keine Koordinaten
    if (func === 'G04' || func === 'G4') {
      return this.apply(document, document.appendCommand({ func, comment: rest }));
    }

    if (rest.length === 0) {
      return this.apply(document, document.appendCommand({ func }));
    }

    // Veralteter Werkzeugwechsel: G54D10
    if (func === 'G54' && APERTURE_SELECT.test(rest)) {
      document.appendApertureSelect(rest);
      return true;
    }

    const data = COMMAND_DATA.exec(rest);
    if (!data) {
      return this.fail('ParseError', `Invalid instruction following command code ${func}: ${rest}`);
    }

    const coord = [data[1], data[2], data[3], data[4]].filter((part) => part !== undefined).join('');
    let op: string | undefined = data[5];
    if (op !== undefined) {
      this.lastOpCode = op;
    } else if (coord && this.lastOpCode !== null) {
      op = this.lastOpCode;
    }

    return this.apply(document, document.appendCommand({ func, coord: coord || undefined, op }));
  }

  private parseMove(document: GerberDocument, command: string): boolean {
    let coord: string | undefined;
    let op: string;

    const withOperation = MOVE_WITH_OPERATION.exec(command);
    if (withOperation) {
      coord = withOperation[1];
      op = withOperation[2];
      this.lastOpCode = op;
    } else if (OPERATION_ONLY.test(command)) {
      op = command;
      this.lastOpCode = op;
    } else if (this.lastOpCode !== null) {
      // D-Code weglassen ist veraltet, wird aber von vielen Tools geschrieben
      op = this.lastOpCode;
      coord = command;
    } else {
      return this.fail('ParseError', `Invalid move instruction: ${command}`);
    }

    return this.apply(document, document.appendCommand({ coord, op }));
  }

  // ==========================================================================
  // Parameter
  // ==========================================================================

  private dispatchParameter(document: GerberDocument, body: string): boolean {
    const trimmed = body.trim();
    if (!trimmed) {
      return true;
    }

    const code = trimmed.slice(0, 2);
    const data = trimmed.slice(2);

    switch (code) {
      case 'FS':
        return this.paramFormat(document, firstStatement(data));
      case 'MO':
        return this.paramMode(document, firstStatement(data));
      case 'AD':
        return this.paramApertureDefinition(document, firstStatement(data));
      case 'AM':
        return this.paramApertureMacro(document, data);
      case 'LP':
        return this.paramPolarity(document, firstStatement(data));
    }

    if (PASS_THROUGH_PARAMETERS.has(code)) {
      return this.apply(document, document.appendParam(code + firstStatement(data)));
    }

    if (this.options.ignoreInvalid) {
      return true;
    }

    if (DEPRECATED_PARAMETERS.has(code)) {
      return this.fail('ParseError', `Deprecated parameter: ${code}${firstStatement(data)}`);
    }
    return this.fail('ParseError', `Unknown parameter: ${code}${firstStatement(data)}`);
  }

  private paramFormat(document: GerberDocument, data: string): boolean {
    const modes = /^([LT])([AI])/i.exec(data);
    // X und Y müssen gleich sein, daher zählt nur X
    const digits = /X(\d)(\d)/.exec(data);
    if (!modes || !digits) {
      return this.fail('ParseError', `Invalid FS parameter value: ${data}`);
    }

    return this.apply(
      document,
      document.setFormat({
        zero: modes[1],
        coordinates: modes[2],
        integer: Number(digits[1]),
        decimal: Number(digits[2]),
      })
    );
  }

  private paramMode(document: GerberDocument, data: string): boolean {
    if (!/^(IN|MM)$/i.test(data)) {
      return this.fail('ParseError', `Invalid MO parameter value: ${data}`);
    }
    return this.apply(document, document.setUnits(data.toUpperCase()));
  }

  private paramApertureDefinition(document: GerberDocument, data: string): boolean {
    const match = /^D(\d+)([a-z_$][a-z0-9_$]*)(.*)$/i.exec(data);
    if (!match) {
      return this.fail('ParseError', `Invalid AD parameter value: ${data}`);
    }

    const number = Number(match[1]);
    if (number < 10) {
      return this.fail('ParseError', `Invalid user-defined aperture number: ${match[1]}, from: ${data}`);
    }

    const modifiers = /,(.*)$/.exec(match[3]);
    return this.apply(
      document,
      document.defineAperture({ code: `D${number}`, type: match[2], modifiers: modifiers ? modifiers[1] : '' })
    );
  }

  private paramApertureMacro(document: GerberDocument, data: string): boolean {
    try {
      const { name, primitives } = parseMacroBody(data);
      return this.apply(document, document.defineMacro(name, primitives));
    } catch (error) {
      if (error instanceof GerberError) {
        return this.fail(error.kind, error.message);
      }
      throw error;
    }
  }

  private paramPolarity(document: GerberDocument, data: string): boolean {
    if (data !== 'D' && data !== 'C') {
      return this.fail('ParseError', `Invalid LP parameter value: ${data}`);
    }
    // Polarität kann oft wechseln, daher als Funktion statt als Einstellung
    return this.apply(document, document.appendParam(`LP${data}`));
  }

  // ==========================================================================
  // Fehler
  // ==========================================================================

  /**
   * Übernimmt bei einem Fehlschlag den Fehler des Dokuments
   */
  private apply(document: GerberDocument, ok: boolean): boolean {
    if (ok) {
      return true;
    }
    return this.fail(document.errorKind ?? 'ParseError', document.error ?? 'Unknown error');
  }

  private fail(kind: GerberErrorKind, message: string, line: number = this.line): false {
    this.lastError = { kind, message: `Line ${line}: ${message}` };
    this.failed = true;
    return false;
  }
}

/**
 * Alles nach dem ersten '*' eines Parameters abschneiden
 */
function firstStatement(data: string): string {
  return data.replace(/\*[\s\S]*$/, '');
}
