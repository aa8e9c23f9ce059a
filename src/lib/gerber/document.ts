/**
 * Gerber-Dokument
 *
 * Das Dokument ist der einzige veränderliche Zustand: Format, Einheiten,
 * Apertures, Makros, die geordnete Befehlsliste, der modale Zustand und
 * die Bounding Box. Befehle müssen in der Reihenfolge angehängt werden,
 * in der sie in der Datei stehen würden.
 *
 * Ungültige Eingaben werfen nicht: Methoden geben false (bzw. null)
 * zurück und setzen `error`.
 *
 * @example
 * const doc = new GerberDocument();
 * doc.setFormat({ zero: 'L', coordinates: 'A', integer: 2, decimal: 4 });
 * doc.setUnits('IN');
 * doc.defineAperture({ code: 'D11', type: 'C', modifiers: '0.0100' });
 * doc.appendApertureSelect('D11');
 * if (!doc.appendCommand({ func: 'G01', coord: 'X010000Y010000', op: 'D01' })) {
 *   throw new Error(doc.error ?? 'unknown error');
 * }
 */

import type {
  Aperture,
  ApertureDefinition,
  ApertureLookup,
  BoundingBox,
  CommandInput,
  FormatSpec,
  FormatUpdate,
  GerberFunction,
  GerberOptions,
  ModalState,
  Units,
} from '@/types';
import { buildAperture, checkApertureCode } from './apertures';
import { createBoundaries, toBoundingBox, type Boundaries } from './bounds';
import { GerberError, type GerberErrorKind } from './errors';
import { applyFormatUpdate, createFormatSpec, DEFAULT_UNITS, parseUnits } from './format';
import { createModalState } from './modal-state';
import { sequenceApertureSelect, sequenceCommand, sequenceParam, type SequencerContext } from './sequencer';

export const DEFAULT_GERBER_OPTIONS: Readonly<GerberOptions> = {
  ignoreInvalid: false,
  ignoreBlank: false,
  allowOmittedOperationCode: false,
};

export class GerberDocument {
  private readonly options: GerberOptions;
  private readonly format: FormatSpec = createFormatSpec();
  private units: Units = DEFAULT_UNITS;
  private readonly apertureTable = new Map<string, Aperture>();
  private readonly macroTable = new Map<string, readonly string[]>();
  private records: Readonly<GerberFunction>[] = [];
  private modalState: ModalState = createModalState();
  private bounds: Boundaries = createBoundaries();
  private lastError: { kind: GerberErrorKind; message: string } | null = null;

  constructor(options: Partial<GerberOptions> = {}) {
    this.options = { ...DEFAULT_GERBER_OPTIONS, ...options };
  }

  // ==========================================================================
  // Fehler und Optionen
  // ==========================================================================

  /** Letzter Fehlertext, null wenn noch kein Fehler aufgetreten ist */
  get error(): string | null {
    return this.lastError?.message ?? null;
  }

  get errorKind(): GerberErrorKind | null {
    return this.lastError?.kind ?? null;
  }

  get ignoreInvalid(): boolean {
    return this.options.ignoreInvalid;
  }

  set ignoreInvalid(value: boolean) {
    this.options.ignoreInvalid = value;
  }

  get ignoreBlank(): boolean {
    return this.options.ignoreBlank;
  }

  set ignoreBlank(value: boolean) {
    this.options.ignoreBlank = value;
  }

  get allowOmittedOperationCode(): boolean {
    return this.options.allowOmittedOperationCode;
  }

  set allowOmittedOperationCode(value: boolean) {
    this.options.allowOmittedOperationCode = value;
  }

  // ==========================================================================
  // Format und Einheiten
  // ==========================================================================

  getFormat(): FormatSpec {
    return { ...this.format };
  }

  /**
   * Setzt einzelne Felder der Format-Spezifikation
   *
   * Es wird empfohlen, das Format vor allen Befehlen zu setzen,
   * da es die Auswertung der Koordinaten bestimmt.
   */
  setFormat(update: FormatUpdate): boolean {
    return this.attempt(() => applyFormatUpdate(this.format, update));
  }

  getUnits(): Units {
    return this.units;
  }

  setUnits(units: string): boolean {
    return this.attempt(() => {
      this.units = parseUnits(units);
    });
  }

  // ==========================================================================
  // Apertures und Makros
  // ==========================================================================

  /**
   * Legt eine Aperture an (oder überschreibt sie)
   *
   * Ein Kreis ohne lesbaren Durchmesser wird angelegt, setzt aber einen Fehler.
   */
  defineAperture(definition: ApertureDefinition): boolean {
    return this.attempt(() => {
      const { aperture, warning } = buildAperture(definition);
      this.apertureTable.set(aperture.code, aperture);
      if (warning) {
        this.fail('ApertureError', warning);
      }
    });
  }

  /**
   * Liest eine Aperture
   *
   * @returns Datensatz, leeres Objekt wenn nicht definiert, null bei ungültigem Code
   */
  getAperture(code: string): ApertureLookup | null {
    try {
      checkApertureCode(code);
    } catch (error) {
      this.capture(error);
      return null;
    }
    const aperture = this.apertureTable.get(code);
    return aperture ? { ...aperture } : {};
  }

  apertures(): ReadonlyMap<string, Aperture> {
    return this.apertureTable;
  }

  defineMacro(name: string, primitives: readonly string[]): boolean {
    if (name.length === 0) {
      this.fail('ApertureError', 'Aperture macro requires a name');
      return false;
    }
    this.macroTable.set(name, [...primitives]);
    return true;
  }

  getMacro(name: string): readonly string[] | undefined {
    return this.macroTable.get(name);
  }

  macros(): ReadonlyMap<string, readonly string[]> {
    return this.macroTable;
  }

  // ==========================================================================
  // Befehle
  // ==========================================================================

  /**
   * Hängt einen Befehl an (G-Code, Koordinaten, D-Code, Kommentar)
   */
  appendCommand(input: CommandInput): boolean {
    return this.attempt(() => {
      const record = sequenceCommand(this.context(), this.modalState, input);
      this.records.push(Object.freeze(record));
    });
  }

  /**
   * Wählt eine Aperture aus
   *
   * Auch eine unbekannte Aperture wird angehängt; dann ist `error` gesetzt.
   */
  appendApertureSelect(code: string): boolean {
    const { record, warning } = sequenceApertureSelect(this.context(), this.modalState, code);
    this.records.push(Object.freeze(record));
    if (warning) {
      this.fail('ApertureError', warning);
    }
    return true;
  }

  /**
   * Hängt einen wiederholbaren Parameter an (z.B. 'LPD', 'SRX2Y3I1.0J1.5')
   */
  appendParam(raw: string): boolean {
    return this.attempt(() => {
      this.records.push(Object.freeze(sequenceParam(raw)));
    });
  }

  functions(): readonly Readonly<GerberFunction>[] {
    return [...this.records];
  }

  functionAt(index: number): Readonly<GerberFunction> | null {
    const record = this.records[index];
    if (!Number.isInteger(index) || record === undefined) {
      this.fail('FunctionValidationError', `Invalid function number ${index}`);
      return null;
    }
    return record;
  }

  get functionCount(): number {
    return this.records.length;
  }

  /** Kopie des modalen Zustands */
  get modal(): ModalState {
    return { ...this.modalState, lastPosition: { ...this.modalState.lastPosition } };
  }

  // ==========================================================================
  // Bounding Box
  // ==========================================================================

  /**
   * Box um alle belichteten Daten, null solange nichts belichtet wurde
   */
  boundingBox(): BoundingBox | null {
    return toBoundingBox(this.bounds);
  }

  width(): number {
    const box = this.boundingBox();
    return box ? box.maxX - box.minX : 0;
  }

  height(): number {
    const box = this.boundingBox();
    return box ? box.maxY - box.minY : 0;
  }

  // ==========================================================================
  // Schnittstelle für Konvertierungen
  // ==========================================================================

  /**
   * Überschreibt Koordinaten und/oder Operationscode eines Befehls
   *
   * Die zwischengespeicherte Position wird dabei NICHT neu berechnet;
   * danach muss refreshCoordinates() aufgerufen werden.
   */
  updateCommandData(index: number, data: { coord?: string; op?: string }): boolean {
    const record = this.records[index];
    if (record === undefined || record.kind !== 'command') {
      this.fail('FunctionValidationError', `Function ${index} is not a command`);
      return false;
    }
    this.records[index] = Object.freeze({ ...record, ...data });
    return true;
  }

  /**
   * Spielt alle Befehle mit dem aktuellen Format erneut ab
   *
   * Erneuert die Positions-Caches, den modalen Zustand und die Bounding Box.
   * Schlägt ein Befehl fehl, bleibt das Dokument unverändert.
   */
  refreshCoordinates(): boolean {
    return this.attempt(() => {
      const modal = createModalState();
      const context: SequencerContext = { ...this.context(), bounds: createBoundaries() };

      const records = this.records.map((record): Readonly<GerberFunction> => {
        switch (record.kind) {
          case 'command':
            return Object.freeze(sequenceCommand(context, modal, record));
          case 'aperture':
            return Object.freeze(sequenceApertureSelect(context, modal, record.code).record);
          default:
            return record;
        }
      });

      this.records = records;
      this.modalState = modal;
      this.bounds = context.bounds;
    });
  }

  // ==========================================================================
  // Intern
  // ==========================================================================

  private context(): SequencerContext {
    return {
      format: this.format,
      apertures: this.apertureTable,
      bounds: this.bounds,
      options: this.options,
    };
  }

  private attempt(action: () => void): boolean {
    try {
      action();
      return true;
    } catch (error) {
      this.capture(error);
      return false;
    }
  }

  private capture(error: unknown): void {
    if (!(error instanceof GerberError)) {
      throw error;
    }
    this.fail(error.kind, error.message);
  }

  private fail(kind: GerberErrorKind, message: string): void {
    this.lastError = { kind, message };
  }
}
