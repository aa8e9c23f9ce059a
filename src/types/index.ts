/**
 * Photoplot Codec - Typdefinitionen
 *
 * Diese Datei enthält alle TypeScript-Interfaces und Types,
 * die im gesamten Dokumentmodell verwendet werden.
 *
 * Wichtige Konzepte:
 * - FormatSpec: Wie Koordinaten-Token zu lesen sind (Stellen, Nullunterdrückung)
 * - Aperture: Ein "Werkzeug", das vor Zeichen-/Flash-Befehlen gewählt wird
 * - GerberFunction: Ein Eintrag in der geordneten Befehlsliste des Dokuments
 * - ModalState: Der Zustand, der von Befehl zu Befehl weiterlebt
 */

// ============================================================================
// Einheiten und Koordinaten
// ============================================================================

/**
 * Maßeinheit eines Dokuments (%MO Parameter)
 */
export type Units = 'IN' | 'MM';

/**
 * 2D-Punkt mit X und Y Koordinaten
 * Werte sind in den Einheiten des Dokuments angegeben
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Rechteckige Bounding Box (Begrenzungsrahmen)
 * Definiert die äußeren Grenzen eines Objekts
 */
export interface BoundingBox {
  /** Linke Kante (kleinster X-Wert) */
  minX: number;
  /** Untere Kante (kleinster Y-Wert) */
  minY: number;
  /** Rechte Kante (größter X-Wert) */
  maxX: number;
  /** Obere Kante (größter Y-Wert) */
  maxY: number;
}

// ============================================================================
// Format-Spezifikation
// ============================================================================

/**
 * Nullunterdrückung
 * - L: führende Nullen werden weggelassen
 * - T: nachfolgende Nullen (Nachkommastellen) werden weggelassen
 */
export type ZeroSuppression = 'L' | 'T';

/**
 * Koordinatenmodus
 * - A: absolut
 * - I: inkrementell (wird akzeptiert, aber nicht weiter unterstützt)
 */
export type CoordinateMode = 'A' | 'I';

/**
 * Format-Spezifikation (%FS Parameter)
 *
 * X und Y teilen sich dieselben Stellenzahlen (per Konvention auch I und J).
 */
export interface FormatSpec {
  zero: ZeroSuppression;
  coordinates: CoordinateMode;
  /** Vorkommastellen (0-7) */
  integer: number;
  /** Nachkommastellen (0-7) */
  decimal: number;
}

/**
 * Teil-Update der Format-Spezifikation
 *
 * zero/coordinates akzeptieren jedes Wort, das mit dem Kennbuchstaben
 * beginnt ('L', 'Lead', 'Leading').
 */
export interface FormatUpdate {
  zero?: string;
  coordinates?: string;
  integer?: number;
  decimal?: number;
}

// ============================================================================
// Apertures und Makros
// ============================================================================

/**
 * Form einer Aperture
 * Alles, was kein Standard-Typ ist, verweist auf ein Aperture-Makro
 */
export type ApertureKind = 'circle' | 'rectangle' | 'obround' | 'polygon' | 'macro';

/**
 * Aperture - das "Werkzeug" im Gerber-Format
 *
 * Wie bei einem Plotter, der mit verschiedenen Stiften zeichnet:
 * - C: Runder Stift/Pad
 * - R: Rechteckiges Pad
 * - O: Abgerundetes Rechteck (Oval)
 * - P: Vieleck
 * - alles andere: Name eines Makros
 */
export interface Aperture {
  /** D-Code, z.B. 'D10' */
  code: string;
  /** Typ-Token wie in der Datei ('C', 'R', 'OC8', ...) */
  type: string;
  kind: ApertureKind;
  /** Modifikatoren unverändert, z.B. '0.0100' oder '0.06X0.03' */
  modifiers: string;
  /** Durchmesser, nur für Kreise */
  diameter?: number;
}

/**
 * Eingabe für eine Aperture-Definition
 */
export interface ApertureDefinition {
  code: string;
  type: string;
  modifiers?: string;
}

/**
 * Ergebnis einer Aperture-Abfrage: Datensatz oder leerer Datensatz,
 * wenn der Code (noch) nicht definiert ist
 */
export type ApertureLookup = Aperture | Record<string, never>;

// ============================================================================
// Befehle (Functions)
// ============================================================================

/**
 * Aperture-Auswahl, z.B. 'D10*'
 */
export interface ApertureSelectFunction {
  kind: 'aperture';
  code: string;
}

/**
 * Wiederholbarer Parameter wie Polarität (LPD) oder Step & Repeat (SR...)
 */
export interface ParamCallFunction {
  kind: 'param';
  raw: string;
}

/**
 * Ein eigentlicher Befehl
 *
 * Jede Kombination ist möglich: G-Code allein, Koordinaten mit D-Code,
 * G-Code mit Koordinaten, G04 mit Kommentar.
 */
export interface CommandFunction {
  kind: 'command';
  /** G- oder M-Code */
  func?: string;
  /** Koordinaten-Token, z.B. 'X123500Y001250' */
  coord?: string;
  /** Operationscode D01/D02/D03 */
  op?: string;
  comment?: string;
  /** Aufgelöste Position (Cache, nur bei Koordinaten) */
  xyCoords?: Point;
}

export type GerberFunction = ApertureSelectFunction | ParamCallFunction | CommandFunction;

/**
 * Eingabe für einen Befehl
 */
export interface CommandInput {
  func?: string;
  coord?: string;
  op?: string;
  comment?: string;
}

// ============================================================================
// Modaler Zustand
// ============================================================================

/**
 * Interpolationsmodus für D01
 */
export type InterpolationMode = 'linear' | 'single-quadrant-arc' | 'multi-quadrant-arc';

/**
 * Drehrichtung für Bögen
 */
export type ArcDirection = 'clockwise' | 'counter-clockwise';

/**
 * Quadrantenmodus (G74/G75), gilt für den nächsten Bogen
 */
export type QuadrantMode = 'single' | 'multi';

/**
 * Zustand, der von Befehl zu Befehl weiterlebt
 */
export interface ModalState {
  /** Letzte aufgelöste Position, Start ist der Ursprung */
  lastPosition: Point;
  /** Aktuelle Aperture (D-Code) */
  currentAperture: string | null;
  /** War der letzte Operationscode ein D02? */
  lastWasMove: boolean;
  interpolation: InterpolationMode;
  arcDirection: ArcDirection;
  quadrantMode: QuadrantMode;
  /** Letzter verwendeter Operationscode (für Bögen ohne D-Code) */
  lastOperation: string | null;
}

// ============================================================================
// Konfiguration
// ============================================================================

/**
 * Optionen für Dokument und Parser
 */
export interface GerberOptions {
  /** Ungültige/veraltete G-Codes und Parameter ignorieren statt Fehler */
  ignoreInvalid: boolean;
  /** Zeichnen mit geschlossener Aperture nicht in die Bounding Box aufnehmen */
  ignoreBlank: boolean;
  /** Koordinaten ohne D-Code bei jedem Befehl erlauben (nicht nur bei Bögen) */
  allowOmittedOperationCode: boolean;
}

// ============================================================================
// Layer-Dateien
// ============================================================================

/**
 * Typen von Gerber-Layern
 *
 * Diese entsprechen den Standard-Layern in PCB-Designs:
 * - copper: Kupferschichten (Leiterbahnen)
 * - soldermask: Lötstopplack
 * - silkscreen: Bestückungsdruck
 * - paste: Lötpaste (Schablone)
 * - outline: Board-Kontur
 * - drill: Bohrungen (Excellon)
 */
export type GerberLayerType =
  | 'top-copper'
  | 'bottom-copper'
  | 'inner-copper'
  | 'top-soldermask'
  | 'bottom-soldermask'
  | 'top-silkscreen'
  | 'bottom-silkscreen'
  | 'top-paste'
  | 'bottom-paste'
  | 'outline'
  | 'drill'
  | 'drill-npth' // Non-plated through hole
  | 'unknown';
