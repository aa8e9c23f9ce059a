/**
 * Layer Detector - Erkennung des Layer-Typs anhand des Dateinamens
 *
 * PCB-CAD-Programme verwenden verschiedene Namenskonventionen für Gerber-Dateien.
 * Die Muster stehen in layer-patterns.json, sortiert nach Priorität:
 * spezifischere Muster (KiCad, Altium, Eagle) kommen vor den generischen.
 *
 * Unterstützt:
 * - KiCad (z.B. board-F_Cu.gbr, board-B_SilkS.gbr)
 * - Altium / Protel (z.B. board.GTL, board.GBS)
 * - Eagle (z.B. board.cmp, board.sol)
 * - Generische Begriffe (top copper, outline, ...)
 */

import type { GerberLayerType } from '@/types';
import patternTable from './layer-patterns.json';

// ============================================================================
// Erkennungsmuster
// ============================================================================

/**
 * Ein Muster zur Layer-Erkennung
 */
interface LayerPattern {
  pattern: RegExp;
  type: GerberLayerType;
  /** CAD-Programm, aus dem die Namenskonvention stammt */
  source: string;
}

const LAYER_TYPES: readonly GerberLayerType[] = [
  'top-copper',
  'bottom-copper',
  'inner-copper',
  'top-soldermask',
  'bottom-soldermask',
  'top-silkscreen',
  'bottom-silkscreen',
  'top-paste',
  'bottom-paste',
  'outline',
  'drill',
  'drill-npth',
  'unknown',
];

function isLayerType(value: string): value is GerberLayerType {
  return LAYER_TYPES.some((type) => type === value);
}

const LAYER_PATTERNS: readonly LayerPattern[] = patternTable.map((entry) => {
  if (!isLayerType(entry.type)) {
    throw new Error(`Unbekannter Layer-Typ in layer-patterns.json: ${entry.type}`);
  }
  return { pattern: new RegExp(entry.pattern, 'i'), type: entry.type, source: entry.source };
});

const GERBER_EXTENSIONS = [
  '.gbr', '.ger', '.pho', '.art',
  '.gtl', '.gbl', '.gts', '.gbs', '.gto', '.gbo', '.gtp', '.gbp', '.gko',
  '.gm1', '.gm2', '.gm3', '.g1', '.g2', '.g3', '.g4',
  '.cmp', '.sol', '.stc', '.sts', '.plc', '.pls', '.crc', '.crs',
];

const DRILL_EXTENSIONS = ['.drl', '.xln', '.exc'];

const KICAD_SUFFIXES = [
  '-f_cu', '-b_cu', '-f_mask', '-b_mask',
  '-f_silks', '-b_silks', '-f_paste', '-b_paste',
  '-edge_cuts', '-pth', '-npth',
];

// ============================================================================
// Öffentliche Funktionen
// ============================================================================

/**
 * Erkennt den Layer-Typ anhand des Dateinamens
 *
 * @returns Der erkannte Layer-Typ oder 'unknown'
 *
 * @example
 * detectLayerType('board-F_Cu.gbr') // => 'top-copper'
 * detectLayerType('board.GBL')       // => 'bottom-copper'
 * detectLayerType('random.xyz')      // => 'unknown'
 */
export function detectLayerType(filename: string): GerberLayerType {
  for (const { pattern, type } of LAYER_PATTERNS) {
    if (pattern.test(filename)) {
      return type;
    }
  }
  return 'unknown';
}

/**
 * Prüft anhand der Endung, ob eine Datei Gerber- oder Bohrdaten enthält
 */
export function isGerberFile(filename: string): boolean {
  const lower = filename.toLowerCase();

  if ([...GERBER_EXTENSIONS, ...DRILL_EXTENSIONS].some((ext) => lower.endsWith(ext))) {
    return true;
  }

  return KICAD_SUFFIXES.some((suffix) => lower.includes(suffix));
}

/**
 * Bohrdaten (Excellon) statt Gerber?
 */
export function isDrillLayer(type: GerberLayerType): boolean {
  return type === 'drill' || type === 'drill-npth';
}
