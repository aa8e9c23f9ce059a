/**
 * Utils - Zentrale Export-Datei für Hilfsfunktionen
 *
 * import { inchToMM, generateId } from '@/lib/utils';
 */

import { v4 as uuidv4 } from 'uuid';

// ============================================================================
// Einheiten-Umrechnung
// ============================================================================

/** Millimeter pro Zoll */
export const MM_PER_INCH = 25.4;

/**
 * Konvertiert Zoll in Millimeter
 */
export function inchToMM(inch: number): number {
  return inch * MM_PER_INCH;
}

// ============================================================================
// Allgemeine Hilfsfunktionen
// ============================================================================

/**
 * Erzeugt eine eindeutige ID (UUID v4)
 */
export function generateId(): string {
  return uuidv4();
}
