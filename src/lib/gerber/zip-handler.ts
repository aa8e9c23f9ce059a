/**
 * ZIP Handler - Verarbeitung von ZIP-Archiven mit Gerber-Dateien
 *
 * Die meisten PCB-CAD-Programme exportieren Gerber-Dateien als ZIP-Archiv.
 * Dieses Modul extrahiert die Dateien und bereitet sie für das Parsing vor.
 */

import JSZip from 'jszip';
import { isGerberFile } from './layer-detector';

/**
 * Ergebnis der ZIP-Extraktion
 */
export interface ZipExtractionResult {
  /** Map von Dateiname zu Inhalt (nur Gerber- und Bohrdateien) */
  files: Map<string, string>;
  /** Liste aller gefundenen Gerber-Dateien */
  gerberFiles: string[];
  /** Liste von Dateien, die übersprungen wurden */
  skippedFiles: string[];
}

/**
 * Extrahiert Dateien aus einem ZIP-Archiv
 *
 * @param data - Inhalt des Archivs (z.B. aus fs.readFile)
 *
 * @example
 * const result = await extractZipFile(await readFile('board.zip'));
 * console.log(`Gefunden: ${result.gerberFiles.length} Gerber-Dateien`);
 */
export async function extractZipFile(data: Uint8Array | ArrayBuffer): Promise<ZipExtractionResult> {
  const zip = await JSZip.loadAsync(data);

  const files = new Map<string, string>();
  const gerberFiles: string[] = [];
  const skippedFiles: string[] = [];

  for (const [path, zipEntry] of Object.entries(zip.files)) {
    if (zipEntry.dir) continue;

    // Nur den Dateinamen (ohne Ordnerpfad)
    const filename = path.split('/').pop() || path;

    // Versteckte Dateien überspringen (z.B. __MACOSX)
    if (filename.startsWith('.') || path.includes('__MACOSX')) {
      skippedFiles.push(filename);
      continue;
    }

    if (!isGerberFile(filename)) {
      skippedFiles.push(filename);
      continue;
    }

    try {
      const content = await zipEntry.async('string');
      files.set(filename, content);
      gerberFiles.push(filename);
    } catch (error) {
      console.warn(`Konnte ${filename} nicht lesen:`, error);
      skippedFiles.push(filename);
    }
  }

  return { files, gerberFiles, skippedFiles };
}
