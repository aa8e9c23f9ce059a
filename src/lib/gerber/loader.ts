/**
 * Loader - Gerber-Dateien von der Festplatte, aus dem Speicher oder aus ZIP-Archiven
 *
 * Jede Datei wird mit einem eigenen GerberParser eingelesen und als
 * LayerFile zurückgegeben. Ein Parse-Fehler bricht den Stapel nicht ab:
 * das LayerFile trägt dann `document: null` und die Fehlermeldung.
 *
 * Bohrdateien (Excellon) werden erkannt, aber nicht geparst.
 */

import { open } from 'node:fs/promises';
import { basename } from 'node:path';
import { createInterface } from 'node:readline';
import type { GerberLayerType, GerberOptions } from '@/types';
import { generateId, inchToMM } from '@/lib/utils';
import type { GerberDocument } from './document';
import { detectLayerType, isDrillLayer, isGerberFile } from './layer-detector';
import { GerberParser } from './parser';
import { extractZipFile } from './zip-handler';

/**
 * Eine eingelesene Layer-Datei
 */
export interface LayerFile {
  id: string;
  filename: string;
  type: GerberLayerType;
  /** null, wenn das Parsen fehlgeschlagen ist */
  document: GerberDocument | null;
  error: string | null;
}

/**
 * Liest eine Gerber-Datei zeilenweise ein
 *
 * Der Stream wird auf jedem Weg wieder geschlossen, auch wenn das Lesen
 * oder Parsen vorzeitig endet. Lesefehler (z.B. fehlende Datei) werden
 * weitergereicht. Eine Bohrdatei wird nicht gelesen; das LayerFile
 * trägt dann nur den Fehler.
 *
 * @example
 * const layer = await parseGerberFile('./board-F_Cu.gbr');
 * if (!layer.document) console.warn(layer.error);
 */
export async function parseGerberFile(path: string, options: Partial<GerberOptions> = {}): Promise<LayerFile> {
  const filename = basename(path);
  if (isDrillLayer(detectLayerType(filename))) {
    return toLayerFile(filename, null, `Excellon drill data is not supported: ${filename}`);
  }

  const parser = new GerberParser(options);
  const handle = await open(path, 'r');
  const stream = handle.createReadStream({ encoding: 'utf8' });
  const lines = createInterface({ input: stream, crlfDelay: Infinity });

  let document: GerberDocument | null = null;
  try {
    parser.begin();
    let ok = true;
    for await (const line of lines) {
      if (!parser.feedLine(line)) {
        ok = false;
        break;
      }
    }
    document = ok ? parser.finish() : null;
  } finally {
    lines.close();
    stream.destroy();
    await handle.close();
  }

  return toLayerFile(filename, document, parser.error);
}

/**
 * Parst mehrere Dateien aus dem Speicher
 *
 * Nur Namen, die als Gerber-Datei erkannt werden, werden gelesen;
 * Bohrdateien werden übersprungen.
 */
export function parseGerberFiles(
  files: ReadonlyMap<string, string>,
  options: Partial<GerberOptions> = {}
): LayerFile[] {
  const layers: LayerFile[] = [];

  for (const [filename, content] of files) {
    if (!isGerberFile(filename) || isDrillLayer(detectLayerType(filename))) continue;

    const parser = new GerberParser(options);
    layers.push(toLayerFile(filename, parser.parse(content), parser.error));
  }

  return layers;
}

/**
 * Entpackt ein ZIP-Archiv und parst alle enthaltenen Gerber-Dateien
 */
export async function parseGerberArchive(
  data: Uint8Array | ArrayBuffer,
  options: Partial<GerberOptions> = {}
): Promise<LayerFile[]> {
  const { files } = await extractZipFile(data);
  return parseGerberFiles(files, options);
}

/**
 * Breite und Höhe der Bounding Box in Millimetern
 */
export function sizeInMillimeters(document: GerberDocument): { width: number; height: number } {
  const width = document.width();
  const height = document.height();

  if (document.getUnits() === 'MM') {
    return { width, height };
  }
  return { width: inchToMM(width), height: inchToMM(height) };
}

function toLayerFile(filename: string, document: GerberDocument | null, error: string | null): LayerFile {
  if (document) {
    console.log(
      `Parsed ${filename}: ${document.functionCount} functions, ${document.apertures().size} apertures`
    );
  } else {
    console.warn(`Konnte ${filename} nicht parsen: ${error ?? 'unbekannter Fehler'}`);
  }

  return {
    id: generateId(),
    filename,
    type: detectLayerType(filename),
    document,
    error: document ? null : error,
  };
}
