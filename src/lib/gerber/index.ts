/**
 * Gerber Module - Zentrale Export-Datei
 *
 * - Document / Parser / Writer: RS-274X einlesen, auswerten, schreiben
 * - Koordinaten-Codec und Bounding Box
 * - Loader / ZIP-Handler / Layer-Detector: Dateien und Archive
 */

// Kern
export { GerberDocument, DEFAULT_GERBER_OPTIONS } from './document';
export { GerberParser } from './parser';
export { writeGerber, writeFunction } from './writer';
export { GerberError, type GerberErrorKind, type GerberIssue } from './errors';

// Format und Koordinaten
export {
  applyFormatUpdate,
  createFormatSpec,
  fieldLength,
  parseUnits,
  DEFAULT_FORMAT,
  DEFAULT_UNITS,
  MAX_FORMAT_DIGITS,
} from './format';
export {
  decodeCoordinates,
  decodeValue,
  encodeCoordinateValue,
  reformatCoordinates,
  type DecodedCoordinates,
} from './coordinates';
export { arcCandidates, type Boundaries } from './bounds';
export { buildAperture, checkApertureCode, isBlankAperture, parseMacroBody } from './apertures';

// Dateien
export {
  parseGerberFile,
  parseGerberFiles,
  parseGerberArchive,
  sizeInMillimeters,
  type LayerFile,
} from './loader';
export { detectLayerType, isDrillLayer, isGerberFile } from './layer-detector';
export { extractZipFile, type ZipExtractionResult } from './zip-handler';
