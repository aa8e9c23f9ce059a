import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import JSZip from 'jszip';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GerberDocument } from './document';
import { parseGerberArchive, parseGerberFile, parseGerberFiles, sizeInMillimeters } from './loader';

const METRIC_BOARD = [
  '%FSLAX24Y24*%',
  '%MOMM*%',
  '%ADD10C,0.1*%',
  'D10*',
  'X0Y0D02*',
  'X254000Y127000D01*',
  'M02*',
].join('\n');

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('loader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gerber-loader-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('parseGerberFile', () => {
    it('reads a file line by line into a layer', async () => {
      const path = join(dir, 'board-F_Cu.gbr');
      await writeFile(path, METRIC_BOARD);

      const layer = await parseGerberFile(path);

      expect(layer.filename).toBe('board-F_Cu.gbr');
      expect(layer.type).toBe('top-copper');
      expect(layer.id).toMatch(UUID);
      expect(layer.error).toBeNull();
      expect(layer.document?.functionCount).toBe(4);
      expect(layer.document?.boundingBox()).toEqual({ minX: 0, minY: 0, maxX: 25.4, maxY: 12.7 });
      expect(console.log).toHaveBeenCalledWith('Parsed board-F_Cu.gbr: 4 functions, 1 apertures');
    });

    it('returns the parser error when the content is invalid', async () => {
      const path = join(dir, 'board.GBL');
      await writeFile(path, '%FSLAX24Y24*%\r\nD02*\r\n');

      const layer = await parseGerberFile(path);

      expect(layer.document).toBeNull();
      expect(layer.error).toBe('Line 2: Cannot have operation code alone on line: D02');
      expect(layer.type).toBe('bottom-copper');
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('passes options to the parser', async () => {
      const path = join(dir, 'board.GBL');
      await writeFile(path, '%FSLAX24Y24*%\nD02*\n');

      const layer = await parseGerberFile(path, { ignoreInvalid: true });

      expect(layer.error).toBeNull();
      expect(layer.document?.functionCount).toBe(1);
    });

    it('reports a drill file as unsupported without parsing it', async () => {
      const path = join(dir, 'board-PTH.drl');
      await writeFile(path, 'M48\nINCH,LZ\nT01C0.035\n%\nT01\nX010000Y010000\nM30\n');

      const layer = await parseGerberFile(path);

      expect(layer.type).toBe('drill');
      expect(layer.document).toBeNull();
      expect(layer.error).toBe('Excellon drill data is not supported: board-PTH.drl');
    });

    it('rejects when the file cannot be opened', async () => {
      await expect(parseGerberFile(join(dir, 'missing.gbr'))).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  describe('parseGerberFiles', () => {
    it('parses only recognized names', () => {
      const layers = parseGerberFiles(
        new Map([
          ['board.GTL', METRIC_BOARD],
          ['notes.txt', 'not gerber'],
        ])
      );

      expect(layers).toHaveLength(1);
      expect(layers[0].filename).toBe('board.GTL');
      expect(layers[0].type).toBe('top-copper');
    });

    it('skips drill files', () => {
      const layers = parseGerberFiles(
        new Map([
          ['board.drl', 'M48\nINCH,LZ\nT01C0.035\n%\nM30\n'],
          ['board.GTL', METRIC_BOARD],
        ])
      );

      expect(layers.map((layer) => layer.filename)).toEqual(['board.GTL']);
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('gives every layer its own id', () => {
      const layers = parseGerberFiles(
        new Map([
          ['board.GTL', METRIC_BOARD],
          ['board.GBL', METRIC_BOARD],
        ])
      );

      expect(layers[0].id).not.toBe(layers[1].id);
    });
  });

  describe('parseGerberArchive', () => {
    it('parses every Gerber entry of an archive', async () => {
      const zip = new JSZip();
      zip.file('out/board-F_Cu.gbr', METRIC_BOARD);
      zip.file('out/board-B_Cu.gbr', '%FSLAX24Y24*%\nD01*\n');
      zip.file('out/board-NPTH.drl', 'M48\nMETRIC\nM30\n');
      const data = await zip.generateAsync({ type: 'uint8array' });

      const layers = await parseGerberArchive(data);
      const byName = new Map(layers.map((layer) => [layer.filename, layer]));

      expect([...byName.keys()].sort()).toEqual(['board-B_Cu.gbr', 'board-F_Cu.gbr']);
      expect(byName.get('board-F_Cu.gbr')?.document).not.toBeNull();
      expect(byName.get('board-B_Cu.gbr')?.error).toBe('Line 2: Cannot have operation code alone on line: D01');
    });
  });

  describe('sizeInMillimeters', () => {
    it('keeps metric sizes', () => {
      const doc = new GerberDocument();
      doc.setFormat({ integer: 2, decimal: 4 });
      doc.setUnits('MM');
      doc.appendCommand({ coord: 'X0Y0', op: 'D02' });
      doc.appendCommand({ coord: 'X254000Y127000', op: 'D01' });

      expect(sizeInMillimeters(doc)).toEqual({ width: 25.4, height: 12.7 });
    });

    it('converts inch sizes', () => {
      const doc = new GerberDocument();
      doc.setFormat({ integer: 2, decimal: 4 });
      doc.appendCommand({ coord: 'X0Y0', op: 'D02' });
      doc.appendCommand({ coord: 'X10000Y20000', op: 'D01' });

      expect(sizeInMillimeters(doc)).toEqual({ width: 25.4, height: 50.8 });
    });

    it('is zero for an empty document', () => {
      expect(sizeInMillimeters(new GerberDocument())).toEqual({ width: 0, height: 0 });
    });
  });
});
