import JSZip from 'jszip';
import { describe, expect, it } from 'vitest';
import { extractZipFile } from './zip-handler';

async function buildArchive(entries: Record<string, string>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [path, content] of Object.entries(entries)) {
    zip.file(path, content);
  }
  return zip.generateAsync({ type: 'uint8array' });
}

describe('extractZipFile', () => {
  it('keeps Gerber entries and skips everything else', async () => {
    const data = await buildArchive({
      'gerber/board-F_Cu.gbr': 'G04 top*\nM02*\n',
      'gerber/board.drl': 'M48\n',
      'gerber/readme.txt': 'hello',
      '__MACOSX/gerber/._board-F_Cu.gbr': 'resource fork',
    });

    const result = await extractZipFile(data);

    expect([...result.gerberFiles].sort()).toEqual(['board-F_Cu.gbr', 'board.drl']);
    expect(result.files.get('board-F_Cu.gbr')).toBe('G04 top*\nM02*\n');
    expect([...result.skippedFiles].sort()).toEqual(['._board-F_Cu.gbr', 'readme.txt']);
  });

  it('rejects data that is not an archive', async () => {
    await expect(extractZipFile(Buffer.from('not a zip'))).rejects.toThrow();
  });
});
