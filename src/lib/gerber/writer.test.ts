import { describe, expect, it } from 'vitest';
import { GerberDocument } from './document';
import { GerberParser } from './parser';
import { writeFunction, writeGerber } from './writer';

function createBoard(): GerberDocument {
  const doc = new GerberDocument();
  doc.setFormat({ integer: 2, decimal: 4 });
  doc.setUnits('MM');
  doc.defineMacro('OC8', ['5,1,8,0,0,1.08239X$1,22.5']);
  doc.defineAperture({ code: 'D10', type: 'C', modifiers: '0.01' });
  doc.defineAperture({ code: 'D11', type: 'OC8', modifiers: '0.03' });
  doc.appendCommand({ func: 'G04', comment: ' board outline' });
  doc.appendParam('LPD');
  doc.appendApertureSelect('D10');
  doc.appendCommand({ func: 'G01', coord: 'X0Y0', op: 'D02' });
  doc.appendCommand({ coord: 'X10000Y0', op: 'D01' });
  return doc;
}

const BOARD_TEXT = [
  '%FSLAX24Y24*%',
  '%MOMM*%',
  '%AMOC8*',
  '5,1,8,0,0,1.08239X$1,22.5*',
  '%',
  '%ADD10C,0.01*%',
  '%ADD11OC8,0.03*%',
  'G04 board outline*',
  '%LPD*%',
  'D10*',
  'G01X0Y0D02*',
  'X10000Y0D01*',
  'M02*',
  '',
].join('\n');

describe('writeGerber', () => {
  it('writes header, tables and functions in order', () => {
    expect(writeGerber(createBoard())).toBe(BOARD_TEXT);
  });

  it('does not repeat a closing M02', () => {
    const doc = new GerberDocument();
    doc.appendCommand({ func: 'M02' });
    expect(writeGerber(doc)).toBe('%FSLAX55Y55*%\n%MOIN*%\nM02*\n');
  });

  it('produces text the parser reads back into the same functions', () => {
    const original = createBoard();
    const parsed = new GerberParser().parse(writeGerber(original));

    expect(parsed).not.toBeNull();
    if (!parsed) return;

    expect(parsed.functions().slice(0, -1)).toEqual(original.functions());
    expect(parsed.boundingBox()).toEqual(original.boundingBox());
    expect(writeGerber(parsed)).toBe(BOARD_TEXT);
  });
});

describe('writeFunction', () => {
  it('writes each kind of function', () => {
    expect(writeFunction({ kind: 'aperture', code: 'D12' })).toBe('D12*');
    expect(writeFunction({ kind: 'param', raw: 'SRX2Y3I1.0J1.5' })).toBe('%SRX2Y3I1.0J1.5*%');
    expect(writeFunction({ kind: 'command', func: 'G03', coord: 'X0Y0I10000J0', op: 'D01' })).toBe(
      'G03X0Y0I10000J0D01*'
    );
  });
});
