import { describe, expect, it } from 'vitest';
import { buildAperture, checkApertureCode, isBlankAperture, parseMacroBody } from './apertures';

describe('checkApertureCode', () => {
  it('accepts D10 and above', () => {
    expect(() => checkApertureCode('D10')).not.toThrow();
    expect(() => checkApertureCode('D999')).not.toThrow();
  });

  it('rejects reserved and malformed codes', () => {
    expect(() => checkApertureCode('D03')).toThrow('Invalid D-Code: D03');
    expect(() => checkApertureCode('10')).toThrow('Invalid D-Code: 10');
  });
});

describe('buildAperture', () => {
  it('reads the diameter of a circle', () => {
    const { aperture, warning } = buildAperture({ code: 'D10', type: 'C', modifiers: '0.000070' });
    expect(warning).toBeNull();
    expect(aperture).toEqual({ code: 'D10', type: 'C', kind: 'circle', modifiers: '0.000070', diameter: 0.00007 });
  });

  it('reads only the first circle modifier as diameter', () => {
    expect(buildAperture({ code: 'D11', type: 'C', modifiers: '0.5X0.2' }).aperture.diameter).toBe(0.5);
  });

  it('warns about a circle without a diameter', () => {
    const { aperture, warning } = buildAperture({ code: 'D12', type: 'C', modifiers: 'X0.2' });
    expect(aperture.diameter).toBeUndefined();
    expect(warning).toBe('Modifier does not appear to include diameter for circle: X0.2');
  });

  it('treats unknown types as macro references', () => {
    const { aperture } = buildAperture({ code: 'D20', type: 'OC8', modifiers: '0.03' });
    expect(aperture.kind).toBe('macro');
    expect(aperture.diameter).toBeUndefined();
  });

  it('rejects a malformed type token', () => {
    expect(() => buildAperture({ code: 'D10', type: '8C' })).toThrow('Invalid type: 8C');
  });
});

describe('isBlankAperture', () => {
  it('counts missing and zero-diameter apertures as blank', () => {
    expect(isBlankAperture(undefined)).toBe(true);
    expect(isBlankAperture(buildAperture({ code: 'D10', type: 'C', modifiers: '0' }).aperture)).toBe(true);
    expect(isBlankAperture(buildAperture({ code: 'D10', type: 'R', modifiers: '0.1X0.1' }).aperture)).toBe(true);
  });

  it('counts a circle with a diameter as visible', () => {
    expect(isBlankAperture(buildAperture({ code: 'D10', type: 'C', modifiers: '0.01' }).aperture)).toBe(false);
  });
});

describe('parseMacroBody', () => {
  it('splits name and primitives and drops comments', () => {
    expect(parseMacroBody('OC8*0 octagon*5,1,8,0,0,1.08239X$1,22.5*')).toEqual({
      name: 'OC8',
      primitives: ['5,1,8,0,0,1.08239X$1,22.5'],
    });
  });

  it('keeps primitives that merely start with zero digits', () => {
    expect(parseMacroBody('THERM*0.5,1*').primitives).toEqual(['0.5,1']);
  });

  it('rejects a body without a valid name', () => {
    expect(() => parseMacroBody('*1,1,0.5,0,0*')).toThrow('Invalid aperture macro definition: *1,1,0.5,0,0*');
  });
});
