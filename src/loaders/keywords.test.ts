import { describe, it, expect } from 'vitest';
import { createMaterial } from '../types/material';
import { FIELD_KEYWORDS, KEYWORD_HANDLERS } from './keywords';

describe('keyword table', () => {
  it('should cover every field keyword', () => {
    expect([...FIELD_KEYWORDS].sort()).toEqual(
      [
        'Kd', 'Ka', 'Ks', 'Tf', 'Ns', 'map_Kd', 'map_Ka', 'map_Ks', 'map_Ns',
        'map_Pr', 'map_Pm', 'map_Ps', 'map_d', 'map_bump', 'map_Po', 'sharpness',
        'd', 'disp', 'decal', 'bump', 'illum', 'Ni', 'Tr', 'refl', 'Ke', 'Pr',
        'Pm', 'Ps', 'Pc', 'Pcr', 'aniso', 'anisor', 'map_Ke', 'norm', 'map_RMA',
        'map_ORM',
      ].sort()
    );
  });

  it('should route a value to its field', () => {
    const material = createMaterial();
    const handler = KEYWORD_HANDLERS.get('Ni');

    expect(handler?.(material, ' 1.45')).toBe(true);
    expect(material.Ni).toEqual({ value: 1.45, parsed: true });
  });

  it('should decode illum as an integer', () => {
    const material = createMaterial();

    expect(KEYWORD_HANDLERS.get('illum')?.(material, '2')).toBe(true);
    expect(material.illum).toEqual({ value: 2, parsed: true });
  });

  it('should leave the field untouched when decoding fails', () => {
    const material = createMaterial();
    KEYWORD_HANDLERS.get('map_Kd')?.(material, 'a.png');

    expect(KEYWORD_HANDLERS.get('map_Kd')?.(material, '-blendu maybe')).toBe(false);
    expect(KEYWORD_HANDLERS.get('sharpness')?.(material, 'high')).toBe(false);

    expect(material.map_Kd.file).toEqual({ value: 'a.png', parsed: true });
    expect(material.map_Kd.blendu.parsed).toBe(false);
    expect(material.sharpness).toEqual({ value: 60, parsed: false });
  });
});
