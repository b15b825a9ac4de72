import { describe, it, expect } from 'vitest';
import {
  createColor,
  createOpacity,
  createReflection,
  createTexture,
  REFLECTION_TYPES,
} from '../types/material';
import {
  decodeColor,
  decodeOpacity,
  decodeReflection,
  decodeTexture,
} from './decoders';

describe('decoders', () => {
  describe('decodeColor', () => {
    it('should broadcast a single component to all three', () => {
      const color = decodeColor('0.5', createColor());

      expect(color?.parsed).toBe(true);
      expect(color?.rgb).toEqual({ r: 0.5, g: 0.5, b: 0.5, parsed: true });
    });

    it('should fall back to the first component when the third is missing', () => {
      const color = decodeColor('0.2 0.4', createColor());

      expect(color?.rgb).toEqual({ r: 0.2, g: 0.4, b: 0.2, parsed: true });
    });

    it('should parse all three components', () => {
      const color = decodeColor('0.977692 0.968577 0.945277', createColor());

      expect(color?.rgb).toEqual({ r: 0.977692, g: 0.968577, b: 0.945277, parsed: true });
    });

    it('should decode xyz into the CIE XYZ slot only', () => {
      const color = decodeColor('xyz 0.1 0.2 0.3', createColor());

      expect(color?.xyz).toEqual({ x: 0.1, y: 0.2, z: 0.3, parsed: true });
      expect(color?.rgb.parsed).toBe(false);
      expect(color?.spectral.parsed).toBe(false);
    });

    it('should decode spectral file and factor', () => {
      const color = decodeColor('spectral ident.rfl 2.5', createColor());

      expect(color?.spectral).toEqual({ file: 'ident.rfl', factor: 2.5, parsed: true });
      expect(color?.rgb.parsed).toBe(false);
    });

    it('should keep the default spectral factor when none is given', () => {
      const color = decodeColor('spectral ident.rfl', createColor());

      expect(color?.spectral).toEqual({ file: 'ident.rfl', factor: 1, parsed: true });
    });

    it('should fail on a non-numeric value', () => {
      expect(decodeColor('red', createColor())).toBeNull();
      expect(decodeColor('xyz none', createColor())).toBeNull();
    });

    it('should keep previously parsed slots', () => {
      const rgb = decodeColor('1 0 0', createColor());
      const both = rgb && decodeColor('xyz 0.5', rgb);

      expect(both?.rgb).toEqual({ r: 1, g: 0, b: 0, parsed: true });
      expect(both?.xyz).toEqual({ x: 0.5, y: 0.5, z: 0.5, parsed: true });
    });
  });

  describe('decodeOpacity', () => {
    it('should set halo and factor together', () => {
      expect(decodeOpacity('-halo 0.66', createOpacity())).toEqual({
        d: 0.66,
        halo: true,
        parsed: true,
      });
    });

    it('should decode a bare factor without halo', () => {
      expect(decodeOpacity('0.66', createOpacity())).toEqual({
        d: 0.66,
        halo: false,
        parsed: true,
      });
    });

    it('should fail when -halo has no factor', () => {
      expect(decodeOpacity('-halo', createOpacity())).toBeNull();
    });
  });

  describe('decodeTexture', () => {
    it('should read a plain filename', () => {
      const texture = decodeTexture('wood.png', createTexture());

      expect(texture?.parsed).toBe(true);
      expect(texture?.file).toEqual({ value: 'wood.png', parsed: true });
    });

    it('should keep spaces inside the filename', () => {
      const texture = decodeTexture('textures/my texture.png', createTexture());

      expect(texture?.file.value).toBe('textures/my texture.png');
    });

    it('should read every option in any order', () => {
      const texture = decodeTexture(
        '-blendu off -blendv on -clamp on -bm 0.5 -boost 2 -texres 512 -o 1 2 -s 3 -t 0.1 0.2 0.3 -imfchan l wood.png',
        createTexture()
      );

      expect(texture?.blendu).toEqual({ value: false, parsed: true });
      expect(texture?.blendv).toEqual({ value: true, parsed: true });
      expect(texture?.clamp).toEqual({ value: true, parsed: true });
      expect(texture?.bm).toEqual({ value: 0.5, parsed: true });
      expect(texture?.boost).toEqual({ value: 2, parsed: true });
      expect(texture?.texres).toEqual({ value: 512, parsed: true });
      expect(texture?.o).toEqual({ u: 1, v: 2, w: 1, parsed: true });
      expect(texture?.s).toEqual({ u: 3, v: 3, w: 3, parsed: true });
      expect(texture?.t).toEqual({ u: 0.1, v: 0.2, w: 0.3, parsed: true });
      expect(texture?.imfchan).toEqual({ value: 'l', parsed: true });
      expect(texture?.file).toEqual({ value: 'wood.png', parsed: true });
      expect(texture?.cc.parsed).toBe(false);
    });

    it('should never set -cc from the line', () => {
      const texture = decodeTexture('-cc on tex.png', createTexture());

      expect(texture?.cc).toEqual({ value: false, parsed: false });
      expect(texture?.file).toEqual({ value: 'tex.png', parsed: true });
    });

    it('should keep only the last word of a filename after an unknown option', () => {
      const texture = decodeTexture('-cc on -zzz 1 tex name.png', createTexture());

      expect(texture?.cc.parsed).toBe(false);
      expect(texture?.file).toEqual({ value: 'name.png', parsed: true });
    });

    it('should read base and gain', () => {
      const texture = decodeTexture('-mm 2 3 tex.png', createTexture());

      expect(texture?.mm).toEqual({ base: 2, gain: 3, parsed: true });
      expect(texture?.file.value).toBe('tex.png');
    });

    it('should keep the default gain when only base is given', () => {
      const texture = decodeTexture('-mm 2 tex.png', createTexture());

      expect(texture?.mm).toEqual({ base: 2, gain: 1, parsed: true });
    });

    it('should recover the trailing filename after an unknown option', () => {
      const texture = decodeTexture('-zzz 1 2 3 chrome.png', createTexture());

      expect(texture?.parsed).toBe(true);
      expect(texture?.file).toEqual({ value: 'chrome.png', parsed: true });
    });

    it('should continue with known options after an unknown one', () => {
      const texture = decodeTexture('-zzz 1 -clamp on chrome.png', createTexture());

      expect(texture?.clamp).toEqual({ value: true, parsed: true });
      expect(texture?.file.value).toBe('chrome.png');
    });

    it('should treat an invalid -imfchan as an unknown option', () => {
      const texture = decodeTexture('-imfchan x wood.png', createTexture());

      expect(texture?.imfchan).toEqual({ value: 'm', parsed: false });
      expect(texture?.file.value).toBe('wood.png');
    });

    it('should reject multi-character channels', () => {
      const texture = decodeTexture('-imfchan rgb -clamp on tex.png', createTexture());

      expect(texture?.imfchan.parsed).toBe(false);
      expect(texture?.clamp.value).toBe(true);
      expect(texture?.file.value).toBe('tex.png');
    });

    it('should consume but ignore a switch value other than on/off', () => {
      const texture = decodeTexture('-blendu maybe tex.png', createTexture());

      expect(texture?.blendu).toEqual({ value: true, parsed: false });
      expect(texture?.file.value).toBe('tex.png');
    });

    it('should skip a numeric option whose value is malformed', () => {
      const texture = decodeTexture('-bm x tex.png', createTexture());

      expect(texture?.bm).toEqual({ value: 0, parsed: false });
      expect(texture?.file.value).toBe('tex.png');
    });

    it('should accept options without a filename', () => {
      const texture = decodeTexture('-clamp on', createTexture());

      expect(texture?.parsed).toBe(true);
      expect(texture?.file.parsed).toBe(false);
    });

    it('should fail when nothing is accepted', () => {
      expect(decodeTexture('-blendu maybe', createTexture())).toBeNull();
      expect(decodeTexture('-zzz', createTexture())).toBeNull();
    });

    it('should layer onto the current value', () => {
      const first = decodeTexture('a.png', createTexture());
      const second = first && decodeTexture('-clamp on', first);

      expect(second?.file).toEqual({ value: 'a.png', parsed: true });
      expect(second?.clamp).toEqual({ value: true, parsed: true });
    });
  });

  describe('decodeReflection', () => {
    it('should populate only the selected slot', () => {
      const refl = decodeReflection('-type sphere -mm 0 1 clouds.mpc', createReflection());

      expect(refl?.parsed).toBe(true);
      expect(refl?.sphere.file).toEqual({ value: 'clouds.mpc', parsed: true });
      expect(refl?.sphere.mm).toEqual({ base: 0, gain: 1, parsed: true });

      for (const type of REFLECTION_TYPES.filter((t) => t !== 'sphere')) {
        expect(refl?.[type].parsed).toBe(false);
      }
    });

    it('should accumulate slots across lines', () => {
      const top = decodeReflection('-type cube_top top.png', createReflection());
      const both = top && decodeReflection('-type cube_left left.png', top);

      expect(both?.cube_top.file.value).toBe('top.png');
      expect(both?.cube_left.file.value).toBe('left.png');
      expect(both?.sphere.parsed).toBe(false);
    });

    it('should fail on an unknown type name', () => {
      expect(decodeReflection('-type cylinder x.png', createReflection())).toBeNull();
    });

    it('should fail without -type', () => {
      expect(decodeReflection('sphere.png', createReflection())).toBeNull();
      expect(decodeReflection('-type', createReflection())).toBeNull();
    });
  });
});
