import { describe, it, expect } from 'vitest';
import {
  CLOUDSIGMA_REGIONS,
  REGION_CODES,
  isRegionCode,
  listRegions,
  resolveRegion,
} from '../src/regions.js';
import { ConfigurationError } from '../src/errors.js';

describe('regions', () => {
  it('should know every CloudSigma location', () => {
    expect(REGION_CODES).toEqual([
      'crk', 'dub', 'fra', 'gva', 'hnl', 'lla', 'mel', 'mnl',
      'mnl2', 'per', 'ruh', 'sjc', 'tyo', 'wdc', 'zrh',
    ]);
  });

  it('should resolve every code to its table endpoint', () => {
    for (const code of REGION_CODES) {
      const region = resolveRegion(code);
      expect(region.code).toBe(code);
      expect(region.endpoint).not.toBe('');
      expect(region.endpoint).toBe(CLOUDSIGMA_REGIONS[code].endpoint);
    }
  });

  it('should map partner-operated locations to their own hosts', () => {
    expect(resolveRegion('dub').endpoint).toBe('https://ec.servecentric.com/api/2.0/');
    expect(resolveRegion('lla').endpoint).toBe('https://cloud.hydro66.com/api/2.0/');
    expect(resolveRegion('zrh').endpoint).toBe('https://zrh.cloudsigma.com/api/2.0/');
  });

  it('should match codes case-insensitively', () => {
    expect(resolveRegion('ZRH')).toEqual({
      code: 'zrh',
      location: 'Zurich, Switzerland',
      endpoint: 'https://zrh.cloudsigma.com/api/2.0/',
    });
  });

  it('should reject unknown codes with a configuration error', () => {
    expect(() => resolveRegion('mars')).toThrow(ConfigurationError);
    expect(() => resolveRegion('mars')).toThrow('Invalid region: mars');

    try {
      resolveRegion('mars');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.field).toBe('cloudsigma_region');
        expect(err.statusCode).toBe(400);
        expect(err.suggestion).toContain('zrh');
      }
    }
  });

  it('should not treat inherited object keys as regions', () => {
    expect(isRegionCode('toString')).toBe(false);
    expect(isRegionCode('constructor')).toBe(false);
    expect(isRegionCode('fra')).toBe(true);
  });

  it('should list regions in table order', () => {
    const regions = listRegions();
    expect(regions).toHaveLength(15);
    expect(regions[0]).toEqual({
      code: 'crk',
      location: 'Clark, Philippines',
      endpoint: 'https://crk.cloudsigma.com/api/2.0/',
    });
  });
});
