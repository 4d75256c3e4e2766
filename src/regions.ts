import { ConfigurationError } from './errors.js';

export interface CloudSigmaRegion {
  code: string;
  location: string;
  endpoint: string;
}

/**
 * CloudSigma public cloud locations and their API endpoints.
 *
 * @see https://docs.cloudsigma.com/en/latest/general.html#api-endpoint
 */
export const CLOUDSIGMA_REGIONS = {
  crk: { location: 'Clark, Philippines', endpoint: 'https://crk.cloudsigma.com/api/2.0/' },
  dub: { location: 'Dublin, Ireland', endpoint: 'https://ec.servecentric.com/api/2.0/' },
  fra: { location: 'Frankfurt, Germany', endpoint: 'https://fra.cloudsigma.com/api/2.0/' },
  gva: { location: 'Geneva, Switzerland', endpoint: 'https://gva.cloudsigma.com/api/2.0/' },
  hnl: { location: 'Honolulu, United States', endpoint: 'https://hnl.cloudsigma.com/api/2.0/' },
  lla: { location: 'Boden, Sweden', endpoint: 'https://cloud.hydro66.com/api/2.0/' },
  mel: { location: 'Melbourne, Australia', endpoint: 'https://mel.cloudsigma.com/api/2.0/' },
  mnl: { location: 'Manila, Philippines', endpoint: 'https://mnl.cloudsigma.com/api/2.0/' },
  mnl2: { location: 'Manila-2, Philippines', endpoint: 'https://mnl2.cloudsigma.com/api/2.0/' },
  per: { location: 'Perth, Australia', endpoint: 'https://per.cloudsigma.com/api/2.0/' },
  ruh: { location: 'Riyadh, Saudi Arabia', endpoint: 'https://ruh.cloudsigma.com/api/2.0/' },
  sjc: { location: 'San Jose, United States', endpoint: 'https://sjc.cloudsigma.com/api/2.0/' },
  tyo: { location: 'Tokyo, Japan', endpoint: 'https://tyo.cloudsigma.com/api/2.0/' },
  wdc: { location: 'Washington DC, United States', endpoint: 'https://wdc.cloudsigma.com/api/2.0/' },
  zrh: { location: 'Zurich, Switzerland', endpoint: 'https://zrh.cloudsigma.com/api/2.0/' },
} as const satisfies Record<string, Omit<CloudSigmaRegion, 'code'>>;

export type CloudSigmaRegionCode = keyof typeof CLOUDSIGMA_REGIONS;

export const REGION_CODES: CloudSigmaRegionCode[] = Object.keys(CLOUDSIGMA_REGIONS).filter(isRegionCode);

export function isRegionCode(value: string): value is CloudSigmaRegionCode {
  return Object.prototype.hasOwnProperty.call(CLOUDSIGMA_REGIONS, value);
}

/** Resolve a region code (case-insensitive) to its table entry. */
export function resolveRegion(code: string): CloudSigmaRegion {
  const normalized = code.toLowerCase();
  if (!isRegionCode(normalized)) {
    throw new ConfigurationError(`Invalid region: ${normalized}`, {
      field: 'cloudsigma_region',
      suggestion: `Use one of: ${REGION_CODES.join(', ')}`,
    });
  }
  return { code: normalized, ...CLOUDSIGMA_REGIONS[normalized] };
}

export function listRegions(): CloudSigmaRegion[] {
  return REGION_CODES.map(code => ({ code, ...CLOUDSIGMA_REGIONS[code] }));
}
