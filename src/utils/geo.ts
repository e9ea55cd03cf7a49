import type { ProximityClassification } from '../types/interaction.types';

/** Earth mean radius in nautical miles */
export const EARTH_RADIUS_NM = 3440.065;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Great-circle distance in nautical miles using the spherical law of cosines.
 * The acos argument is clamped to [-1, 1]; rounding can push it just past 1
 * for identical or antipodal points.
 */
export function distanceNm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  if (lat1 === lat2 && lon1 === lon2) {
    return 0;
  }

  const phi1 = toRadians(lat1);
  const phi2 = toRadians(lat2);
  const cosine = Math.sin(phi1) * Math.sin(phi2)
    + Math.cos(phi1) * Math.cos(phi2) * Math.cos(toRadians(lon1 - lon2));

  return EARTH_RADIUS_NM * Math.acos(Math.min(1, Math.max(-1, cosine)));
}

export function classifyProximity(distance: number, thresholdNm: number): ProximityClassification {
  return distance <= thresholdNm ? 'WITHIN_RANGE' : 'OUT_OF_RANGE';
}
