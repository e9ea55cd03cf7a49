import type { ControllerType, ProximityRanges } from '../types/interaction.types';

const SUFFIX_TYPES: Record<string, ControllerType> = {
  GND: 'Ground',
  DEL: 'Ground',
  TWR: 'Tower',
  APP: 'Approach',
  DEP: 'Approach',
  CTR: 'Center',
  FSS: 'FSS',
};

/**
 * Controller type from the last three characters of the callsign
 * (e.g. "SY_TWR" -> Tower, "ML_CTR" -> Center). Unknown suffixes fall back to Ground.
 */
export function detectControllerType(callsign: string): ControllerType {
  const suffix = callsign.trim().slice(-3).toUpperCase();
  return SUFFIX_TYPES[suffix] ?? 'Ground';
}

export function proximityThresholdForType(type: ControllerType, ranges: ProximityRanges): number {
  return ranges[type];
}

/**
 * Builds a per-controller threshold policy for the matcher
 */
export function createProximityPolicy(ranges: ProximityRanges): (controllerCallsign: string) => number {
  return (controllerCallsign) => proximityThresholdForType(detectControllerType(controllerCallsign), ranges);
}
