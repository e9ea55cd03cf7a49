import {
  createProximityPolicy,
  detectControllerType,
  proximityThresholdForType,
} from '../controllerType';
import type { ProximityRanges } from '../../types/interaction.types';

const ranges: ProximityRanges = {
  Ground: 15,
  Tower: 15,
  Approach: 60,
  Center: 400,
  FSS: 1000,
};

describe('controller type detection', () => {
  it.each([
    ['SY_GND', 'Ground'],
    ['SY_DEL', 'Ground'],
    ['AD_TWR', 'Tower'],
    ['SY_APP', 'Approach'],
    ['BN_DEP', 'Approach'],
    ['ML-GUN_CTR', 'Center'],
    ['AU_FSS', 'FSS'],
  ])('maps %s to %s', (callsign, expected) => {
    expect(detectControllerType(callsign)).toBe(expected);
  });

  it('ignores case and surrounding whitespace', () => {
    expect(detectControllerType(' ml_ctr ')).toBe('Center');
  });

  it('falls back to Ground for unknown suffixes', () => {
    expect(detectControllerType('SY_ATIS')).toBe('Ground');
    expect(detectControllerType('OBS')).toBe('Ground');
  });

  it('looks up the range for a type', () => {
    expect(proximityThresholdForType('Approach', ranges)).toBe(60);
  });

  it('builds a per-callsign threshold policy', () => {
    const policy = createProximityPolicy(ranges);
    expect(policy('AD_TWR')).toBe(15);
    expect(policy('ML-GUN_CTR')).toBe(400);
    expect(policy('AU_FSS')).toBe(1000);
  });
});
