import type { CommunicationType } from '../types/interaction.types';

const HZ_PER_MHZ = 1_000_000;

/**
 * Converts a raw transceiver frequency in Hz to MHz
 */
export function normalizeFrequency(frequencyHz: number): number {
  return frequencyHz / HZ_PER_MHZ;
}

/**
 * Rough service classification from the VHF/HF band the frequency sits in
 */
export function communicationType(frequencyHz: number): CommunicationType {
  if (frequencyHz >= 118_000_000 && frequencyHz <= 136_000_000) {
    if (frequencyHz <= 121_000_000) return 'approach';
    if (frequencyHz <= 123_000_000) return 'departure';
    if (frequencyHz <= 125_000_000) return 'tower';
    if (frequencyHz <= 127_000_000) return 'ground';
    return 'enroute';
  }
  if (frequencyHz >= 20_000_000 && frequencyHz <= 30_000_000) {
    return 'hf_enroute';
  }
  return 'unknown';
}
