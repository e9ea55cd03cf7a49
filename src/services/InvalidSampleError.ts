import type { EntityType } from '../types/interaction.types';

/**
 * Raised when a transceiver sample carries values outside its domain.
 * Upstream data corruption is surfaced to the caller rather than skipped.
 */
export class InvalidSampleError extends Error {
  public readonly index: number;

  public readonly callsign: string | null;

  public readonly entityType: EntityType | null;

  public readonly issues: string[];

  constructor(
    details: { index: number; callsign: string | null; entityType: EntityType | null; issues: string[] },
  ) {
    const who = details.callsign ?? '<unknown>';
    super(`Invalid ${details.entityType ?? 'transceiver'} sample #${details.index} (${who}): ${details.issues.join('; ')}`);
    this.name = 'InvalidSampleError';
    this.index = details.index;
    this.callsign = details.callsign;
    this.entityType = details.entityType;
    this.issues = details.issues;
    Object.setPrototypeOf(this, InvalidSampleError.prototype);
  }
}
