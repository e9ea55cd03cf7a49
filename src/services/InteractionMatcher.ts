import type {
  AnalysisWindow,
  EntityType,
  InteractionMatch,
  MatchInput,
  MatcherOptions,
  TransceiverSample,
} from '../types/interaction.types';
import {
  analysisWindowSchema,
  formatIssues,
  matcherOptionsSchema,
  transceiverSampleSchema,
} from '../schemas/interaction.schemas';
import { classifyProximity, distanceNm } from '../utils/geo';
import { normalizeFrequency } from '../utils/frequency';
import { isWithinInterval, timeDiffSeconds, withinWindow } from '../utils/timeWindow';
import { ConfigurationError } from './ConfigurationError';
import { InvalidSampleError } from './InvalidSampleError';

export const compareStrings = (a: string, b: string): number => {
  if (a === b) return 0;
  return a < b ? -1 : 1;
};

/**
 * Match order: flight sample time, then controller sample time.
 * Callsigns and frequency break the remaining ties so output is fully deterministic.
 */
export function compareMatches(a: InteractionMatch, b: InteractionMatch): number {
  return (a.flightTime.getTime() - b.flightTime.getTime())
    || (a.controllerTime.getTime() - b.controllerTime.getTime())
    || compareStrings(a.controllerCallsign, b.controllerCallsign)
    || compareStrings(a.flightCallsign, b.flightCallsign)
    || (a.frequencyHz - b.frequencyHz);
}

export function validateWindow(window: AnalysisWindow): void {
  const parsed = analysisWindowSchema.safeParse(window);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error).map((issue) => `window.${issue}`));
  }
}

function validateSamples(
  samples: readonly TransceiverSample[],
  expected: EntityType,
): void {
  samples.forEach((sample, index) => {
    const parsed = transceiverSampleSchema.safeParse(sample);
    const issues = parsed.success ? [] : formatIssues(parsed.error);
    if (parsed.success && sample.entityType !== expected) {
      issues.push(`entityType: expected ${expected}, received ${sample.entityType}`);
    }
    if (issues.length > 0) {
      throw new InvalidSampleError({
        index,
        callsign: typeof sample.callsign === 'string' && sample.callsign !== '' ? sample.callsign : null,
        entityType: expected,
        issues,
      });
    }
  });
}

function bucketByFrequency(samples: readonly TransceiverSample[]): Map<number, TransceiverSample[]> {
  const buckets = new Map<number, TransceiverSample[]>();
  for (const sample of samples) {
    const bucket = buckets.get(sample.frequencyHz);
    if (bucket) {
      bucket.push(sample);
    } else {
      buckets.set(sample.frequencyHz, [sample]);
    }
  }
  return buckets;
}

/**
 * Interaction Matcher
 *
 * Pairs controller and flight transceiver samples that share a frequency, were
 * sampled within the time window of each other and sit within the proximity
 * threshold. Stateless: every call works on its own input batch.
 */
export class InteractionMatcher {
  private readonly timeWindowSeconds: number;

  private readonly proximityThresholdNm: number;

  private readonly proximityThresholdFor?: (controllerCallsign: string) => number;

  constructor(options: MatcherOptions) {
    const parsed = matcherOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(formatIssues(parsed.error));
    }
    this.timeWindowSeconds = parsed.data.timeWindowSeconds;
    this.proximityThresholdNm = parsed.data.proximityThresholdNm;
    this.proximityThresholdFor = options.proximityThresholdFor;
  }

  match(input: MatchInput): InteractionMatch[] {
    if (input.window) {
      validateWindow(input.window);
    }
    validateSamples(input.controllers, 'controller');
    validateSamples(input.flights, 'flight');

    const { window } = input;
    const inWindow = (sample: TransceiverSample): boolean => (
      !window || isWithinInterval(sample.timestamp, window.start, window.end)
    );
    const controllers = input.controllers.filter(inWindow);
    const flights = input.flights.filter(inWindow);

    if (controllers.length === 0 || flights.length === 0) {
      return [];
    }

    const thresholds = this.resolveThresholds(controllers);
    const flightBuckets = bucketByFrequency(flights);
    const matches: InteractionMatch[] = [];

    for (const controller of controllers) {
      const bucket = flightBuckets.get(controller.frequencyHz);
      if (!bucket) {
        continue;
      }
      const thresholdNm = thresholds.get(controller.callsign) ?? this.proximityThresholdNm;

      for (const flight of bucket) {
        if (!withinWindow(controller.timestamp, flight.timestamp, this.timeWindowSeconds)) {
          continue;
        }

        const distance = distanceNm(controller.latitude, controller.longitude, flight.latitude, flight.longitude);
        if (classifyProximity(distance, thresholdNm) === 'OUT_OF_RANGE') {
          continue;
        }

        matches.push({
          controllerCallsign: controller.callsign,
          flightCallsign: flight.callsign,
          frequencyHz: controller.frequencyHz,
          frequencyMhz: normalizeFrequency(controller.frequencyHz),
          controllerTime: controller.timestamp,
          flightTime: flight.timestamp,
          controllerLat: controller.latitude,
          controllerLon: controller.longitude,
          flightLat: flight.latitude,
          flightLon: flight.longitude,
          distanceNm: distance,
          timeDiffSeconds: timeDiffSeconds(controller.timestamp, flight.timestamp),
        });
      }
    }

    return matches.sort(compareMatches);
  }

  /**
   * Resolves every controller's threshold up front so a bad policy value fails
   * before any pair is evaluated
   */
  private resolveThresholds(controllers: readonly TransceiverSample[]): Map<string, number> {
    const thresholds = new Map<string, number>();
    const policy = this.proximityThresholdFor;
    if (!policy) {
      return thresholds;
    }

    for (const { callsign } of controllers) {
      if (thresholds.has(callsign)) {
        continue;
      }
      const value = policy(callsign);
      if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigurationError([
          `proximityThresholdFor(${callsign}): expected a positive number, received ${value}`,
        ]);
      }
      thresholds.set(callsign, value);
    }
    return thresholds;
  }
}

export default InteractionMatcher;
