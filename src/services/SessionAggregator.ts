import type {
  AggregateInput,
  AggregatorOptions,
  InteractionMatch,
  InteractionSession,
  SessionStatus,
} from '../types/interaction.types';
import { aggregatorOptionsSchema, formatIssues } from '../schemas/interaction.schemas';
import { ConfigurationError } from './ConfigurationError';
import { compareStrings } from './InteractionMatcher';

interface SessionDraft {
  controllerCallsign: string;
  flightCallsign: string;
  frequencyHz: number;
  frequencyMhz: number;
  startMs: number;
  endMs: number;
  sampleCount: number;
  minDistanceNm: number;
  maxDistanceNm: number;
}

type Keyed = Pick<InteractionMatch, 'controllerCallsign' | 'flightCallsign' | 'frequencyHz'>;

export const sessionKey = (value: Keyed): string => (
  `${value.controllerCallsign}\u0000${value.flightCallsign}\u0000${value.frequencyHz}`
);

const byMatchTime = (a: InteractionMatch, b: InteractionMatch): number => (
  (a.flightTime.getTime() - b.flightTime.getTime())
  || (a.controllerTime.getTime() - b.controllerTime.getTime())
);

function compareSessions(a: InteractionSession, b: InteractionSession): number {
  return (a.startTime.getTime() - b.startTime.getTime())
    || compareStrings(a.controllerCallsign, b.controllerCallsign)
    || compareStrings(a.flightCallsign, b.flightCallsign)
    || (a.frequencyHz - b.frequencyHz);
}

function draftFromMatch(match: InteractionMatch): SessionDraft {
  const time = match.flightTime.getTime();
  return {
    controllerCallsign: match.controllerCallsign,
    flightCallsign: match.flightCallsign,
    frequencyHz: match.frequencyHz,
    frequencyMhz: match.frequencyMhz,
    startMs: time,
    endMs: time,
    sampleCount: 1,
    minDistanceNm: match.distanceNm,
    maxDistanceNm: match.distanceNm,
  };
}

function draftFromSession(session: InteractionSession): SessionDraft {
  return {
    controllerCallsign: session.controllerCallsign,
    flightCallsign: session.flightCallsign,
    frequencyHz: session.frequencyHz,
    frequencyMhz: session.frequencyMhz,
    startMs: session.startTime.getTime(),
    endMs: session.endTime.getTime(),
    sampleCount: session.sampleCount,
    minDistanceNm: session.minDistanceNm,
    maxDistanceNm: session.maxDistanceNm,
  };
}

function finalize(draft: SessionDraft, status: SessionStatus): InteractionSession {
  return {
    controllerCallsign: draft.controllerCallsign,
    flightCallsign: draft.flightCallsign,
    frequencyHz: draft.frequencyHz,
    frequencyMhz: draft.frequencyMhz,
    startTime: new Date(draft.startMs),
    endTime: new Date(draft.endMs),
    sampleCount: draft.sampleCount,
    minDistanceNm: draft.minDistanceNm,
    maxDistanceNm: draft.maxDistanceNm,
    status,
  };
}

/**
 * Session Aggregator
 *
 * Folds ordered matches into contact sessions per (controller, flight, frequency).
 * A session grows while each next match lands within the gap tolerance of its end;
 * the last session of a key stays open when the window boundary could still extend it.
 */
export class SessionAggregator {
  private readonly gapToleranceMs: number;

  constructor(options: AggregatorOptions) {
    const parsed = aggregatorOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(formatIssues(parsed.error));
    }
    this.gapToleranceMs = parsed.data.gapToleranceSeconds * 1000;
  }

  /**
   * @param input.windowEnd end of the analysis window; omitted means the window is still running
   * @param input.carryOver open sessions from an earlier analysis, continued by matching keys.
   *   Closed sessions are already final and are not re-emitted.
   */
  aggregate(matches: readonly InteractionMatch[], input: AggregateInput = {}): InteractionSession[] {
    const { windowEnd, carryOver = [] } = input;
    if (windowEnd && Number.isNaN(windowEnd.getTime())) {
      throw new ConfigurationError(['windowEnd: Invalid date']);
    }

    const groups = new Map<string, InteractionMatch[]>();
    for (const match of matches) {
      const key = sessionKey(match);
      const group = groups.get(key);
      if (group) {
        group.push(match);
      } else {
        groups.set(key, [match]);
      }
    }

    const seeds = new Map<string, InteractionSession[]>();
    for (const session of carryOver) {
      if (session.status !== 'open') {
        continue;
      }
      const key = sessionKey(session);
      seeds.set(key, [...(seeds.get(key) ?? []), session]);
    }

    const keys = new Set<string>([...groups.keys(), ...seeds.keys()]);
    const sessions: InteractionSession[] = [];

    for (const key of keys) {
      const carried = seeds.get(key) ?? [];
      const drafts = this.fold(carried, groups.get(key) ?? []);
      drafts.forEach((draft, index) => {
        const isLast = index === drafts.length - 1;
        sessions.push(finalize(draft, isLast ? this.trailingStatus(draft, windowEnd) : 'closed'));
      });
    }

    return sessions.sort(compareSessions);
  }

  /**
   * Matches whose instant lies inside a carried session's span were counted when
   * that session was built and are skipped. The rest join the first draft they
   * fall within the gap tolerance of, on either side; drafts brought within
   * tolerance of each other are then merged.
   */
  private fold(carried: readonly InteractionSession[], matches: readonly InteractionMatch[]): SessionDraft[] {
    const counted = carried.map((session): [number, number] => [session.startTime.getTime(), session.endTime.getTime()]);
    const drafts = carried.map(draftFromSession);

    for (const match of [...matches].sort(byMatchTime)) {
      const time = match.flightTime.getTime();
      if (counted.some(([start, end]) => time >= start && time <= end)) {
        continue;
      }

      const target = drafts.find((draft) => (
        time >= draft.startMs - this.gapToleranceMs && time - draft.endMs <= this.gapToleranceMs
      ));
      if (target) {
        target.startMs = Math.min(target.startMs, time);
        target.endMs = Math.max(target.endMs, time);
        target.sampleCount += 1;
        target.minDistanceNm = Math.min(target.minDistanceNm, match.distanceNm);
        target.maxDistanceNm = Math.max(target.maxDistanceNm, match.distanceNm);
      } else {
        drafts.push(draftFromMatch(match));
      }
    }

    const merged: SessionDraft[] = [];
    for (const draft of drafts.sort((a, b) => a.startMs - b.startMs)) {
      const previous = merged[merged.length - 1];
      if (previous && draft.startMs - previous.endMs <= this.gapToleranceMs) {
        previous.endMs = Math.max(previous.endMs, draft.endMs);
        previous.sampleCount += draft.sampleCount;
        previous.minDistanceNm = Math.min(previous.minDistanceNm, draft.minDistanceNm);
        previous.maxDistanceNm = Math.max(previous.maxDistanceNm, draft.maxDistanceNm);
      } else {
        merged.push(draft);
      }
    }
    return merged;
  }

  private trailingStatus(draft: SessionDraft, windowEnd: Date | undefined): SessionStatus {
    if (!windowEnd) {
      return 'open';
    }
    return windowEnd.getTime() - draft.endMs <= this.gapToleranceMs ? 'open' : 'closed';
  }
}

export default SessionAggregator;
