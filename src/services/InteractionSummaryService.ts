import type {
  AircraftContactDetail,
  ControllerContactDetail,
  ControllerSessionSummary,
  FlightAtcSummary,
  InteractionMatch,
} from '../types/interaction.types';
import { detectControllerType } from '../utils/controllerType';
import { communicationType } from '../utils/frequency';
import { compareMatches, compareStrings } from './InteractionMatcher';

const HOURS_PER_DAY = 24;

const emptyHourlyBreakdown = (): Record<number, number> => {
  const breakdown: Record<number, number> = {};
  for (let hour = 0; hour < HOURS_PER_DAY; hour += 1) {
    breakdown[hour] = 0;
  }
  return breakdown;
};

interface ControllerAccumulator {
  callsign: string;
  frequencyHz: number;
  frequencyMhz: number;
  instants: Set<number>;
  firstSeen: number;
  lastSeen: number;
}

/**
 * Interaction Summary Service
 *
 * Turns raw matches into the per-controller-session and per-flight figures the
 * summary tables carry.
 */
export class InteractionSummaryService {
  private readonly pollingIntervalSeconds: number;

  constructor(options: { pollingIntervalSeconds: number }) {
    this.pollingIntervalSeconds = options.pollingIntervalSeconds;
  }

  /**
   * Aircraft a controller worked during one session, keyed by flight callsign
   */
  summarizeControllerSession(matches: readonly InteractionMatch[]): ControllerSessionSummary {
    const aircraft = new Map<string, AircraftContactDetail>();

    for (const match of [...matches].sort(compareMatches)) {
      const existing = aircraft.get(match.flightCallsign);
      if (!existing) {
        aircraft.set(match.flightCallsign, {
          callsign: match.flightCallsign,
          frequencyMhz: match.frequencyMhz,
          firstSeen: match.flightTime,
          lastSeen: match.flightTime,
          timeOnFrequencyMinutes: 0,
          updatesCount: 1,
        });
        continue;
      }
      existing.lastSeen = match.flightTime;
      existing.updatesCount += 1;
    }

    const details = [...aircraft.values()].map((detail) => ({
      ...detail,
      timeOnFrequencyMinutes: Math.floor((detail.lastSeen.getTime() - detail.firstSeen.getTime()) / 60000),
    }));

    const hourlyBreakdown = emptyHourlyBreakdown();
    for (const detail of details) {
      const startHour = detail.firstSeen.getUTCHours();
      const lastHour = detail.lastSeen.getUTCHours();
      // Contact running past midnight is counted up to the end of the first day
      const endHour = lastHour >= startHour ? lastHour : HOURS_PER_DAY - 1;
      for (let hour = startHour; hour <= endHour; hour += 1) {
        hourlyBreakdown[hour] += 1;
      }
    }

    return {
      totalAircraft: details.length,
      aircraftCallsigns: details.map((detail) => detail.callsign),
      flightsDetected: details.length > 0,
      hourlyBreakdown,
      details,
    };
  }

  /**
   * Controllers that worked one flight and the share of its sampled time spent in contact.
   * Each distinct matched flight sample stands for one polling interval of contact.
   */
  summarizeFlightAtc(
    flightCallsign: string,
    matches: readonly InteractionMatch[],
    totalFlightRecords: number,
  ): FlightAtcSummary {
    const intervalMinutes = this.pollingIntervalSeconds / 60;
    const controllers = new Map<string, ControllerAccumulator>();
    const contactInstants = new Set<number>();

    for (const match of matches) {
      if (match.flightCallsign !== flightCallsign) {
        continue;
      }
      const instant = match.flightTime.getTime();
      contactInstants.add(instant);

      const existing = controllers.get(match.controllerCallsign);
      if (!existing) {
        controllers.set(match.controllerCallsign, {
          callsign: match.controllerCallsign,
          frequencyHz: match.frequencyHz,
          frequencyMhz: match.frequencyMhz,
          instants: new Set([instant]),
          firstSeen: instant,
          lastSeen: instant,
        });
        continue;
      }
      existing.instants.add(instant);
      existing.firstSeen = Math.min(existing.firstSeen, instant);
      existing.lastSeen = Math.max(existing.lastSeen, instant);
    }

    const details: ControllerContactDetail[] = [...controllers.values()]
      .map((controller) => ({
        callsign: controller.callsign,
        controllerType: detectControllerType(controller.callsign),
        frequencyMhz: controller.frequencyMhz,
        communicationType: communicationType(controller.frequencyHz),
        contactCount: controller.instants.size,
        timeMinutes: controller.instants.size * intervalMinutes,
        firstSeen: new Date(controller.firstSeen),
        lastSeen: new Date(controller.lastSeen),
      }))
      .sort((a, b) => (b.contactCount - a.contactCount) || compareStrings(a.callsign, b.callsign));

    const percentage = totalFlightRecords > 0
      ? Math.min(100, (contactInstants.size / totalFlightRecords) * 100)
      : 0;

    return {
      flightCallsign,
      controllers: details,
      totalControllerTimeMinutes: contactInstants.size * intervalMinutes,
      controllerTimePercentage: Math.round(percentage * 10) / 10,
      atcContactDetected: details.length > 0,
    };
  }
}

export default InteractionSummaryService;
