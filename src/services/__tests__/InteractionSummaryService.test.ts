import { InteractionSummaryService } from '../InteractionSummaryService';
import type { InteractionMatch } from '../../types/interaction.types';

const utc = (iso: string): Date => new Date(`2025-08-22T${iso}Z`);

function match(
  controllerCallsign: string,
  flightCallsign: string,
  flightTime: Date,
  overrides: Partial<InteractionMatch> = {},
): InteractionMatch {
  return {
    controllerCallsign,
    flightCallsign,
    frequencyHz: 124_400_000,
    frequencyMhz: 124.4,
    controllerTime: flightTime,
    flightTime,
    controllerLat: -34.952425,
    controllerLon: 138.53208,
    flightLat: -34.95,
    flightLon: 138.6,
    distanceNm: 3.3,
    timeDiffSeconds: 0,
    ...overrides,
  };
}

describe('InteractionSummaryService', () => {
  const service = new InteractionSummaryService({ pollingIntervalSeconds: 60 });

  describe('summarizeControllerSession', () => {
    it('summarizes each aircraft a controller worked', () => {
      const summary = service.summarizeControllerSession([
        match('AD_CTR', 'QFA123', utc('11:05:00')),
        match('AD_CTR', 'VOZ456', utc('10:10:00'), { frequencyMhz: 124.4 }),
        match('AD_CTR', 'QFA123', utc('10:00:00')),
        match('AD_CTR', 'QFA123', utc('10:25:30')),
      ]);

      expect(summary.totalAircraft).toBe(2);
      expect(summary.aircraftCallsigns).toEqual(['QFA123', 'VOZ456']);
      expect(summary.flightsDetected).toBe(true);
      expect(summary.details).toEqual([
        {
          callsign: 'QFA123',
          frequencyMhz: 124.4,
          firstSeen: utc('10:00:00'),
          lastSeen: utc('11:05:00'),
          timeOnFrequencyMinutes: 65,
          updatesCount: 3,
        },
        {
          callsign: 'VOZ456',
          frequencyMhz: 124.4,
          firstSeen: utc('10:10:00'),
          lastSeen: utc('10:10:00'),
          timeOnFrequencyMinutes: 0,
          updatesCount: 1,
        },
      ]);
      expect(summary.hourlyBreakdown[9]).toBe(0);
      expect(summary.hourlyBreakdown[10]).toBe(2);
      expect(summary.hourlyBreakdown[11]).toBe(1);
      expect(Object.keys(summary.hourlyBreakdown)).toHaveLength(24);
    });

    it('counts contact running past midnight up to the last hour of the day', () => {
      const summary = service.summarizeControllerSession([
        match('AD_CTR', 'QFA123', new Date('2025-08-22T23:50:00Z')),
        match('AD_CTR', 'QFA123', new Date('2025-08-23T00:10:00Z')),
      ]);
      expect(summary.hourlyBreakdown[23]).toBe(1);
      expect(summary.hourlyBreakdown[0]).toBe(0);
      expect(summary.details[0].timeOnFrequencyMinutes).toBe(20);
    });

    it('reports an empty session', () => {
      const summary = service.summarizeControllerSession([]);
      expect(summary.totalAircraft).toBe(0);
      expect(summary.aircraftCallsigns).toEqual([]);
      expect(summary.flightsDetected).toBe(false);
      expect(summary.details).toEqual([]);
    });
  });

  describe('summarizeFlightAtc', () => {
    const matches = [
      match('AD_TWR', 'QFA123', utc('10:00:00'), { frequencyMhz: 120.5, frequencyHz: 120_500_000 }),
      match('AD_TWR', 'QFA123', utc('10:01:00'), { frequencyMhz: 120.5, frequencyHz: 120_500_000 }),
      match('ML_CTR', 'QFA123', utc('10:00:00')),
      match('ML_CTR', 'QFA123', utc('10:01:00')),
      match('ML_CTR', 'QFA123', utc('10:02:00')),
      match('ML_CTR', 'QFA123', utc('10:02:00'), { controllerTime: utc('10:01:30') }),
      match('ML_CTR', 'VOZ456', utc('10:03:00')),
    ];

    it('ranks controllers by contact and estimates time from the polling interval', () => {
      const summary = service.summarizeFlightAtc('QFA123', matches, 10);

      expect(summary).toEqual({
        flightCallsign: 'QFA123',
        controllers: [
          {
            callsign: 'ML_CTR',
            controllerType: 'Center',
            frequencyMhz: 124.4,
            communicationType: 'tower',
            contactCount: 3,
            timeMinutes: 3,
            firstSeen: utc('10:00:00'),
            lastSeen: utc('10:02:00'),
          },
          {
            callsign: 'AD_TWR',
            controllerType: 'Tower',
            frequencyMhz: 120.5,
            communicationType: 'approach',
            contactCount: 2,
            timeMinutes: 2,
            firstSeen: utc('10:00:00'),
            lastSeen: utc('10:01:00'),
          },
        ],
        totalControllerTimeMinutes: 3,
        controllerTimePercentage: 30,
        atcContactDetected: true,
      });
    });

    it('rounds the percentage to one decimal', () => {
      const summary = service.summarizeFlightAtc('QFA123', matches.slice(0, 1), 3);
      expect(summary.controllerTimePercentage).toBe(33.3);
    });

    it('caps the percentage at 100', () => {
      expect(service.summarizeFlightAtc('QFA123', matches, 2).controllerTimePercentage).toBe(100);
    });

    it('reports zero percent when the flight has no records', () => {
      expect(service.summarizeFlightAtc('QFA123', matches, 0).controllerTimePercentage).toBe(0);
    });

    it('reports no contact for a flight without matches', () => {
      const summary = service.summarizeFlightAtc('JST789', matches, 5);
      expect(summary.controllers).toEqual([]);
      expect(summary.totalControllerTimeMinutes).toBe(0);
      expect(summary.controllerTimePercentage).toBe(0);
      expect(summary.atcContactDetected).toBe(false);
    });

    it('scales contact time with the polling interval', () => {
      const slower = new InteractionSummaryService({ pollingIntervalSeconds: 90 });
      expect(slower.summarizeFlightAtc('QFA123', matches, 10).totalControllerTimeMinutes).toBe(4.5);
    });
  });
});
