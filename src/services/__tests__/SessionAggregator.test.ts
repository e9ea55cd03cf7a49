import { SessionAggregator, sessionKey } from '../SessionAggregator';
import { ConfigurationError } from '../ConfigurationError';
import { InteractionMatcher } from '../InteractionMatcher';
import type { InteractionMatch, InteractionSession, TransceiverSample } from '../../types/interaction.types';

const BASE = Date.UTC(2025, 7, 22, 10, 0, 0);
const at = (seconds: number): Date => new Date(BASE + seconds * 1000);

function match(seconds: number, overrides: Partial<InteractionMatch> = {}): InteractionMatch {
  return {
    controllerCallsign: 'AD_CTR',
    flightCallsign: 'QFA123',
    frequencyHz: 124_400_000,
    frequencyMhz: 124.4,
    controllerTime: at(seconds),
    flightTime: at(seconds),
    controllerLat: -34.952425,
    controllerLon: 138.53208,
    flightLat: -34.95,
    flightLon: 138.6,
    distanceNm: 10,
    timeDiffSeconds: 0,
    ...overrides,
  };
}

const bounds = (sessions: InteractionSession[]) => sessions.map((session) => ({
  start: (session.startTime.getTime() - BASE) / 1000,
  end: (session.endTime.getTime() - BASE) / 1000,
  samples: session.sampleCount,
  status: session.status,
}));

describe('SessionAggregator', () => {
  const aggregator = new SessionAggregator({ gapToleranceSeconds: 300 });

  it('folds consecutive matches into one open session', () => {
    const sessions = aggregator.aggregate([match(120), match(0), match(60)]);

    expect(sessions).toEqual([{
      controllerCallsign: 'AD_CTR',
      flightCallsign: 'QFA123',
      frequencyHz: 124_400_000,
      frequencyMhz: 124.4,
      startTime: at(0),
      endTime: at(120),
      sampleCount: 3,
      minDistanceNm: 10,
      maxDistanceNm: 10,
      status: 'open',
    }]);
  });

  it('splits a key when the gap exceeds the tolerance', () => {
    expect(bounds(aggregator.aggregate([match(0), match(60), match(361)]))).toEqual([
      { start: 0, end: 60, samples: 2, status: 'closed' },
      { start: 361, end: 361, samples: 1, status: 'open' },
    ]);
  });

  it('keeps a gap equal to the tolerance inside one session', () => {
    expect(bounds(aggregator.aggregate([match(0), match(300)]))).toEqual([
      { start: 0, end: 300, samples: 2, status: 'open' },
    ]);
  });

  it('tracks the distance range of a session', () => {
    const [session] = aggregator.aggregate([
      match(0, { distanceNm: 42.5 }),
      match(60, { distanceNm: 3.25 }),
      match(120, { distanceNm: 18 }),
    ]);
    expect(session.minDistanceNm).toBe(3.25);
    expect(session.maxDistanceNm).toBe(42.5);
  });

  it('closes the trailing session once the window end is past the tolerance', () => {
    const matches = [match(0), match(120)];
    expect(aggregator.aggregate(matches, { windowEnd: at(420) })[0].status).toBe('open');
    expect(aggregator.aggregate(matches, { windowEnd: at(421) })[0].status).toBe('closed');
  });

  it('keeps keys apart and orders sessions by start time, then callsigns', () => {
    const sessions = aggregator.aggregate([
      match(30, { controllerCallsign: 'ML_CTR' }),
      match(30, { frequencyHz: 128_200_000, frequencyMhz: 128.2 }),
      match(0, { flightCallsign: 'VOZ456' }),
      match(30),
    ]);

    expect(sessions.map((s) => [s.controllerCallsign, s.flightCallsign, s.frequencyHz])).toEqual([
      ['AD_CTR', 'VOZ456', 124_400_000],
      ['AD_CTR', 'QFA123', 124_400_000],
      ['AD_CTR', 'QFA123', 128_200_000],
      ['ML_CTR', 'QFA123', 124_400_000],
    ]);
  });

  it('returns no sessions for no matches', () => {
    expect(aggregator.aggregate([])).toEqual([]);
  });

  describe('carry-over', () => {
    it('continues an open session across consecutive windows', () => {
      const first = aggregator.aggregate([match(0), match(60)], { windowEnd: at(100) });
      const second = aggregator.aggregate(
        [match(200, { distanceNm: 25 }), match(260)],
        { windowEnd: at(300), carryOver: first },
      );
      const whole = aggregator.aggregate(
        [match(0), match(60), match(200, { distanceNm: 25 }), match(260)],
        { windowEnd: at(300) },
      );

      expect(first[0].status).toBe('open');
      expect(second).toEqual(whole);
      expect(bounds(second)).toEqual([{ start: 0, end: 260, samples: 4, status: 'open' }]);
    });

    it('re-emits a carried session unchanged when nothing new arrives', () => {
      const carried = aggregator.aggregate([match(0), match(60)]);
      expect(aggregator.aggregate([], { carryOver: carried })).toEqual(carried);
    });

    it('starts a new session when the carried one is too far behind', () => {
      const carried = aggregator.aggregate([match(0)]);
      expect(bounds(aggregator.aggregate([match(400)], { carryOver: carried }))).toEqual([
        { start: 0, end: 0, samples: 1, status: 'closed' },
        { start: 400, end: 400, samples: 1, status: 'open' },
      ]);
    });

    it('keeps matches far before a carried session in a session of their own', () => {
      const carried = aggregator.aggregate([match(10000)]);
      expect(bounds(aggregator.aggregate([match(0)], { carryOver: carried }))).toEqual([
        { start: 0, end: 0, samples: 1, status: 'closed' },
        { start: 10000, end: 10000, samples: 1, status: 'open' },
      ]);
    });

    it('extends a carried session backwards within the tolerance', () => {
      const carried = aggregator.aggregate([match(3000), match(3200)]);
      expect(bounds(aggregator.aggregate([match(2800)], { carryOver: carried }))).toEqual([
        { start: 2800, end: 3200, samples: 3, status: 'open' },
      ]);
    });

    it('merges carried sessions that a new match bridges', () => {
      const carried = aggregator.aggregate([match(0), match(500)]);
      expect(carried.map((session) => session.status)).toEqual(['closed', 'open']);
      const reopened = carried.map((session) => ({ ...session, status: 'open' as const }));
      expect(bounds(aggregator.aggregate([match(250)], { carryOver: reopened }))).toEqual([
        { start: 0, end: 500, samples: 3, status: 'open' },
      ]);
    });

    it('counts a match on the shared boundary of adjacent windows once', () => {
      const first = aggregator.aggregate([match(0), match(60), match(120)], { windowEnd: at(120) });
      const second = aggregator.aggregate(
        [match(120), match(180), match(240)],
        { windowEnd: at(240), carryOver: first },
      );
      const whole = aggregator.aggregate(
        [match(0), match(60), match(120), match(180), match(240)],
        { windowEnd: at(240) },
      );

      expect(second).toEqual(whole);
      expect(second[0].sampleCount).toBe(5);
    });

    it('gives the same sessions for a window analysed whole or in two halves', () => {
      const matcher = new InteractionMatcher({ timeWindowSeconds: 30, proximityThresholdNm: 300 });
      const sampleAt = (entityType: TransceiverSample['entityType'], callsign: string, seconds: number) => ({
        entityType,
        callsign,
        frequencyHz: 124_400_000,
        timestamp: at(seconds),
        latitude: -34.952425,
        longitude: 138.53208,
      });
      const instants = [0, 60, 120, 180, 240];
      const controllers = instants.map((seconds) => sampleAt('controller', 'AD_CTR', seconds));
      const flights = instants.map((seconds) => sampleAt('flight', 'QFA123', seconds));

      const whole = aggregator.aggregate(
        matcher.match({ controllers, flights, window: { start: at(0), end: at(240) } }),
        { windowEnd: at(240) },
      );
      const firstHalf = aggregator.aggregate(
        matcher.match({ controllers, flights, window: { start: at(0), end: at(120) } }),
        { windowEnd: at(120) },
      );
      const secondHalf = aggregator.aggregate(
        matcher.match({ controllers, flights, window: { start: at(120), end: at(240) } }),
        { windowEnd: at(240), carryOver: firstHalf },
      );

      expect(secondHalf).toEqual(whole);
      expect(bounds(secondHalf)).toEqual([{ start: 0, end: 240, samples: 5, status: 'open' }]);
    });

    it('ignores closed sessions', () => {
      const closed = aggregator.aggregate([match(0)], { windowEnd: at(1000) });
      expect(closed[0].status).toBe('closed');
      expect(aggregator.aggregate([], { carryOver: closed })).toEqual([]);
    });
  });

  describe('validation', () => {
    it('rejects a non-positive gap tolerance', () => {
      expect(() => new SessionAggregator({ gapToleranceSeconds: 0 }))
        .toThrow('Invalid interaction configuration: gapToleranceSeconds: Number must be greater than 0');
    });

    it('rejects an invalid window end', () => {
      expect(() => aggregator.aggregate([match(0)], { windowEnd: new Date('nope') }))
        .toThrow(new ConfigurationError(['windowEnd: Invalid date']));
    });
  });

  it('builds the same key for a match and the session it produced', () => {
    const source = match(0);
    const [session] = aggregator.aggregate([source]);
    expect(sessionKey(session)).toBe(sessionKey(source));
  });
});
