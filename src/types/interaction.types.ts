/**
 * Interaction matching type definitions
 * Samples come from the transceivers table; matches and sessions are derived values
 */

export type EntityType = 'controller' | 'flight';

export type ProximityClassification = 'WITHIN_RANGE' | 'OUT_OF_RANGE';

export type SessionStatus = 'open' | 'closed';

export type ControllerType = 'Ground' | 'Tower' | 'Approach' | 'Center' | 'FSS';

export type CommunicationType =
  | 'approach'
  | 'departure'
  | 'tower'
  | 'ground'
  | 'enroute'
  | 'hf_enroute'
  | 'unknown';

export interface TransceiverSample {
  entityType: EntityType;
  callsign: string;
  frequencyHz: number;
  timestamp: Date;
  latitude: number;
  longitude: number;
}

export interface AnalysisWindow {
  start: Date;
  end: Date;
}

export interface InteractionMatch {
  controllerCallsign: string;
  flightCallsign: string;
  frequencyHz: number;
  frequencyMhz: number;
  controllerTime: Date;
  flightTime: Date;
  controllerLat: number;
  controllerLon: number;
  flightLat: number;
  flightLon: number;
  distanceNm: number;
  timeDiffSeconds: number;
}

export interface InteractionSession {
  controllerCallsign: string;
  flightCallsign: string;
  frequencyHz: number;
  frequencyMhz: number;
  startTime: Date;
  endTime: Date;
  sampleCount: number;
  minDistanceNm: number;
  maxDistanceNm: number;
  status: SessionStatus;
}

export interface MatcherOptions {
  timeWindowSeconds: number;
  proximityThresholdNm: number;
  /** Overrides proximityThresholdNm per controller callsign */
  proximityThresholdFor?: (controllerCallsign: string) => number;
}

export interface MatchInput {
  controllers: readonly TransceiverSample[];
  flights: readonly TransceiverSample[];
  window?: AnalysisWindow;
}

export interface AggregatorOptions {
  gapToleranceSeconds: number;
}

export interface AggregateInput {
  windowEnd?: Date;
  carryOver?: readonly InteractionSession[];
}

export type ProximityRanges = Record<ControllerType, number>;

export interface AircraftContactDetail {
  callsign: string;
  frequencyMhz: number;
  firstSeen: Date;
  lastSeen: Date;
  timeOnFrequencyMinutes: number;
  updatesCount: number;
}

export interface ControllerSessionSummary {
  totalAircraft: number;
  aircraftCallsigns: string[];
  flightsDetected: boolean;
  hourlyBreakdown: Record<number, number>;
  details: AircraftContactDetail[];
}

export interface ControllerContactDetail {
  callsign: string;
  controllerType: ControllerType;
  frequencyMhz: number;
  communicationType: CommunicationType;
  contactCount: number;
  timeMinutes: number;
  firstSeen: Date;
  lastSeen: Date;
}

export interface FlightAtcSummary {
  flightCallsign: string;
  controllers: ControllerContactDetail[];
  totalControllerTimeMinutes: number;
  controllerTimePercentage: number;
  atcContactDetected: boolean;
}

export interface WindowAnalysisResult {
  window: AnalysisWindow;
  matches: InteractionMatch[];
  sessions: InteractionSession[];
  persisted: number;
}
