import type {
  AnalysisWindow,
  ControllerSessionSummary,
  FlightAtcSummary,
  InteractionSession,
  TransceiverSample,
  WindowAnalysisResult,
} from '../types/interaction.types';
import type { InteractionConfig } from '../types/config.types';
import type { SampleQuery } from '../repositories/TransceiverRepository';
import TransceiverRepository, { describeError } from '../repositories/TransceiverRepository';
import InteractionSessionRepository from '../repositories/InteractionSessionRepository';
import { getConnection } from '../repositories/DatabaseConnection';
import config from '../config';
import logger from '../utils/logger';
import { createProximityPolicy } from '../utils/controllerType';
import { withTimeout } from '../utils/timeout';
import { AnalysisTimeoutError } from './AnalysisTimeoutError';
import { InteractionMatcher, validateWindow } from './InteractionMatcher';
import { SessionAggregator } from './SessionAggregator';
import { InteractionSummaryService } from './InteractionSummaryService';

export interface TransceiverSource {
  findSamples(query: SampleQuery): Promise<TransceiverSample[]>;
  countFlightRecords(callsign: string, window: AnalysisWindow): Promise<number>;
}

export interface SessionStore {
  saveSessions(sessions: readonly InteractionSession[], replaced?: readonly InteractionSession[]): Promise<number>;
  findOpenSessions(): Promise<InteractionSession[]>;
}

export interface InteractionDetectionDependencies {
  transceivers: TransceiverSource;
  sessions: SessionStore;
  settings: InteractionConfig;
}

export interface AnalyzeWindowOptions {
  carryOver?: readonly InteractionSession[];
  persist?: boolean;
}

/**
 * Interaction Detection Service
 *
 * Loads transceiver samples for a window and runs them through the matcher,
 * the session aggregator and the summaries. Every operation runs under the
 * configured analysis timeout; a timed-out analysis persists nothing.
 */
export class InteractionDetectionService {
  private readonly transceivers: TransceiverSource;

  private readonly sessions: SessionStore;

  private readonly settings: InteractionConfig;

  private readonly fixedMatcher: InteractionMatcher;

  private readonly typedMatcher: InteractionMatcher;

  private readonly aggregator: SessionAggregator;

  private readonly summaries: InteractionSummaryService;

  constructor(deps: InteractionDetectionDependencies) {
    this.transceivers = deps.transceivers;
    this.sessions = deps.sessions;
    this.settings = deps.settings;

    this.fixedMatcher = new InteractionMatcher({
      timeWindowSeconds: deps.settings.timeWindowSeconds,
      proximityThresholdNm: deps.settings.proximityThresholdNm,
    });
    this.typedMatcher = new InteractionMatcher({
      timeWindowSeconds: deps.settings.timeWindowSeconds,
      proximityThresholdNm: deps.settings.proximityThresholdNm,
      proximityThresholdFor: createProximityPolicy(deps.settings.controllerProximityNm),
    });
    this.aggregator = new SessionAggregator({ gapToleranceSeconds: deps.settings.gapToleranceSeconds });
    this.summaries = new InteractionSummaryService({
      pollingIntervalSeconds: deps.settings.pollingIntervalSeconds,
    });
  }

  /**
   * Matches every controller against every flight in the window and folds the
   * matches into sessions. Open sessions passed as carryOver are continued.
   */
  async analyzeWindow(window: AnalysisWindow, options: AnalyzeWindowOptions = {}): Promise<WindowAnalysisResult> {
    validateWindow(window);
    return this.guard('Window analysis', window, async (signal) => {
      const [controllers, flights] = await Promise.all([
        this.transceivers.findSamples({ window, entityType: 'controller' }),
        this.transceivers.findSamples({ window, entityType: 'flight' }),
      ]);

      const matches = this.fixedMatcher.match({ controllers, flights, window });
      const sessions = this.aggregator.aggregate(matches, {
        windowEnd: window.end,
        carryOver: options.carryOver,
      });
      let persisted = 0;
      if (options.persist) {
        // Nothing is written once the caller has been told the analysis timed out
        signal.throwIfAborted();
        const replaced = (options.carryOver ?? []).filter((session) => session.status === 'open');
        persisted = await this.sessions.saveSessions(sessions, replaced);
      }

      logger.info('Window analysis complete', {
        start: window.start.toISOString(),
        end: window.end.toISOString(),
        controllerSamples: controllers.length,
        flightSamples: flights.length,
        matches: matches.length,
        sessions: sessions.length,
        openSessions: sessions.filter((session) => session.status === 'open').length,
        persisted,
      });

      return {
        window,
        matches,
        sessions,
        persisted,
      };
    });
  }

  /**
   * Aircraft one controller worked during the window, at the fixed proximity threshold
   */
  async detectControllerFlightInteractions(
    controllerCallsign: string,
    window: AnalysisWindow,
  ): Promise<ControllerSessionSummary> {
    validateWindow(window);
    return this.guard('Controller interaction detection', window, async () => {
      const [controllers, flights] = await Promise.all([
        this.transceivers.findSamples({ window, entityType: 'controller', callsign: controllerCallsign }),
        this.transceivers.findSamples({ window, entityType: 'flight' }),
      ]);

      const matches = this.fixedMatcher.match({ controllers, flights, window });
      const summary = this.summaries.summarizeControllerSession(matches);

      logger.debug('Controller interactions detected', {
        controller: controllerCallsign,
        matches: matches.length,
        aircraft: summary.totalAircraft,
      });
      return summary;
    });
  }

  /**
   * Controllers that worked one flight during the window, each at the range of its position type
   */
  async detectFlightAtcInteractions(flightCallsign: string, window: AnalysisWindow): Promise<FlightAtcSummary> {
    validateWindow(window);
    return this.guard('Flight ATC detection', window, async () => {
      const [flights, controllers, totalRecords] = await Promise.all([
        this.transceivers.findSamples({
          window,
          entityType: 'flight',
          callsign: flightCallsign,
          limit: this.settings.flightSampleLimit,
        }),
        this.transceivers.findSamples({ window, entityType: 'controller' }),
        this.transceivers.countFlightRecords(flightCallsign, window),
      ]);

      const matches = this.typedMatcher.match({ controllers, flights, window });
      const summary = this.summaries.summarizeFlightAtc(flightCallsign, matches, totalRecords);

      logger.debug('Flight ATC interactions detected', {
        flight: flightCallsign,
        matches: matches.length,
        controllers: summary.controllers.length,
        percentage: summary.controllerTimePercentage,
      });
      return summary;
    });
  }

  /**
   * Runs one operation under the analysis timeout. On timeout the operation is
   * signalled to stop and awaited, so no query is still running when this rejects.
   */
  private async guard<T>(
    label: string,
    window: AnalysisWindow,
    run: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const running = run(controller.signal);
    try {
      return await withTimeout(running, this.settings.analysisTimeoutMs, label);
    } catch (error) {
      if (error instanceof AnalysisTimeoutError) {
        controller.abort(error);
        const [outcome] = await Promise.allSettled([running]);
        logger.warn(`${label} settled after its timeout`, {
          outcome: outcome.status === 'fulfilled' ? 'completed' : describeError(outcome.reason),
        });
      }
      logger.error(`${label} failed`, {
        start: window.start.toISOString(),
        end: window.end.toISOString(),
        error: describeError(error),
      });
      throw error;
    }
  }
}

/**
 * Service wired to the shared database connection and loaded configuration
 */
export function createInteractionDetectionService(): InteractionDetectionService {
  const db = getConnection().getDb();
  return new InteractionDetectionService({
    transceivers: new TransceiverRepository(db),
    sessions: new InteractionSessionRepository(db),
    settings: config.interactions,
  });
}

export default InteractionDetectionService;
