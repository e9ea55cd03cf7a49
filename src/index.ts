export * from './types/interaction.types';
export type { AppConfig, DatabaseConfig, InteractionConfig } from './types/config.types';

export { EARTH_RADIUS_NM, distanceNm, classifyProximity } from './utils/geo';
export { normalizeFrequency, communicationType } from './utils/frequency';
export { timeDiffSeconds, withinWindow, isWithinInterval } from './utils/timeWindow';
export { detectControllerType, proximityThresholdForType, createProximityPolicy } from './utils/controllerType';
export { withTimeout } from './utils/timeout';

export { InteractionMatcher, compareMatches, validateWindow } from './services/InteractionMatcher';
export { SessionAggregator, sessionKey } from './services/SessionAggregator';
export { InteractionSummaryService } from './services/InteractionSummaryService';
export {
  InteractionDetectionService,
  createInteractionDetectionService,
} from './services/InteractionDetectionService';
export type {
  AnalyzeWindowOptions,
  InteractionDetectionDependencies,
  SessionStore,
  TransceiverSource,
} from './services/InteractionDetectionService';

export { InvalidSampleError } from './services/InvalidSampleError';
export { ConfigurationError } from './services/ConfigurationError';
export { AnalysisTimeoutError } from './services/AnalysisTimeoutError';

export { DatabaseConnection, getConnection } from './repositories/DatabaseConnection';
export type { Database } from './repositories/DatabaseConnection';
export { default as TransceiverRepository } from './repositories/TransceiverRepository';
export { default as InteractionSessionRepository } from './repositories/InteractionSessionRepository';

export { default as config } from './config';
export { default as logger } from './utils/logger';
