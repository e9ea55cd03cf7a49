/**
 * Configuration type definitions
 */

import type { ProximityRanges } from './interaction.types';

export interface DatabaseConfig {
  postgres: {
    url: string;
    pool: {
      max: number;
    };
  };
}

export interface InteractionConfig {
  timeWindowSeconds: number;
  proximityThresholdNm: number;
  gapToleranceSeconds: number;
  pollingIntervalSeconds: number;
  analysisTimeoutMs: number;
  flightSampleLimit: number;
  controllerProximityNm: ProximityRanges;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  database: DatabaseConfig;
  interactions: InteractionConfig;
}
