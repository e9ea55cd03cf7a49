import type { Database } from './DatabaseConnection';
import type { AnalysisWindow, EntityType, TransceiverSample } from '../types/interaction.types';
import { InvalidSampleError } from '../services/InvalidSampleError';
import logger from '../utils/logger';

export interface TransceiverRow {
  callsign: string;
  frequency: string | number;
  timestamp: Date | string;
  position_lat: number;
  position_lon: number;
  entity_type: string;
}

export interface SampleQuery {
  window: AnalysisWindow;
  entityType?: EntityType;
  callsign?: string;
  limit?: number;
}

// Entity types as the ingestion pipeline writes them
const STORED_ENTITY_TYPES: Record<EntityType, string> = {
  controller: 'atc',
  flight: 'flight',
};

const toEntityType = (stored: string): EntityType | null => {
  if (stored === STORED_ENTITY_TYPES.controller) {
    return 'controller';
  }
  if (stored === STORED_ENTITY_TYPES.flight) {
    return 'flight';
  }
  return null;
};

export const describeError = (error: unknown): string => (
  error instanceof Error ? error.message : String(error)
);

/**
 * Read access to the transceivers table
 */
class TransceiverRepository {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  /**
   * Positioned samples inside the window, oldest first
   */
  async findSamples(query: SampleQuery): Promise<TransceiverSample[]> {
    const entityTypes = query.entityType
      ? [STORED_ENTITY_TYPES[query.entityType]]
      : [STORED_ENTITY_TYPES.controller, STORED_ENTITY_TYPES.flight];
    const params: Array<string[] | Date | string | number> = [
      entityTypes,
      query.window.start,
      query.window.end,
    ];

    let sql = `
      SELECT t.callsign, t.frequency, t.timestamp, t.position_lat, t.position_lon, t.entity_type
      FROM transceivers t
      WHERE t.entity_type IN ($1:csv)
        AND t.timestamp BETWEEN $2 AND $3
        AND t.position_lat IS NOT NULL
        AND t.position_lon IS NOT NULL
    `;
    if (query.callsign) {
      params.push(query.callsign);
      sql += ` AND t.callsign = $${params.length}`;
    }
    sql += ' ORDER BY t.timestamp';
    if (query.limit !== undefined) {
      params.push(query.limit);
      sql += ` LIMIT $${params.length}`;
    }

    let rows: TransceiverRow[];
    try {
      rows = await this.db.any<TransceiverRow>(sql, params);
    } catch (error) {
      logger.error('Error fetching transceiver samples', {
        entityType: query.entityType ?? 'all',
        callsign: query.callsign,
        error: describeError(error),
      });
      throw error;
    }

    return rows.map((row, index) => TransceiverRepository.toSample(row, index));
  }

  /**
   * Number of distinct sampling instants recorded for a flight in the window
   */
  async countFlightRecords(callsign: string, window: AnalysisWindow): Promise<number> {
    const sql = `
      SELECT COUNT(DISTINCT t.timestamp) AS count
      FROM transceivers t
      WHERE t.entity_type = $1
        AND t.callsign = $2
        AND t.timestamp BETWEEN $3 AND $4
    `;

    try {
      const result = await this.db.one<{ count: string }>(sql, [
        STORED_ENTITY_TYPES.flight,
        callsign,
        window.start,
        window.end,
      ]);
      return parseInt(result.count, 10);
    } catch (error) {
      logger.error('Error counting flight records', {
        callsign,
        error: describeError(error),
      });
      throw error;
    }
  }

  static toSample(row: TransceiverRow, index: number): TransceiverSample {
    const entityType = toEntityType(row.entity_type);
    if (!entityType) {
      throw new InvalidSampleError({
        index,
        callsign: row.callsign,
        entityType: null,
        issues: [`entity_type: unsupported value "${row.entity_type}"`],
      });
    }

    return {
      entityType,
      callsign: row.callsign,
      frequencyHz: Number(row.frequency),
      timestamp: row.timestamp instanceof Date ? row.timestamp : new Date(row.timestamp),
      latitude: row.position_lat,
      longitude: row.position_lon,
    };
  }
}

export default TransceiverRepository;
