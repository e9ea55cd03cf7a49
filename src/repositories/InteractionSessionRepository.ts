import type { Database } from './DatabaseConnection';
import type { InteractionSession, SessionStatus } from '../types/interaction.types';
import { describeError } from './TransceiverRepository';
import logger from '../utils/logger';

export interface InteractionSessionRow {
  controller_callsign: string;
  flight_callsign: string;
  frequency_hz: string | number;
  start_time: Date;
  end_time: Date;
  sample_count: number;
  min_distance_nm: number;
  max_distance_nm: number;
  status: string;
}

const toStatus = (value: string): SessionStatus => (value === 'open' ? 'open' : 'closed');

/**
 * Storage for aggregated controller/flight contact sessions
 */
class InteractionSessionRepository {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async createTable(): Promise<void> {
    const query = `
      CREATE TABLE IF NOT EXISTS controller_flight_sessions (
        id SERIAL PRIMARY KEY,
        controller_callsign TEXT NOT NULL,
        flight_callsign TEXT NOT NULL,
        frequency_hz BIGINT NOT NULL,
        start_time TIMESTAMPTZ NOT NULL,
        end_time TIMESTAMPTZ NOT NULL,
        sample_count INT NOT NULL,
        min_distance_nm FLOAT8 NOT NULL,
        max_distance_nm FLOAT8 NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('open', 'closed')),
        created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT uniq_controller_flight_session
          UNIQUE (controller_callsign, flight_callsign, frequency_hz, start_time)
      );

      CREATE INDEX IF NOT EXISTS idx_controller_flight_sessions_status
        ON controller_flight_sessions(status);
    `;

    await this.db.none(query);
    logger.info('controller_flight_sessions table ready');
  }

  /**
   * Upserts sessions in one transaction. Rows of the `replaced` sessions, the
   * carried-over sessions the new ones were built from, are deleted first since
   * a continued session may have moved its start_time.
   */
  async saveSessions(
    sessions: readonly InteractionSession[],
    replaced: readonly InteractionSession[] = [],
  ): Promise<number> {
    if (sessions.length === 0 && replaced.length === 0) {
      return 0;
    }

    const deleteQuery = `
      DELETE FROM controller_flight_sessions
      WHERE controller_callsign = $1
        AND flight_callsign = $2
        AND frequency_hz = $3
        AND start_time = $4;
    `;

    const query = `
      INSERT INTO controller_flight_sessions (
        controller_callsign,
        flight_callsign,
        frequency_hz,
        start_time,
        end_time,
        sample_count,
        min_distance_nm,
        max_distance_nm,
        status
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      ON CONFLICT ON CONSTRAINT uniq_controller_flight_session DO UPDATE SET
        end_time = GREATEST(controller_flight_sessions.end_time, EXCLUDED.end_time),
        sample_count = EXCLUDED.sample_count,
        min_distance_nm = LEAST(controller_flight_sessions.min_distance_nm, EXCLUDED.min_distance_nm),
        max_distance_nm = GREATEST(controller_flight_sessions.max_distance_nm, EXCLUDED.max_distance_nm),
        status = EXCLUDED.status,
        updated_at = CURRENT_TIMESTAMP;
    `;

    try {
      await this.db.tx(async (t) => {
        for (const session of replaced) {
          await t.none(deleteQuery, [
            session.controllerCallsign,
            session.flightCallsign,
            session.frequencyHz,
            session.startTime,
          ]);
        }
        for (const session of sessions) {
          await t.none(query, [
            session.controllerCallsign,
            session.flightCallsign,
            session.frequencyHz,
            session.startTime,
            session.endTime,
            session.sampleCount,
            session.minDistanceNm,
            session.maxDistanceNm,
            session.status,
          ]);
        }
      });
    } catch (error) {
      logger.error('Error saving interaction sessions', {
        sessions: sessions.length,
        replaced: replaced.length,
        error: describeError(error),
      });
      throw error;
    }

    logger.debug('Saved interaction sessions', { count: sessions.length, replaced: replaced.length });
    return sessions.length;
  }

  /**
   * Sessions left open by the previous analysis, to be continued by the next one
   */
  async findOpenSessions(): Promise<InteractionSession[]> {
    const query = `
      SELECT controller_callsign, flight_callsign, frequency_hz, start_time, end_time,
             sample_count, min_distance_nm, max_distance_nm, status
      FROM controller_flight_sessions
      WHERE status = 'open'
      ORDER BY start_time;
    `;

    try {
      const rows = await this.db.manyOrNone<InteractionSessionRow>(query);
      return rows.map((row) => {
        const frequencyHz = Number(row.frequency_hz);
        return {
          controllerCallsign: row.controller_callsign,
          flightCallsign: row.flight_callsign,
          frequencyHz,
          frequencyMhz: frequencyHz / 1_000_000,
          startTime: row.start_time,
          endTime: row.end_time,
          sampleCount: row.sample_count,
          minDistanceNm: row.min_distance_nm,
          maxDistanceNm: row.max_distance_nm,
          status: toStatus(row.status),
        };
      });
    } catch (error) {
      logger.error('Error fetching open interaction sessions', { error: describeError(error) });
      throw error;
    }
  }
}

export default InteractionSessionRepository;
