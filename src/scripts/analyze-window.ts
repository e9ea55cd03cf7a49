#!/usr/bin/env node
/**
 * Runs one interaction analysis over a time window
 *
 * Usage: npm run analyze -- --start 2025-08-22T10:00:00Z --end 2025-08-22T11:00:00Z [--persist]
 */

import { parseArgs } from 'util';
import { analyzeWindowArgsSchema, formatIssues } from '../schemas/interaction.schemas';
import type { AnalyzeWindowArgs } from '../schemas/interaction.schemas';
import type { InteractionSession } from '../types/interaction.types';
import { ConfigurationError } from '../services/ConfigurationError';
import { createInteractionDetectionService } from '../services/InteractionDetectionService';
import { getConnection } from '../repositories/DatabaseConnection';
import InteractionSessionRepository from '../repositories/InteractionSessionRepository';
import { describeError } from '../repositories/TransceiverRepository';
import logger from '../utils/logger';

export function parseAnalyzeArgs(argv: string[]): AnalyzeWindowArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      start: { type: 'string' },
      end: { type: 'string' },
      persist: { type: 'boolean', default: false },
    },
    strict: true,
  });

  const parsed = analyzeWindowArgsSchema.safeParse(values);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

async function analyze(args: AnalyzeWindowArgs): Promise<void> {
  const window = { start: args.start, end: args.end };
  const connection = getConnection();

  try {
    await connection.verify();
    const service = createInteractionDetectionService();

    let carryOver: InteractionSession[] = [];
    if (args.persist) {
      const sessions = new InteractionSessionRepository(connection.getDb());
      await sessions.createTable();
      carryOver = await sessions.findOpenSessions();
      logger.info(`Continuing ${carryOver.length} open session(s)`);
    }

    const result = await service.analyzeWindow(window, { carryOver, persist: args.persist });

    result.sessions.forEach((session) => {
      logger.info(
        `${session.controllerCallsign} <-> ${session.flightCallsign} on ${session.frequencyMhz.toFixed(3)} MHz`,
        {
          start: session.startTime.toISOString(),
          end: session.endTime.toISOString(),
          samples: session.sampleCount,
          minDistanceNm: Math.round(session.minDistanceNm * 10) / 10,
          status: session.status,
        },
      );
    });
    logger.info(`Found ${result.matches.length} match(es) in ${result.sessions.length} session(s)`, {
      persisted: result.persisted,
    });
  } finally {
    await connection.close();
  }
}

if (require.main === module) {
  Promise.resolve()
    .then(() => analyze(parseAnalyzeArgs(process.argv.slice(2))))
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error('Interaction analysis failed', { error: describeError(error) });
      process.exit(1);
    });
}
