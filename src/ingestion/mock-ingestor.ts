// Mock Ingestor
// Loads a fixed batch of signal records from a JSON file

import fs from 'fs';
import path from 'path';
import logger from '../shared/logger';
import { InvalidInputError } from '../shared/errors';
import { Signal } from '../shared/types';
import { signalFromRecord } from './signal';

export const DEFAULT_MOCK_SIGNALS_PATH = path.join(__dirname, '../../data/mock-signals.json');

export function loadMockSignals(filePath: string = DEFAULT_MOCK_SIGNALS_PATH): Signal[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  if (!Array.isArray(raw)) {
    throw new InvalidInputError(`Expected a JSON array of signal records in ${filePath}`);
  }

  const signals = raw.map(record => signalFromRecord(record));
  logger.info(`[MockIngestor] Loaded ${signals.length} signals from ${path.basename(filePath)}`);
  return signals;
}
