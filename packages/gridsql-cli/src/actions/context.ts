/**
 * What the actions need from their surroundings; tests replace all of it
 */

import { Database, loadWeatherExtension } from 'gridsql';
import { Logger } from '../utils/logger.js';

export interface CliContext {
  logger: Logger;
  createDatabase: () => Database;
  exit: (code: number) => void;
}

export function createDefaultContext(): CliContext {
  return {
    logger: new Logger(),
    createDatabase: () => {
      const db = new Database();
      loadWeatherExtension(db);
      return db;
    },
    exit: (code) => {
      process.exitCode = code;
    },
  };
}
