/**
 * .env loading
 * Every reader of process.env goes through here, so import order never
 * decides whether .env was seen.
 */

import dotenv from 'dotenv';

/**
 * Merges .env from the working directory into process.env and returns it.
 * Variables already set win; calling it again is harmless.
 */
export function loadDotenv(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}
