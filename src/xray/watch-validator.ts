import { ZodError } from 'zod';
import { httpStatusOf, describeHttpError, responseBodyOf } from '../http/platform-http.js';
import type { Logger } from '../utils/logger.js';
import type { XrayClient } from './xray-client.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export type WatchValidation =
  | { valid: true }
  | { valid: false; reason: 'not-found' }
  | { valid: false; reason: 'http-error'; status: number; body: string }
  | { valid: false; reason: 'connection-error'; message: string };

// ---------------------------------------------------------------------------
// validateWatch
// ---------------------------------------------------------------------------

/**
 * Check that a watch exists before paging through its violations.
 *
 * The violations endpoint answers an unknown watch with an empty result,
 * which would be indistinguishable from a clean watch.
 */
export async function validateWatch(
  client: XrayClient,
  watchName: string,
  logger: Logger,
): Promise<WatchValidation> {
  logger.info('Validating Watch name...');

  try {
    await client.getWatch(watchName);
  } catch (err) {
    if (!(err instanceof ZodError)) {
      return watchFailure(err, watchName, logger);
    }
    // The definition did not parse, but it came with a 2xx status.
    logger.debug(`   Watch ${watchName} has an unexpected definition.`);
  }

  logger.info(`   Watch ${watchName} validated successfully.`);
  return { valid: true };
}

function watchFailure(err: unknown, watchName: string, logger: Logger): WatchValidation {
  const status = httpStatusOf(err);

  if (status === 404) {
    logger.error(`   Watch ${watchName} does not exist.`);
    return { valid: false, reason: 'not-found' };
  }

  if (status !== null) {
    const body = responseBodyOf(err);
    logger.error(`Error validating watch (HTTP ${status}).`);
    logger.error(`API Response: ${body}`);
    return { valid: false, reason: 'http-error', status, body };
  }

  const message = describeHttpError(err);
  logger.error(`Connection or Request Error: ${message}`);
  return { valid: false, reason: 'connection-error', message };
}
