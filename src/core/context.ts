import type { Logger } from '../types/logger.js';
import type { SessionConfig } from './config.js';

/**
 * What a protocol client sees of the session that created it
 */
export interface SessionContext {
  readonly config: SessionConfig;
  readonly logger: Logger;

  /**
   * @throws {StateError} once the session has been closed
   */
  assertOpen(): void;
}
