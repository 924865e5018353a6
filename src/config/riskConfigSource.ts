import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import type { RiskConfig } from '../types';
import { parseRiskConfig } from './index';

export type RiskLoader = () => unknown;

/**
 * Holds the session's risk snapshot. Readers always see a whole, frozen
 * snapshot; reload validates first and swaps the reference in one step.
 */
export class RiskConfigSource {
  private snapshot: Readonly<RiskConfig>;
  private loader: RiskLoader;

  constructor(loader: RiskLoader) {
    this.loader = loader;
    // throws ConfigurationError: a session never starts on an invalid snapshot
    this.snapshot = Object.freeze(parseRiskConfig(loader()));
  }

  current(): Readonly<RiskConfig> {
    return this.snapshot;
  }

  reload(): Readonly<RiskConfig> {
    let next: RiskConfig;
    try {
      next = parseRiskConfig(this.loader());
    } catch (error) {
      logger.error('RiskConfig', 'Reload rejected, keeping previous snapshot', { error: errorMessage(error) });
      throw error;
    }
    this.snapshot = Object.freeze(next);
    logger.info('RiskConfig', 'Risk snapshot reloaded', { ...next });
    return this.snapshot;
  }
}
