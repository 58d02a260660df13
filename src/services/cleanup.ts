import { errorMessage } from '../errors';
import { Repositories } from '../repos';
import { BotLogger } from './logger';

export const MODERATION_ACTIONS_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

export interface CleanupReport {
  strikes: number;
  dedupMarkers: number;
  restrictions: number;
  moderationActions: number;
}

export class CleanupService {
  private runInProgress = false;

  constructor(
    private readonly repos: Pick<Repositories, 'strikes' | 'dedupMarkers' | 'restrictions' | 'moderationActions'>,
    private readonly logger: BotLogger,
  ) {}

  /** Returns null when a previous run is still going or the purge failed. */
  async run(nowTs: number = Date.now()): Promise<CleanupReport | null> {
    if (this.runInProgress) {
      return null;
    }

    this.runInProgress = true;
    try {
      const report: CleanupReport = {
        strikes: this.repos.strikes.purgeExpired(nowTs),
        dedupMarkers: this.repos.dedupMarkers.purgeExpired(nowTs),
        restrictions: this.repos.restrictions.purgeExpired(nowTs),
        moderationActions: this.repos.moderationActions.purgeOlderThan(nowTs - MODERATION_ACTIONS_RETENTION_MS),
      };

      await this.logger.debug('Cleanup finished', { ...report });
      return report;
    } catch (error) {
      await this.logger.error('Cleanup job failed', { error: errorMessage(error) });
      return null;
    } finally {
      this.runInProgress = false;
    }
  }
}
