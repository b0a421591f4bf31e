import { IUsageRepository } from '../domain/ports/IUsageRepository';

export const CLEANUP_INTERVAL_MS = 24 * 60 * 60 * 1000;

/**
 * Deletes translation log rows past the retention window.
 * Errors are logged; housekeeping never takes the service down.
 */
export async function runLogCleanup(usageRepository: IUsageRepository, retentionDays: number): Promise<number> {
    try {
        return await usageRepository.cleanupOldLogs(retentionDays);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[Housekeeping] Log cleanup failed: ${reason}`);
        return 0;
    }
}

/**
 * Runs log cleanup now and then once a day. The timer does not keep the
 * process alive.
 */
export function scheduleLogCleanup(
    usageRepository: IUsageRepository,
    retentionDays: number,
    intervalMs: number = CLEANUP_INTERVAL_MS
): NodeJS.Timeout {
    void runLogCleanup(usageRepository, retentionDays);
    const timer = setInterval(() => {
        void runLogCleanup(usageRepository, retentionDays);
    }, intervalMs);
    timer.unref();
    return timer;
}
