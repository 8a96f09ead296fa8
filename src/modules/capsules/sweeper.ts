import pino from 'pino';
import { config } from '../../config';
import type { Db } from '../../db';
import type { Clock } from '../../lib/time';
import { deriveState } from './lifecycle';
import { findUnexpiredCapsules, markExpired } from './repo';

type SweepLogger = {
    info: (obj: Record<string, unknown>, msg?: string) => void;
    error: (obj: Record<string, unknown>, msg?: string) => void;
};

const createDefaultLogger = (): SweepLogger =>
    pino({ level: config.logLevel }).child({ module: 'sweeper' });

export interface SweepResult {
    scanned: number;
    expired: number;
    failed: number;
}

/**
 * Periodically flips the `expired` flag on capsules whose retention window
 * has passed.
 *
 * The flag is a cache: request paths derive state from timestamps on their
 * own, so a late or failed sweep never changes what callers observe.
 */
export class ExpirationSweeper {
    private timer: NodeJS.Timeout | null = null;

    constructor(
        private readonly db: Db,
        private readonly clock: Clock,
        private readonly intervalMs: number = config.sweepIntervalMs,
        private readonly logger: SweepLogger = createDefaultLogger(),
    ) { }

    get started(): boolean {
        return this.timer !== null;
    }

    /**
     * Runs one sweep cycle. Never rejects: failures are logged and reflected
     * in the returned counts.
     */
    async runOnce(): Promise<SweepResult> {
        const result: SweepResult = { scanned: 0, expired: 0, failed: 0 };

        try {
            const now = this.clock.now();
            const candidates = findUnexpiredCapsules(this.db);
            result.scanned = candidates.length;

            const due: number[] = [];
            for (const capsule of candidates) {
                try {
                    if (deriveState(capsule, now) === 'expired') {
                        due.push(capsule.id);
                    }
                } catch (error) {
                    result.failed++;
                    this.logger.error({ err: error, capsuleId: capsule.id }, 'Failed to evaluate capsule');
                }
            }

            result.expired = this.db.transaction((tx) => markExpired(tx, due));
            this.logger.info({ ...result }, 'Expiration sweep complete');
        } catch (error) {
            this.logger.error({ err: error }, 'Expiration sweep failed');
        }
        return result;
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            void this.runOnce();
        }, this.intervalMs).unref();
        this.logger.info({ intervalMs: this.intervalMs }, 'Expiration sweeper started');
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
        this.logger.info({}, 'Expiration sweeper stopped');
    }
}
