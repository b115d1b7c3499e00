import { BackoffConfig } from '../config/config';
import { AbortError, describeError } from '../domain/errors';
import { CycleStats, PollPhase } from '../domain/types';
import { DEFAULT_BACKOFF, sleep as defaultSleep, SleepFn } from '../helpers/backoff';
import { createLogger, Logger } from '../infra/logger';
import { DedupTracker } from '../services/dedup-tracker';
import { StateStore } from '../services/state-store';
import { CycleDeps, CycleResult, emptyStats, PollState, runCycle } from './poll-cycle';

export interface BurnMonitorOptions {
    mint: string;
    scanner: CycleDeps['scanner'];
    fetcher: CycleDeps['fetcher'];
    emitter: CycleDeps['emitter'];
    pollIntervalMs?: number;        // default 10s
    backoff?: BackoffConfig;
    dedupCapacity?: number;         // used when no initial state is given
    initialState?: PollState;
    stateStore?: StateStore | null; // persists the state after each cycle
    sleep?: SleepFn;
    log?: Logger;
}

export interface MonitorStats extends CycleStats {
    cycles: number;
    failedCycles: number;
}

/**
 * Drives {@link runCycle} on a fixed interval. Cycles never overlap: the next
 * wait starts once the previous cycle has finished. `stop()` interrupts the
 * wait or a backoff and resolves once the loop has exited; a batch cut short
 * by `stop()` is still committed and persisted up to its last handled signature.
 */
export class BurnMonitor {
    private readonly mint: string;
    private readonly deps: Omit<CycleDeps, 'signal'>;
    private readonly pollIntervalMs: number;
    private readonly stateStore: StateStore | null;
    private readonly sleep: SleepFn;
    private readonly log: Logger;

    private state: PollState;
    private currentPhase: PollPhase = 'idle';
    private readonly totals: MonitorStats = { ...emptyStats(), cycles: 0, failedCycles: 0 };

    private controller: AbortController | null = null;
    private loopPromise: Promise<void> | null = null;

    constructor(opts: BurnMonitorOptions) {
        this.mint = opts.mint;
        this.pollIntervalMs = opts.pollIntervalMs ?? 10_000;
        this.stateStore = opts.stateStore ?? null;
        this.sleep = opts.sleep ?? defaultSleep;
        this.log = opts.log ?? createLogger('burn-monitor');
        this.state = opts.initialState ?? {
            cursor: null,
            tracker: new DedupTracker(opts.dedupCapacity ?? 10_000),
        };
        this.deps = {
            mint: opts.mint,
            scanner: opts.scanner,
            fetcher: opts.fetcher,
            emitter: opts.emitter,
            backoff: opts.backoff ?? DEFAULT_BACKOFF,
            log: this.log,
            sleep: this.sleep,
            onPhase: (phase) => {
                this.currentPhase = phase;
            },
        };
    }

    get phase(): PollPhase {
        return this.currentPhase;
    }

    get isRunning(): boolean {
        return this.loopPromise !== null;
    }

    getState(): PollState {
        return this.state;
    }

    getStats(): MonitorStats {
        return { ...this.totals };
    }

    async start(): Promise<void> {
        if (this.loopPromise) {
            this.log.warn('Burn monitor is already running');
            return;
        }

        this.controller = new AbortController();
        this.log.info('Starting burn monitor', {
            mint: this.mint,
            pollIntervalMs: this.pollIntervalMs,
            cursor: this.state.cursor?.signature ?? null,
            seen: this.state.tracker.size,
        });
        this.loopPromise = this.loop(this.controller.signal);
    }

    async stop(): Promise<void> {
        if (!this.controller || !this.loopPromise) return;

        this.controller.abort();
        await this.loopPromise;
        this.controller = null;
        this.loopPromise = null;
        this.currentPhase = 'idle';
        this.log.info('Burn monitor stopped', { cursor: this.state.cursor?.signature ?? null });
    }

    /** Runs a single cycle and commits its state, including an interrupted one. */
    async pollOnce(signal?: AbortSignal): Promise<CycleResult> {
        const result = await runCycle(this.state, { ...this.deps, signal });
        this.state = result.state;
        this.record(result.stats);
        this.persist();

        if (!result.interrupted && result.stats.scanned > 0) {
            this.log.info('Cycle complete', { ...result.stats, cursor: result.state.cursor?.signature ?? null });
        }
        return result;
    }

    private async loop(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            try {
                await this.pollOnce(signal);
            } catch (error) {
                if (error instanceof AbortError) break;
                this.totals.failedCycles++;
                this.currentPhase = 'idle';
                this.log.error('Poll cycle failed', { error: describeError(error) });
            }

            try {
                await this.sleep(this.pollIntervalMs, signal);
            } catch (error) {
                if (error instanceof AbortError) break;
                throw error;
            }
        }
    }

    private record(stats: CycleStats): void {
        this.totals.cycles++;
        this.totals.scanned += stats.scanned;
        this.totals.skipped += stats.skipped;
        this.totals.fetched += stats.fetched;
        this.totals.notFound += stats.notFound;
        this.totals.malformed += stats.malformed;
        this.totals.burns += stats.burns;
    }

    private persist(): void {
        if (!this.stateStore) return;
        try {
            this.stateStore.save(this.mint, this.state.cursor, this.state.tracker.toArray());
        } catch (error) {
            // In-memory state stays authoritative; the next cycle tries again.
            this.log.error('Could not persist monitor state', { error: describeError(error) });
        }
    }
}
