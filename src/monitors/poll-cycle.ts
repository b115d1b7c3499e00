import { BackoffConfig } from '../config/config';
import { AbortError, describeError } from '../domain/errors';
import { BurnEvent, Cursor, CycleStats, DecodedBurn, FetchOutcome, Instruction, LedgerTransaction, PollPhase } from '../domain/types';
import { decodeTransactionBurns } from '../helpers/instruction-decoder';
import { SleepFn, withBackoff } from '../helpers/backoff';
import { Logger } from '../infra/logger';
import { BurnEmitter } from '../services/burn-emitter';
import { DedupTracker } from '../services/dedup-tracker';
import { ScannedSignature } from '../services/signature-scanner';

export interface PollState {
    cursor: Cursor | null;
    tracker: DedupTracker;
}

export interface CycleDeps {
    mint: string;
    scanner: { scan(mint: string, cursor: Cursor | null): Promise<ScannedSignature[]> };
    fetcher: { fetch(signature: string): Promise<FetchOutcome> };
    emitter: BurnEmitter;
    backoff: BackoffConfig;
    log: Logger;
    signal?: AbortSignal;
    sleep?: SleepFn;
    onPhase?: (phase: PollPhase) => void;
}

export interface CycleResult {
    state: PollState;
    events: BurnEvent[];
    stats: CycleStats;
    interrupted: boolean; // aborted mid-batch; cursor stops at the last handled signature
}

export function emptyStats(): CycleStats {
    return { scanned: 0, skipped: 0, fetched: 0, notFound: 0, malformed: 0, burns: 0 };
}

/**
 * One scan → fetch → decode → dedup → emit pass.
 *
 * The input state is left untouched; marks go to a copy of its tracker that is
 * returned with the new cursor. Every signature in the batch is marked seen
 * once handled, burn or not, and the returned cursor points at the newest
 * signature of the batch.
 *
 * An abort while the scan backs off rejects with `AbortError`. Once the batch
 * has started, an abort stops before the next unhandled signature and returns
 * with `interrupted` set: the cursor points at the last handled signature, so
 * everything behind it is marked and nothing unhandled is skipped.
 */
export async function runCycle(state: PollState, deps: CycleDeps): Promise<CycleResult> {
    const { mint, scanner, fetcher, emitter, log } = deps;
    const stats = emptyStats();
    const events: BurnEvent[] = [];
    const setPhase = (phase: PollPhase): void => {
        deps.onPhase?.(phase);
        log.debug(`phase → ${phase}`);
    };
    const retrying = (what: string) => (attempt: number, error: Error, delayMs: number): void => {
        setPhase('backoff');
        log.warn(`${what} failed, backing off`, { attempt, delayMs, error: error.message });
    };

    setPhase('scanning');
    const batch = await withBackoff(() => scanner.scan(mint, state.cursor), {
        config: deps.backoff,
        signal: deps.signal,
        sleep: deps.sleep,
        onRetry: retrying('Signature scan'),
    });
    stats.scanned = batch.length;

    if (batch.length === 0) {
        setPhase('idle');
        return { state, events, stats, interrupted: false };
    }

    const tracker = state.tracker.clone();
    let checkpoint = state.cursor;
    let interrupted = false;

    for (const { signature, slot } of batch) {
        if (tracker.seen(signature)) {
            stats.skipped++;
            checkpoint = { signature, slot };
            continue;
        }

        setPhase('fetching');
        let outcome: FetchOutcome;
        try {
            outcome = await withBackoff(() => fetcher.fetch(signature), {
                config: deps.backoff,
                signal: deps.signal,
                sleep: deps.sleep,
                onRetry: retrying(`Fetch of ${signature}`),
            });
        } catch (error) {
            if (!(error instanceof AbortError)) throw error;
            log.info('Cycle interrupted, keeping progress up to the last handled signature', {
                checkpoint: checkpoint?.signature ?? null,
                pending: signature,
            });
            interrupted = true;
            break;
        }

        if (!outcome.ok) {
            if (outcome.kind === 'NotFound') {
                stats.notFound++;
                log.warn('Transaction not available, skipping', { signature });
            } else {
                stats.malformed++;
                log.warn('Transaction could not be parsed, skipping', { signature, reason: outcome.reason });
            }
        } else {
            setPhase('decoding');
            stats.fetched++;
            const tx = outcome.transaction;
            const matches = tx.failed ? [] : decodeTransactionBurns(tx, mint);

            for (const { instruction, operation } of matches) {
                setPhase('emitting');
                const event = toBurnEvent(tx, instruction, operation);
                try {
                    await emitter.emit(event);
                } catch (error) {
                    log.error('Emitter rejected burn event', { signature, error: describeError(error) });
                }
                events.push(event);
                stats.burns++;
            }
        }

        tracker.mark(signature);
        checkpoint = { signature, slot };
    }

    setPhase('idle');
    return { state: { cursor: checkpoint, tracker }, events, stats, interrupted };
}

export function toBurnEvent(tx: LedgerTransaction, instruction: Instruction, operation: DecodedBurn): BurnEvent {
    const event: BurnEvent = {
        signature: tx.signature,
        mint: operation.mint,
        sourceAccount: operation.sourceAccount,
        amount: operation.amount,
        kind: operation.kind,
        authority: operation.authority,
        slot: tx.slot,
        blockTime: tx.blockTime,
        instructionIndex: instruction.index,
        inner: instruction.inner,
        ...(operation.kind === 'burnChecked' ? { decimals: operation.decimals } : {}),
    };
    return Object.freeze(event);
}
