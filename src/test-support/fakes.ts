/**
 * In-process stand-ins for the RPC-facing services, shared by the unit tests.
 */

import { TOKEN_PROGRAM_ID } from '@solana/spl-token';
import { BackoffConfig } from '../config/config';
import { BurnEvent, Cursor, FetchOutcome, Instruction, LedgerTransaction } from '../domain/types';
import { createLogger } from '../infra/logger';
import { BurnEmitter } from '../services/burn-emitter';
import { ScannedSignature } from '../services/signature-scanner';

export const MINT = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
export const OTHER_MINT = 'So11111111111111111111111111111111111111112';
export const SOURCE = 'SourceTokenAccount1111111111111111111111111';
export const AUTHORITY = 'BurnAuthority111111111111111111111111111111';
export const TOKEN_PROGRAM = TOKEN_PROGRAM_ID.toBase58();

export const TEST_BACKOFF: BackoffConfig = { baseDelayMs: 100, maxDelayMs: 1000, multiplier: 2 };

export const silentLog = createLogger('test');

export function burnData(amount: bigint, decimals?: number): Uint8Array {
    const data = new Uint8Array(decimals === undefined ? 9 : 10);
    const view = new DataView(data.buffer);
    view.setUint8(0, decimals === undefined ? 8 : 15);
    view.setBigUint64(1, amount, true);
    if (decimals !== undefined) view.setUint8(9, decimals);
    return data;
}

export function burnInstruction(
    amount: bigint,
    opts: { mint?: string; source?: string; decimals?: number; index?: number; inner?: boolean } = {}
): Instruction {
    return {
        programId: TOKEN_PROGRAM,
        accounts: [opts.source ?? SOURCE, opts.mint ?? MINT, AUTHORITY],
        data: burnData(amount, opts.decimals),
        index: opts.index ?? 0,
        inner: opts.inner ?? false,
    };
}

export function transferInstruction(index = 0): Instruction {
    // SPL Token Transfer: tag 3 + u64 amount
    const data = new Uint8Array(9);
    data[0] = 3;
    return { programId: TOKEN_PROGRAM, accounts: [SOURCE, 'Dest1111111111111111111111111111111111111111', AUTHORITY], data, index, inner: false };
}

export function ledgerTx(signature: string, instructions: Instruction[], slot = 100): LedgerTransaction {
    return { signature, slot, blockTime: 1_700_000_000, failed: false, instructions };
}

export function scanned(...signatures: string[]): ScannedSignature[] {
    return signatures.map((signature, i) => ({ signature, slot: 100 + i }));
}

type ScanStep = ScannedSignature[] | Error;

export class FakeScanner {
    readonly calls: Array<{ mint: string; cursor: Cursor | null }> = [];
    private readonly steps: ScanStep[];

    constructor(steps: ScanStep[]) {
        this.steps = [...steps];
    }

    async scan(mint: string, cursor: Cursor | null): Promise<ScannedSignature[]> {
        this.calls.push({ mint, cursor });
        const step = this.steps.shift() ?? [];
        if (step instanceof Error) throw step;
        return step;
    }
}

export class FakeFetcher {
    readonly calls: string[] = [];
    private readonly failures = new Map<string, Error[]>();

    constructor(private readonly outcomes: Map<string, FetchOutcome> = new Map()) {}

    static of(transactions: LedgerTransaction[]): FakeFetcher {
        return new FakeFetcher(
            new Map<string, FetchOutcome>(transactions.map((transaction): [string, FetchOutcome] => [transaction.signature, { ok: true, transaction }]))
        );
    }

    set(signature: string, outcome: FetchOutcome): this {
        this.outcomes.set(signature, outcome);
        return this;
    }

    /** The next `errors.length` fetches of `signature` reject, in order. */
    failFirst(signature: string, errors: Error[]): this {
        this.failures.set(signature, [...errors]);
        return this;
    }

    async fetch(signature: string): Promise<FetchOutcome> {
        this.calls.push(signature);
        const error = this.failures.get(signature)?.shift();
        if (error) throw error;
        return this.outcomes.get(signature) ?? { ok: false, kind: 'NotFound', signature };
    }
}

export class RecordingEmitter implements BurnEmitter {
    readonly events: BurnEvent[] = [];

    emit(event: BurnEvent): void {
        this.events.push(event);
    }
}

/** Sleep that records requested delays and returns at once. */
export function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
    const delays: number[] = [];
    return {
        delays,
        sleep: async (ms: number) => {
            delays.push(ms);
        },
    };
}
