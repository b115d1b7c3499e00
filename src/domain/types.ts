// src/domain/types.ts
export type Signature = string; // base58 transaction signature

export interface Instruction {
    programId: string;  // base58 program id
    accounts: string[]; // base58 account keys, in instruction order
    data: Uint8Array;   // raw instruction payload
    index: number;      // top-level instruction index (parent index for inner ones)
    inner: boolean;     // true when executed through CPI (meta.innerInstructions)
}

export interface LedgerTransaction {
    signature: Signature;
    slot: number;
    blockTime: number | null; // unix seconds, when the node knows it
    failed: boolean;          // meta.err was set; nothing it did landed
    instructions: Instruction[];
}

export type BurnKind = 'burn' | 'burnChecked';

export type BurnOperation =
    | { kind: 'notBurn' }
    | {
          kind: 'burn';
          amount: bigint;
          sourceAccount: string;
          mint: string;
          authority: string;
      }
    | {
          kind: 'burnChecked';
          amount: bigint;
          decimals: number;
          sourceAccount: string;
          mint: string;
          authority: string;
      };

export type DecodedBurn = Exclude<BurnOperation, { kind: 'notBurn' }>;

export interface BurnEvent {
    readonly signature: Signature;
    readonly mint: string;
    readonly sourceAccount: string;
    readonly amount: bigint;    // raw integer units, never scaled
    readonly kind: BurnKind;
    readonly decimals?: number; // only for burnChecked
    readonly authority: string;
    readonly slot: number;
    readonly blockTime: number | null;
    readonly instructionIndex: number;
    readonly inner: boolean;
}

// Wire form handed to sinks: bigint amount rendered as a decimal string.
export interface BurnRecord {
    signature: string;
    mint: string;
    source: string;
    amount: string;
    kind: BurnKind;
    decimals?: number;
    authority: string;
    slot: number;
    blockTime: number | null;
    instructionIndex: number;
    inner: boolean;
}

export interface Cursor {
    signature: Signature;
    slot: number;
}

export type FetchOutcome =
    | { ok: true; transaction: LedgerTransaction }
    | { ok: false; kind: 'NotFound'; signature: Signature }
    | { ok: false; kind: 'Malformed'; signature: Signature; reason: string };

export type PollPhase = 'idle' | 'scanning' | 'fetching' | 'decoding' | 'emitting' | 'backoff';

export interface CycleStats {
    scanned: number;   // signatures returned by the scanner
    skipped: number;   // already seen
    fetched: number;   // fetched and decoded
    notFound: number;
    malformed: number;
    burns: number;     // events emitted
}

export function toBurnRecord(event: BurnEvent): BurnRecord {
    const record: BurnRecord = {
        signature: event.signature,
        mint: event.mint,
        source: event.sourceAccount,
        amount: event.amount.toString(),
        kind: event.kind,
        authority: event.authority,
        slot: event.slot,
        blockTime: event.blockTime,
        instructionIndex: event.instructionIndex,
        inner: event.inner,
    };
    if (event.decimals !== undefined) record.decimals = event.decimals;
    return record;
}
