import bs58 from 'bs58';
import { Finality, MessageAccountKeys, MessageV0, VersionedTransactionResponse } from '@solana/web3.js';
import { describeError, MalformedResponseError } from '../domain/errors';
import { FetchOutcome, Instruction, LedgerTransaction, Signature } from '../domain/types';
import { LedgerRpc } from '../infra/rpc-provider';

export interface TransactionFetcherOptions {
    commitment?: Finality;
}

/**
 * Fetches a transaction and flattens it into raw instructions (top-level first,
 * then inner instructions in execution order). Pruned transactions come back as
 * `NotFound`, unparseable ones as `Malformed`; a {@link TransientRpcError} from the
 * provider propagates so the caller can back off.
 */
export class TransactionFetcher {
    private readonly commitment: Finality;

    constructor(private readonly rpc: LedgerRpc, opts: TransactionFetcherOptions = {}) {
        this.commitment = opts.commitment ?? 'finalized';
    }

    async fetch(signature: Signature): Promise<FetchOutcome> {
        let response: VersionedTransactionResponse | null;
        try {
            response = await this.rpc.getTransaction(signature, this.commitment);
        } catch (e) {
            if (e instanceof MalformedResponseError) {
                return { ok: false, kind: 'Malformed', signature, reason: e.message };
            }
            throw e;
        }

        if (!response) return { ok: false, kind: 'NotFound', signature };

        try {
            return { ok: true, transaction: toLedgerTransaction(signature, response) };
        } catch (e) {
            return { ok: false, kind: 'Malformed', signature, reason: describeError(e) };
        }
    }
}

export function toLedgerTransaction(signature: Signature, response: VersionedTransactionResponse): LedgerTransaction {
    const message = response.transaction?.message;
    if (!message) throw new Error('response carries no transaction message');

    const meta = response.meta;
    // v0 messages reference lookup-table keys the node resolved into meta.loadedAddresses
    const keys: MessageAccountKeys =
        message instanceof MessageV0
            ? message.getAccountKeys({ accountKeysFromLookups: meta?.loadedAddresses ?? null })
            : message.getAccountKeys();

    const instructions: Instruction[] = message.compiledInstructions.map((ix, index) => ({
        programId: keyAt(keys, ix.programIdIndex),
        accounts: ix.accountKeyIndexes.map((i) => keyAt(keys, i)),
        data: ix.data,
        index,
        inner: false,
    }));

    for (const group of meta?.innerInstructions ?? []) {
        for (const ix of group.instructions) {
            instructions.push({
                programId: keyAt(keys, ix.programIdIndex),
                accounts: ix.accounts.map((i) => keyAt(keys, i)),
                data: bs58.decode(ix.data),
                index: group.index,
                inner: true,
            });
        }
    }

    return {
        signature,
        slot: response.slot,
        blockTime: response.blockTime ?? null,
        failed: meta?.err != null,
        instructions,
    };
}

function keyAt(keys: MessageAccountKeys, index: number): string {
    const key = keys.get(index);
    if (!key) throw new Error(`account index ${index} out of range (${keys.length} keys)`);
    return key.toBase58();
}
