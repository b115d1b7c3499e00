import { Finality, SignaturesForAddressOptions } from '@solana/web3.js';
import { Cursor, Signature } from '../domain/types';
import { LedgerRpc } from '../infra/rpc-provider';

export interface ScannedSignature {
    signature: Signature;
    slot: number;
}

export interface SignatureScannerOptions {
    commitment?: Finality;
    limit?: number; // page size, 1..1000
}

export class SignatureScanner {
    private readonly commitment: Finality;
    private readonly limit: number;

    constructor(private readonly rpc: LedgerRpc, opts: SignatureScannerOptions = {}) {
        this.commitment = opts.commitment ?? 'finalized';
        this.limit = opts.limit ?? 20;
    }

    /**
     * Signatures touching `mint` that are newer than `cursor`, oldest first.
     *
     * Without a cursor only the latest page is returned. With one, pages are
     * walked backwards from the tip until the cursor is reached, so nothing
     * between the cursor and the tip is left out. The whole gap is held in
     * memory before it is returned, which after a long outage on a busy mint
     * can be large.
     */
    async scan(mint: string, cursor: Cursor | null): Promise<ScannedSignature[]> {
        const newestFirst: ScannedSignature[] = [];
        let before: string | undefined;

        for (;;) {
            const options: SignaturesForAddressOptions = { limit: this.limit };
            if (cursor) options.until = cursor.signature;
            if (before) options.before = before;

            const page = await this.rpc.getSignaturesForAddress(mint, options, this.commitment);
            for (const info of page) {
                newestFirst.push({ signature: info.signature, slot: info.slot });
            }

            if (!cursor || page.length < this.limit) break;
            before = page[page.length - 1].signature;
        }

        return newestFirst.reverse();
    }
}
