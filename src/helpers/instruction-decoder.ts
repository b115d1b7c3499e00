import { TOKEN_2022_PROGRAM_ID, TOKEN_PROGRAM_ID } from '@solana/spl-token';
import { BurnOperation, DecodedBurn, Instruction, LedgerTransaction } from '../domain/types';

/** Programs whose burn instructions share the SPL Token layout. */
export const TOKEN_PROGRAM_IDS: ReadonlySet<string> = new Set([
    TOKEN_PROGRAM_ID.toBase58(),
    TOKEN_2022_PROGRAM_ID.toBase58(),
]);

// Account positions shared by Burn and BurnChecked: [source, mint, authority, ...signers]
const SOURCE_INDEX = 0;
const MINT_INDEX = 1;
const AUTHORITY_INDEX = 2;
const MIN_ACCOUNTS = 3;

type FieldType = 'u8' | 'u64';

export interface FieldSpec {
    name: 'amount' | 'decimals';
    type: FieldType;
}

export interface BurnLayout {
    kind: DecodedBurn['kind'];
    fields: FieldSpec[];
}

const FIELD_WIDTH: Record<FieldType, number> = { u8: 1, u64: 8 };

/**
 * Burn variants keyed by the leading discriminant byte. Everything after the
 * discriminant is a fixed-width, little-endian field list.
 */
export const BURN_LAYOUTS: ReadonlyMap<number, BurnLayout> = new Map<number, BurnLayout>([
    [8, { kind: 'burn', fields: [{ name: 'amount', type: 'u64' }] }],
    [
        15,
        {
            kind: 'burnChecked',
            fields: [
                { name: 'amount', type: 'u64' },
                { name: 'decimals', type: 'u8' },
            ],
        },
    ],
]);

const NOT_BURN: BurnOperation = { kind: 'notBurn' };

export function layoutSize(layout: BurnLayout): number {
    return layout.fields.reduce((size, f) => size + FIELD_WIDTH[f.type], 1);
}

/**
 * Recognizes token burns from a raw instruction. Anything it does not understand,
 * including truncated payloads and short account lists, is `notBurn`.
 */
export function decodeInstruction(programId: string, accounts: readonly string[], data: Uint8Array): BurnOperation {
    if (!TOKEN_PROGRAM_IDS.has(programId)) return NOT_BURN;
    if (data.length === 0 || accounts.length < MIN_ACCOUNTS) return NOT_BURN;

    const layout = BURN_LAYOUTS.get(data[0]);
    if (!layout || data.length < layoutSize(layout)) return NOT_BURN;

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    let offset = 1;
    let amount = 0n;
    let decimals = 0;
    for (const field of layout.fields) {
        const value = field.type === 'u64' ? view.getBigUint64(offset, true) : view.getUint8(offset);
        if (field.name === 'amount') amount = BigInt(value);
        else decimals = Number(value);
        offset += FIELD_WIDTH[field.type];
    }

    const sourceAccount = accounts[SOURCE_INDEX];
    const mint = accounts[MINT_INDEX];
    const authority = accounts[AUTHORITY_INDEX];

    if (layout.kind === 'burnChecked') {
        return { kind: 'burnChecked', amount, decimals, sourceAccount, mint, authority };
    }
    return { kind: 'burn', amount, sourceAccount, mint, authority };
}

export interface MatchedBurn {
    instruction: Instruction;
    operation: DecodedBurn;
}

/** Every burn of `mint` in the transaction, in instruction order. */
export function decodeTransactionBurns(tx: LedgerTransaction, mint: string): MatchedBurn[] {
    const matches: MatchedBurn[] = [];
    for (const instruction of tx.instructions) {
        const operation = decodeInstruction(instruction.programId, instruction.accounts, instruction.data);
        if (operation.kind === 'notBurn') continue;
        if (operation.mint !== mint) continue;
        matches.push({ instruction, operation });
    }
    return matches;
}
