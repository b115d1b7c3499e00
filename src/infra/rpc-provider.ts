import {
    ConfirmedSignatureInfo,
    Connection,
    Finality,
    PublicKey,
    SignaturesForAddressOptions,
    SolanaJSONRPCError,
    VersionedTransactionResponse,
} from '@solana/web3.js';
import { MalformedResponseError, TransientRpcError } from '../domain/errors';

// JSON-RPC code for a transaction version above maxSupportedTransactionVersion.
const UNSUPPORTED_TRANSACTION_VERSION = -32015;

/**
 * The two ledger queries the pipeline needs, plus a liveness probe used at startup.
 * Every method rejects with {@link TransientRpcError} when the call itself fails;
 * `getTransaction` rejects with {@link MalformedResponseError} when the node answered
 * with something that cannot be parsed as a transaction.
 */
export interface LedgerRpc {
    getSignaturesForAddress(
        address: string,
        options: SignaturesForAddressOptions,
        commitment: Finality
    ): Promise<ConfirmedSignatureInfo[]>;

    getTransaction(signature: string, commitment: Finality): Promise<VersionedTransactionResponse | null>;

    getVersion(): Promise<string>;
}

export class RpcProvider implements LedgerRpc {
    private readonly connection: Connection;

    constructor(connection: Connection) {
        this.connection = connection;
    }

    static fromEndpoint(endpoint: string, commitment: Finality): RpcProvider {
        return new RpcProvider(new Connection(endpoint, { commitment, disableRetryOnRateLimit: true }));
    }

    async getSignaturesForAddress(
        address: string,
        options: SignaturesForAddressOptions,
        commitment: Finality
    ): Promise<ConfirmedSignatureInfo[]> {
        try {
            // newest first, as returned by the node
            return await this.connection.getSignaturesForAddress(new PublicKey(address), options, commitment);
        } catch (e) {
            throw new TransientRpcError('getSignaturesForAddress', e);
        }
    }

    async getTransaction(signature: string, commitment: Finality): Promise<VersionedTransactionResponse | null> {
        try {
            // Returns null once the node has pruned the transaction (or never saw it).
            return await this.connection.getTransaction(signature, {
                maxSupportedTransactionVersion: 0,
                commitment,
            });
        } catch (e) {
            if (isPermanentParseFailure(e)) {
                throw new MalformedResponseError('getTransaction', e);
            }
            throw new TransientRpcError('getTransaction', e);
        }
    }

    async getVersion(): Promise<string> {
        try {
            const version = await this.connection.getVersion();
            return version['solana-core'];
        } catch (e) {
            throw new TransientRpcError('getVersion', e);
        }
    }
}

function isPermanentParseFailure(error: unknown): boolean {
    if (error instanceof SolanaJSONRPCError) {
        return error.code === UNSUPPORTED_TRANSACTION_VERSION;
    }
    // superstruct rejects a result that does not match the expected response shape
    return error instanceof Error && error.name === 'StructError';
}
