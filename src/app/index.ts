import { Config, loadConfig } from '../config/config';
import { ConfigurationError, describeError, StateFileError } from '../domain/errors';
import { createLogger } from '../infra/logger';
import { RpcProvider } from '../infra/rpc-provider';
import { BurnMonitor } from '../monitors/burn-monitor';
import { PollState } from '../monitors/poll-cycle';
import { BurnEmitter, CompositeBurnEmitter, StdoutBurnEmitter } from '../services/burn-emitter';
import { DedupTracker } from '../services/dedup-tracker';
import { DiscordBurnNotifier } from '../services/discord-notifier';
import { SignatureScanner } from '../services/signature-scanner';
import { StateStore } from '../services/state-store';
import { TransactionFetcher } from '../services/transaction-fetcher';

const log = createLogger('app');

function restoreState(cfg: Config, store: StateStore | null): PollState | undefined {
    if (!store) return undefined;
    try {
        const saved = store.load();
        if (!saved) return undefined;
        if (saved.mint !== cfg.mintAddress) {
            log.warn('State file belongs to another mint, starting fresh', { file: store.filePath, mint: saved.mint });
            return undefined;
        }
        log.info('Resuming from saved state', {
            cursor: saved.cursor?.signature ?? null,
            seen: saved.seen.length,
            savedAt: new Date(saved.savedAt).toISOString(),
        });
        return { cursor: saved.cursor, tracker: DedupTracker.from(cfg.dedupCapacity, saved.seen) };
    } catch (e) {
        if (e instanceof StateFileError) {
            log.warn('Ignoring unreadable state file, starting fresh', { error: e.message });
            return undefined;
        }
        throw e;
    }
}

async function main(): Promise<void> {
    const cfg = loadConfig();

    const rpc = RpcProvider.fromEndpoint(cfg.rpcEndpoint, cfg.commitment);
    try {
        const version = await rpc.getVersion();
        log.info('Connected to RPC', { endpoint: cfg.rpcEndpoint, version });
    } catch (e) {
        throw new ConfigurationError(`RPC endpoint ${cfg.rpcEndpoint} is unreachable: ${describeError(e)}`, e);
    }

    const sinks: BurnEmitter[] = [new StdoutBurnEmitter(cfg.outputFormat)];
    if (cfg.discordWebhook) sinks.push(new DiscordBurnNotifier(cfg.discordWebhook));

    const store = cfg.stateFile ? new StateStore(cfg.stateFile) : null;
    if (!store) log.warn('STATE_FILE is empty: burns near the cursor may be emitted again after a restart');

    const monitor = new BurnMonitor({
        mint: cfg.mintAddress,
        scanner: new SignatureScanner(rpc, { commitment: cfg.commitment, limit: cfg.scanLimit }),
        fetcher: new TransactionFetcher(rpc, { commitment: cfg.commitment }),
        emitter: new CompositeBurnEmitter(sinks),
        pollIntervalMs: cfg.pollIntervalMs,
        backoff: cfg.backoff,
        dedupCapacity: cfg.dedupCapacity,
        initialState: restoreState(cfg, store),
        stateStore: store,
    });

    await monitor.start();

    // --- Graceful shutdown ---
    const shutdown = async (): Promise<void> => {
        log.info('Shutting down…');
        await monitor.stop();
        log.info('Totals', monitor.getStats());
        process.exit(0);
    };
    process.once('SIGINT', () => void shutdown());
    process.once('SIGTERM', () => void shutdown());
}

main().catch((e) => {
    log.error('Fatal', { error: describeError(e) });
    process.exitCode = 1;
});
