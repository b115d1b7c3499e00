/**
 * BurnMonitor unit tests
 *
 * Loop lifecycle, state commit and persistence
 */

import { expect } from 'chai';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TransientRpcError } from '../../domain/errors';
import { DedupTracker } from '../../services/dedup-tracker';
import { StateStore } from '../../services/state-store';
import { BurnMonitor } from '../burn-monitor';
import {
    burnInstruction,
    FakeFetcher,
    FakeScanner,
    ledgerTx,
    MINT,
    RecordingEmitter,
    scanned,
    silentLog,
    TEST_BACKOFF,
} from '../../test-support/fakes';

async function waitFor(condition: () => boolean, timeoutMs = 1500): Promise<void> {
    const start = Date.now();
    while (!condition()) {
        if (Date.now() - start > timeoutMs) throw new Error('condition not met in time');
        await new Promise((resolve) => setTimeout(resolve, 5));
    }
}

describe('BurnMonitor', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'burn-monitor-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('commits cycle state between polls', async () => {
        const scanner = new FakeScanner([scanned('s1', 's2'), scanned('s3')]);
        const fetcher = FakeFetcher.of([
            ledgerTx('s1', [burnInstruction(1n)]),
            ledgerTx('s2', []),
            ledgerTx('s3', [burnInstruction(3n)]),
        ]);
        const emitter = new RecordingEmitter();
        const monitor = new BurnMonitor({ mint: MINT, scanner, fetcher, emitter, backoff: TEST_BACKOFF, dedupCapacity: 10, log: silentLog });

        await monitor.pollOnce();
        await monitor.pollOnce();

        expect(scanner.calls.map((c) => c.cursor)).to.deep.equal([null, { signature: 's2', slot: 101 }]);
        expect(emitter.events.map((e) => e.amount)).to.deep.equal([1n, 3n]);
        expect(monitor.getState().cursor).to.deep.equal({ signature: 's3', slot: 100 });
        expect(monitor.getStats()).to.deep.equal({
            scanned: 3,
            skipped: 0,
            fetched: 3,
            notFound: 0,
            malformed: 0,
            burns: 2,
            cycles: 2,
            failedCycles: 0,
        });
        expect(monitor.phase).to.equal('idle');
    });

    it('persists the cursor and seen signatures after each cycle', async () => {
        const store = new StateStore(path.join(tmpDir, 'state.json'));
        const monitor = new BurnMonitor({
            mint: MINT,
            scanner: new FakeScanner([scanned('s1', 's2')]),
            fetcher: FakeFetcher.of([ledgerTx('s1', []), ledgerTx('s2', [])]),
            emitter: new RecordingEmitter(),
            stateStore: store,
            log: silentLog,
        });

        await monitor.pollOnce();

        const saved = store.load();
        expect(saved?.mint).to.equal(MINT);
        expect(saved?.cursor).to.deep.equal({ signature: 's2', slot: 101 });
        expect(saved?.seen).to.deep.equal(['s1', 's2']);
    });

    it('runs the loop until stopped and then exits cleanly', async () => {
        const emitter = new RecordingEmitter();
        const monitor = new BurnMonitor({
            mint: MINT,
            scanner: new FakeScanner([scanned('s1')]),
            fetcher: FakeFetcher.of([ledgerTx('s1', [burnInstruction(9n)])]),
            emitter,
            pollIntervalMs: 60_000,
            log: silentLog,
        });

        await monitor.start();
        expect(monitor.isRunning).to.be.true;
        await waitFor(() => emitter.events.length === 1);

        await monitor.stop();

        expect(monitor.isRunning).to.be.false;
        expect(monitor.getStats().cycles).to.equal(1);
    });

    it('counts a failing cycle and keeps running', async () => {
        const scanner = new FakeScanner([new Error('unexpected'), scanned('s1')]);
        const emitter = new RecordingEmitter();
        const monitor = new BurnMonitor({
            mint: MINT,
            scanner,
            fetcher: FakeFetcher.of([ledgerTx('s1', [burnInstruction(1n)])]),
            emitter,
            pollIntervalMs: 1,
            log: silentLog,
        });

        await monitor.start();
        await waitFor(() => emitter.events.length === 1);
        await monitor.stop();

        expect(monitor.getStats().failedCycles).to.equal(1);
    });

    it('ignores a second start()', async () => {
        const scanner = new FakeScanner([]);
        const monitor = new BurnMonitor({
            mint: MINT,
            scanner,
            fetcher: new FakeFetcher(),
            emitter: new RecordingEmitter(),
            pollIntervalMs: 60_000,
            log: silentLog,
        });

        await monitor.start();
        await monitor.start();
        await waitFor(() => scanner.calls.length >= 1);
        await monitor.stop();

        expect(scanner.calls).to.have.lengthOf(1);
    });

    it('persists the handled part of a batch when stopped mid-batch, so a restart does not re-emit', async () => {
        const store = new StateStore(path.join(tmpDir, 'state.json'));
        const txs = [ledgerTx('s1', [burnInstruction(1n)]), ledgerTx('s2', [burnInstruction(2n)])];
        const emitter = new RecordingEmitter();
        const first = new BurnMonitor({
            mint: MINT,
            scanner: new FakeScanner([scanned('s1', 's2')]),
            fetcher: FakeFetcher.of(txs).failFirst('s2', [new TransientRpcError('getTransaction')]),
            emitter,
            backoff: { baseDelayMs: 60_000, maxDelayMs: 60_000, multiplier: 2 },
            pollIntervalMs: 60_000,
            stateStore: store,
            log: silentLog,
        });

        await first.start();
        await waitFor(() => first.phase === 'backoff');
        await first.stop();

        const saved = store.load();
        expect(saved?.cursor).to.deep.equal({ signature: 's1', slot: 100 });
        expect(saved?.seen).to.deep.equal(['s1']);

        const scanner = new FakeScanner([[{ signature: 's2', slot: 101 }]]);
        const second = new BurnMonitor({
            mint: MINT,
            scanner,
            fetcher: FakeFetcher.of(txs),
            emitter,
            initialState: { cursor: saved?.cursor ?? null, tracker: DedupTracker.from(10, saved?.seen ?? []) },
            log: silentLog,
        });
        await second.pollOnce();

        expect(scanner.calls.map((c) => c.cursor)).to.deep.equal([{ signature: 's1', slot: 100 }]);
        expect(emitter.events.map((e) => e.signature)).to.deep.equal(['s1', 's2']);
    });
});
