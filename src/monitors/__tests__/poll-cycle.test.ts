/**
 * Poll cycle unit tests
 *
 * Scan → fetch → decode → dedup → emit against in-process fakes
 */

import { expect } from 'chai';
import { AbortError, TransientRpcError } from '../../domain/errors';
import { PollPhase } from '../../domain/types';
import { DedupTracker } from '../../services/dedup-tracker';
import { CycleDeps, PollState, runCycle } from '../poll-cycle';
import {
    burnInstruction,
    FakeFetcher,
    FakeScanner,
    ledgerTx,
    MINT,
    OTHER_MINT,
    RecordingEmitter,
    recordingSleep,
    scanned,
    silentLog,
    SOURCE,
    TEST_BACKOFF,
    transferInstruction,
} from '../../test-support/fakes';

function freshState(capacity = 100): PollState {
    return { cursor: null, tracker: new DedupTracker(capacity) };
}

function deps(scanner: FakeScanner, fetcher: FakeFetcher, emitter: RecordingEmitter, extra: Partial<CycleDeps> = {}): CycleDeps {
    return {
        mint: MINT,
        scanner,
        fetcher,
        emitter,
        backoff: TEST_BACKOFF,
        log: silentLog,
        sleep: recordingSleep().sleep,
        ...extra,
    };
}

describe('runCycle', () => {
    it('emits a canonical event for a burn and advances the cursor', async () => {
        const scanner = new FakeScanner([scanned('s1')]);
        const fetcher = FakeFetcher.of([ledgerTx('s1', [transferInstruction(0), burnInstruction(1_000_000n, { index: 1 })], 321)]);
        const emitter = new RecordingEmitter();

        const { state, events, stats } = await runCycle(freshState(), deps(scanner, fetcher, emitter));

        expect(emitter.events).to.have.lengthOf(1);
        expect(events).to.deep.equal(emitter.events);
        expect(emitter.events[0]).to.deep.equal({
            signature: 's1',
            mint: MINT,
            sourceAccount: SOURCE,
            amount: 1_000_000n,
            kind: 'burn',
            authority: 'BurnAuthority111111111111111111111111111111',
            slot: 321,
            blockTime: 1_700_000_000,
            instructionIndex: 1,
            inner: false,
        });
        expect(Object.isFrozen(emitter.events[0])).to.be.true;
        expect(state.cursor).to.deep.equal({ signature: 's1', slot: 100 });
        expect(stats).to.deep.equal({ scanned: 1, skipped: 0, fetched: 1, notFound: 0, malformed: 0, burns: 1 });
    });

    it('surfaces decimals for BurnChecked', async () => {
        const scanner = new FakeScanner([scanned('s1')]);
        const fetcher = FakeFetcher.of([ledgerTx('s1', [burnInstruction(5n, { decimals: 6 })])]);
        const emitter = new RecordingEmitter();

        await runCycle(freshState(), deps(scanner, fetcher, emitter));

        expect(emitter.events[0]).to.include({ kind: 'burnChecked', decimals: 6, amount: 5n });
    });

    it('emits nothing more when re-run over already marked signatures', async () => {
        const txs = [ledgerTx('s1', [burnInstruction(1n)]), ledgerTx('s2', [burnInstruction(2n)])];
        const scanner = new FakeScanner([scanned('s1', 's2'), scanned('s1', 's2')]);
        const fetcher = FakeFetcher.of(txs);
        const emitter = new RecordingEmitter();
        const d = deps(scanner, fetcher, emitter);

        const first = await runCycle(freshState(), d);
        const second = await runCycle(first.state, d);

        expect(emitter.events.map((e) => e.signature)).to.deep.equal(['s1', 's2']);
        expect(second.events).to.deep.equal([]);
        expect(second.stats.skipped).to.equal(2);
        expect(fetcher.calls).to.deep.equal(['s1', 's2']);
    });

    it('skips a NotFound signature, still emits around it and advances past the batch', async () => {
        const scanner = new FakeScanner([scanned('s1', 's2', 's3')]);
        const fetcher = FakeFetcher.of([ledgerTx('s1', [burnInstruction(1n)]), ledgerTx('s3', [burnInstruction(3n)])]);
        fetcher.set('s2', { ok: false, kind: 'NotFound', signature: 's2' });
        const emitter = new RecordingEmitter();

        const { state, stats } = await runCycle(freshState(), deps(scanner, fetcher, emitter));

        expect(emitter.events.map((e) => [e.signature, e.amount])).to.deep.equal([
            ['s1', 1n],
            ['s3', 3n],
        ]);
        expect(state.cursor).to.deep.equal({ signature: 's3', slot: 102 });
        expect(state.tracker.seen('s2')).to.be.true;
        expect(stats.notFound).to.equal(1);
    });

    it('marks a Malformed signature so it is never fetched again', async () => {
        const scanner = new FakeScanner([scanned('bad'), scanned('bad')]);
        const fetcher = new FakeFetcher().set('bad', { ok: false, kind: 'Malformed', signature: 'bad', reason: 'garbled' });
        const emitter = new RecordingEmitter();
        const d = deps(scanner, fetcher, emitter);

        const first = await runCycle(freshState(), d);
        await runCycle(first.state, d);

        expect(first.stats.malformed).to.equal(1);
        expect(first.state.cursor?.signature).to.equal('bad');
        expect(fetcher.calls).to.deep.equal(['bad']);
    });

    it('emits one event per burn instruction, all sharing the signature', async () => {
        const scanner = new FakeScanner([scanned('multi')]);
        const fetcher = FakeFetcher.of([
            ledgerTx('multi', [
                burnInstruction(10n, { index: 0 }),
                burnInstruction(99n, { index: 1, mint: OTHER_MINT }),
                burnInstruction(20n, { index: 2, decimals: 6 }),
            ]),
        ]);
        const emitter = new RecordingEmitter();

        await runCycle(freshState(), deps(scanner, fetcher, emitter));

        expect(emitter.events.map((e) => e.signature)).to.deep.equal(['multi', 'multi']);
        expect(emitter.events.map((e) => e.amount)).to.deep.equal([10n, 20n]);
    });

    it('marks non-burn transactions so they are not fetched again', async () => {
        const scanner = new FakeScanner([scanned('plain')]);
        const fetcher = FakeFetcher.of([ledgerTx('plain', [transferInstruction()])]);
        const emitter = new RecordingEmitter();

        const { state } = await runCycle(freshState(), deps(scanner, fetcher, emitter));

        expect(emitter.events).to.deep.equal([]);
        expect(state.tracker.seen('plain')).to.be.true;
    });

    it('emits nothing for a failed transaction', async () => {
        const failed = { ...ledgerTx('failed', [burnInstruction(1n)]), failed: true };
        const scanner = new FakeScanner([scanned('failed')]);
        const fetcher = FakeFetcher.of([failed]);
        const emitter = new RecordingEmitter();

        const { state } = await runCycle(freshState(), deps(scanner, fetcher, emitter));

        expect(emitter.events).to.deep.equal([]);
        expect(state.tracker.seen('failed')).to.be.true;
    });

    it('backs off on transient scan failures with growing, capped waits and an untouched cursor', async () => {
        const cursor = { signature: 'c0', slot: 50 };
        const transient = (): TransientRpcError => new TransientRpcError('getSignaturesForAddress', new Error('fetch failed'));
        const scanner = new FakeScanner([transient(), transient(), transient(), transient(), transient(), scanned('s1')]);
        const fetcher = FakeFetcher.of([ledgerTx('s1', [burnInstruction(1n)])]);
        const emitter = new RecordingEmitter();
        const { delays, sleep } = recordingSleep();
        const phases: PollPhase[] = [];

        const { state } = await runCycle(
            { cursor, tracker: new DedupTracker(10) },
            deps(scanner, fetcher, emitter, { sleep, onPhase: (p) => phases.push(p) })
        );

        expect(delays).to.deep.equal([100, 200, 400, 800, 1000]);
        expect(scanner.calls.map((c) => c.cursor)).to.deep.equal(Array(6).fill(cursor));
        expect(phases.filter((p) => p === 'backoff')).to.have.lengthOf(5);
        expect(state.cursor).to.deep.equal({ signature: 's1', slot: 100 });
    });

    it('retries a transient fetch without skipping the signature', async () => {
        const scanner = new FakeScanner([scanned('s1')]);
        const fetcher = FakeFetcher.of([ledgerTx('s1', [burnInstruction(7n)])]).failFirst('s1', [
            new TransientRpcError('getTransaction', new Error('429')),
        ]);
        const emitter = new RecordingEmitter();

        await runCycle(freshState(), deps(scanner, fetcher, emitter));

        expect(fetcher.calls).to.deep.equal(['s1', 's1']);
        expect(emitter.events.map((e) => e.amount)).to.deep.equal([7n]);
    });

    it('keeps going when the emitter throws', async () => {
        const scanner = new FakeScanner([scanned('s1', 's2')]);
        const fetcher = FakeFetcher.of([ledgerTx('s1', [burnInstruction(1n)]), ledgerTx('s2', [burnInstruction(2n)])]);
        const emitted: string[] = [];
        const emitter = {
            emit: (event: { signature: string }): void => {
                emitted.push(event.signature);
                if (event.signature === 's1') throw new Error('sink down');
            },
        };

        const { state, stats } = await runCycle(freshState(), { ...deps(scanner, fetcher, new RecordingEmitter()), emitter });

        expect(emitted).to.deep.equal(['s1', 's2']);
        expect(stats.burns).to.equal(2);
        expect(state.cursor?.signature).to.equal('s2');
    });

    it('leaves state unchanged when the scan returns nothing', async () => {
        const initial: PollState = { cursor: { signature: 'c0', slot: 1 }, tracker: new DedupTracker(5) };
        const { state, stats } = await runCycle(initial, deps(new FakeScanner([[]]), new FakeFetcher(), new RecordingEmitter()));

        expect(state).to.equal(initial);
        expect(stats.scanned).to.equal(0);
    });

    it('stops at the last handled signature when aborted while backing off mid-batch', async () => {
        const controller = new AbortController();
        const scanner = new FakeScanner([scanned('s1', 's2', 's3')]);
        const fetcher = FakeFetcher.of([
            ledgerTx('s1', [burnInstruction(1n)]),
            ledgerTx('s2', [burnInstruction(2n)]),
            ledgerTx('s3', [burnInstruction(3n)]),
        ]).failFirst('s2', [new TransientRpcError('getTransaction')]);
        const emitter = new RecordingEmitter();

        const result = await runCycle(
            freshState(),
            deps(scanner, fetcher, emitter, {
                signal: controller.signal,
                sleep: async () => {
                    controller.abort();
                    throw new AbortError();
                },
            })
        );

        expect(result.interrupted).to.be.true;
        expect(result.state.cursor).to.deep.equal({ signature: 's1', slot: 100 });
        expect(result.state.tracker.toArray()).to.deep.equal(['s1']);
        expect(emitter.events.map((e) => e.signature)).to.deep.equal(['s1']);
        expect(fetcher.calls).to.deep.equal(['s1', 's2']);
    });

    it('keeps the previous cursor when aborted before anything in the batch was handled', async () => {
        const controller = new AbortController();
        const cursor = { signature: 'c0', slot: 50 };
        const fetcher = new FakeFetcher().failFirst('s1', [new TransientRpcError('getTransaction')]);

        const result = await runCycle(
            { cursor, tracker: new DedupTracker(10) },
            deps(new FakeScanner([scanned('s1')]), fetcher, new RecordingEmitter(), {
                signal: controller.signal,
                sleep: async () => {
                    controller.abort();
                    throw new AbortError();
                },
            })
        );

        expect(result.interrupted).to.be.true;
        expect(result.state.cursor).to.equal(cursor);
        expect(result.state.tracker.size).to.equal(0);
    });

    it('rejects with AbortError when aborted while the scan backs off', async () => {
        const controller = new AbortController();
        const scanner = new FakeScanner([new TransientRpcError('getSignaturesForAddress'), scanned('s1')]);

        let caught: unknown;
        try {
            await runCycle(
                freshState(),
                deps(scanner, new FakeFetcher(), new RecordingEmitter(), {
                    signal: controller.signal,
                    sleep: async () => {
                        controller.abort();
                        throw new AbortError();
                    },
                })
            );
        } catch (e) {
            caught = e;
        }

        expect(caught).to.be.instanceOf(AbortError);
        expect(scanner.calls).to.have.lengthOf(1);
    });

    it('does not modify the state it was given', async () => {
        const initial: PollState = { cursor: null, tracker: DedupTracker.from(10, ['s0']) };
        const scanner = new FakeScanner([scanned('s1', 's2')]);
        const fetcher = FakeFetcher.of([ledgerTx('s1', [burnInstruction(1n)]), ledgerTx('s2', [])]);

        const { state } = await runCycle(initial, deps(scanner, fetcher, new RecordingEmitter()));

        expect(initial.cursor).to.equal(null);
        expect(initial.tracker.toArray()).to.deep.equal(['s0']);
        expect(state.tracker).to.not.equal(initial.tracker);
        expect(state.tracker.toArray()).to.deep.equal(['s0', 's1', 's2']);
    });
});
