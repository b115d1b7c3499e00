import { OutputFormat } from '../config/config';
import { describeError } from '../domain/errors';
import { BurnEvent, toBurnRecord } from '../domain/types';
import { createLogger, Logger } from '../infra/logger';

/** Where detected burns go. One call per event. */
export interface BurnEmitter {
    emit(event: BurnEvent): void | Promise<void>;
}

export function formatBurnLine(event: BurnEvent, format: OutputFormat): string {
    if (format === 'text') {
        const label = event.inner ? 'BURN (inner) detected' : 'BURN detected';
        return `${label}: tx=${event.signature} mint=${event.mint} source=${event.sourceAccount} amount=${event.amount.toString()}`;
    }
    return JSON.stringify(toBurnRecord(event));
}

type WriteFn = (line: string) => void;

export class StdoutBurnEmitter implements BurnEmitter {
    constructor(
        private readonly format: OutputFormat = 'json',
        private readonly write: WriteFn = (line) => {
            process.stdout.write(line);
        }
    ) {}

    emit(event: BurnEvent): void {
        this.write(`${formatBurnLine(event, this.format)}\n`);
    }
}

/**
 * Hands each event to every sink in order. A failing sink is logged and does
 * not keep the event from the others.
 */
export class CompositeBurnEmitter implements BurnEmitter {
    private readonly log: Logger;

    constructor(private readonly sinks: BurnEmitter[], log?: Logger) {
        this.log = log ?? createLogger('emitter');
    }

    async emit(event: BurnEvent): Promise<void> {
        for (const sink of this.sinks) {
            try {
                await sink.emit(event);
            } catch (error) {
                this.log.error('Burn sink failed', {
                    sink: sink.constructor.name,
                    signature: event.signature,
                    error: describeError(error),
                });
            }
        }
    }
}
