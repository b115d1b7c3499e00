/**
 * Cursor + seen-signature persistence.
 *
 * Written after every completed cycle to a temp file and renamed into place, so
 * a crash mid-write leaves the previous state intact. A restart resumes from the
 * saved cursor instead of re-emitting the latest page of burns.
 */

import * as fs from 'fs';
import * as path from 'path';
import { StateFileError } from '../domain/errors';
import { Cursor, Signature } from '../domain/types';

export const STATE_VERSION = 1;

export interface PersistedState {
    version: number;
    savedAt: number; // ms since epoch
    mint: string;
    cursor: Cursor | null;
    seen: Signature[]; // oldest first
}

export class StateStore {
    constructor(readonly filePath: string) {}

    /** `null` when there is nothing saved yet. Throws {@link StateFileError} on a corrupt file. */
    load(): PersistedState | null {
        let raw: string;
        try {
            raw = fs.readFileSync(this.filePath, 'utf-8');
        } catch (e) {
            if (isMissingFile(e)) return null;
            throw new StateFileError(this.filePath, 'could not be read', e);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (e) {
            throw new StateFileError(this.filePath, 'is not valid JSON', e);
        }
        return validateState(this.filePath, parsed);
    }

    save(mint: string, cursor: Cursor | null, seen: Signature[]): void {
        const state: PersistedState = {
            version: STATE_VERSION,
            savedAt: Date.now(),
            mint,
            cursor,
            seen,
        };

        const dir = path.dirname(this.filePath);
        const tmp = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
        try {
            fs.mkdirSync(dir, { recursive: true });
            fs.writeFileSync(tmp, JSON.stringify(state));
            fs.renameSync(tmp, this.filePath);
        } catch (e) {
            throw new StateFileError(this.filePath, 'could not be written', e);
        }
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateState(filePath: string, value: unknown): PersistedState {
    if (!isRecord(value)) throw new StateFileError(filePath, 'is not an object');
    if (value.version !== STATE_VERSION) {
        throw new StateFileError(filePath, `has unsupported version ${String(value.version)}`);
    }
    if (typeof value.mint !== 'string') throw new StateFileError(filePath, 'has no mint');
    if (typeof value.savedAt !== 'number') throw new StateFileError(filePath, 'has no savedAt');

    const seen = value.seen;
    if (!Array.isArray(seen) || !seen.every((s): s is string => typeof s === 'string')) {
        throw new StateFileError(filePath, 'has an invalid seen list');
    }

    let cursor: Cursor | null = null;
    if (value.cursor !== null) {
        const c = value.cursor;
        if (!isRecord(c) || typeof c.signature !== 'string' || typeof c.slot !== 'number') {
            throw new StateFileError(filePath, 'has an invalid cursor');
        }
        cursor = { signature: c.signature, slot: c.slot };
    }

    return { version: STATE_VERSION, savedAt: value.savedAt, mint: value.mint, cursor, seen };
}
