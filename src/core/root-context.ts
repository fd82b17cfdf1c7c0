/**
 * Root context
 * Owns the key the root is stored under and the store that holds it
 */

import path from 'path';
import Logger from './logger';
import { RootError } from './errors';
import { DEFAULT_ROOT_KEY } from './config';
import { statIfPresent } from '../utils/fs-scan';

/** Key/value string store; `process.env` for the shared context. */
export type RootStore = Record<string, string | undefined>;

export class RootContext {
    store: RootStore;
    logger: Logger;
    private _key: string;

    constructor(store: RootStore = {}, key: string = DEFAULT_ROOT_KEY) {
        this.store = store;
        this.logger = new Logger('rootstake:context');
        this._key = DEFAULT_ROOT_KEY;
        this.setKey(key);
    }

    get key(): string {
        return this._key;
    }

    /**
     * Change the key the root lives under. The value stored under the old key
     * stays where it is.
     */
    setKey(key: string): void {
        const trimmed = key.trim();
        if (trimmed === '') {
            throw new RootError('EmptyInput', 'key cannot be empty');
        }
        this._key = trimmed;
    }

    /** The stored root, or '' when unset. */
    get(): string {
        return this.store[this._key] || '';
    }

    isSet(): boolean {
        return this.get() !== '';
    }

    /**
     * Store `dir` as the root, replacing any previous value. Only an existing
     * directory is accepted; relative input is made absolute first.
     */
    commit(dir: string): string {
        const absolute = path.resolve(dir);
        const stats = statIfPresent(absolute);
        if (!stats) {
            throw new RootError('NotADirectory', `root candidate does not exist: ${absolute}`, {
                details: { path: absolute },
            });
        }
        if (!stats.isDirectory()) {
            throw new RootError('NotADirectory', `path is not a directory: ${absolute}`, {
                details: { path: absolute },
            });
        }
        this.store[this._key] = absolute;
        this.logger.debug(`Root set to ${absolute} under ${this._key}`);
        return absolute;
    }

    clear(): void {
        delete this.store[this._key];
    }
}
