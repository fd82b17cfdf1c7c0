/**
 * Environment file policy
 * Decides which discovered files must be loaded and hands them to dotenv
 */

import fs from 'fs';
import dotenv from 'dotenv';
import Logger from './logger';
import { RootError, describeError } from './errors';

/** Loads env files, in order, into a key/value store. */
export interface EnvFileLoader {
    load(files: readonly string[]): void;
}

/** A requested name (bare filename or pattern) and the files it matched. */
export interface AuxRequest {
    name: string;
    matches: string[];
}

export interface EnvLoadPlan {
    /** Names the caller asked for, after filtering. Empty when none. */
    requests: AuxRequest[];
    /** Every file to load, nearest directory first. */
    candidates: string[];
}

/**
 * dotenv-backed loader. Files are parsed in order and keys already present
 * in the target are never overwritten, so earlier files take precedence.
 */
export class DotenvLoader implements EnvFileLoader {
    target: Record<string, string | undefined>;
    logger: Logger;

    constructor(target: Record<string, string | undefined> = process.env) {
        this.target = target;
        this.logger = new Logger('rootstake:dotenv');
    }

    load(files: readonly string[]): void {
        for (const file of files) {
            let parsed: Record<string, string>;
            try {
                parsed = dotenv.parse(fs.readFileSync(file, 'utf8'));
            } catch (err: unknown) {
                throw new RootError('EnvLoadFailed', `failed to load env file ${file}: ${describeError(err)}`, {
                    cause: err,
                    details: { file },
                });
            }
            let applied = 0;
            for (const [key, value] of Object.entries(parsed)) {
                if (this.target[key] !== undefined) continue;
                this.target[key] = value;
                applied++;
            }
            this.logger.debug(`Loaded ${applied} keys from ${file}`);
        }
    }
}

/**
 * Apply the load rules to a plan:
 * - nothing requested: load whatever was found, or fail with NoEnvDefined
 * - names requested: every name must have matched, or fail with MissingEnvs
 *   before anything is loaded
 */
export function applyEnvPolicy(plan: EnvLoadPlan, loader: EnvFileLoader): string[] {
    if (plan.requests.length === 0) {
        if (plan.candidates.length === 0) {
            throw new RootError('NoEnvDefined', 'no env defined');
        }
        loader.load(plan.candidates);
        return plan.candidates;
    }

    const missing = plan.requests.filter((request) => request.matches.length === 0).map((request) => request.name);
    if (missing.length > 0) {
        throw new RootError('MissingEnvs', `missing env files: ${missing.join(', ')}`, {
            details: { missing },
        });
    }

    loader.load(plan.candidates);
    return plan.candidates;
}
