/**
 * Root Resolver
 * Finds the project root from the project directory outward and commits it
 * to the context, collecting env files met on the way
 */

import fs from 'fs';
import path from 'path';
import Logger from './logger';
import { RootContext } from './root-context';
import { RootError, isRootError, wrapIo } from './errors';
import { loadConfig, type RootConfig } from './config';
import { ExecutionContextDetector, nodeProbe, type ProjectDirSource } from './execution-context';
import { DotenvLoader, applyEnvPolicy, type AuxRequest, type EnvFileLoader } from './env-policy';
import { ancestorsOf, filterFilenames, isBareFilename } from '../utils/paths';
import { globDir, isDirectory, isFile } from '../utils/fs-scan';

export interface ResolverOptions {
    context?: RootContext;
    source?: ProjectDirSource;
    loader?: EnvFileLoader;
    config?: Partial<RootConfig>;
}

export interface ResolveResult {
    root: string;
    /** Env files handed to the loader, nearest directory first. */
    envFiles: string[];
}

class RootResolver {
    config: RootConfig;
    context: RootContext;
    source: ProjectDirSource;
    loader: EnvFileLoader;
    logger: Logger;

    constructor(options: ResolverOptions = {}) {
        this.config = loadConfig(process.env, options.config);
        this.context = options.context || new RootContext({}, this.config.rootKey);
        this.source = options.source || new ExecutionContextDetector(nodeProbe, this.config.buildCacheMarker);
        this.loader = options.loader || new DotenvLoader(this.context.store);
        this.logger = new Logger('rootstake:resolver');
    }

    /**
     * Commit the nearest ancestor of the project directory that holds a file
     * named `entryMarker`, then load env files per the requested names.
     *
     * Requested names are bare filenames or filename patterns; every
     * directory from the project directory up to the root is searched for
     * them. A marker ending in the aux suffix is loaded as well.
     */
    resolveByMarker(entryMarker: string, ...auxFilenames: string[]): ResolveResult {
        const marker = entryMarker.trim();
        if (marker === '') {
            throw new RootError('EmptyInput', 'entry file not defined');
        }
        if (!isBareFilename(marker)) {
            throw new RootError('BadEntryMarker', `entry file must be a filename, got "${marker}"`, {
                details: { marker },
            });
        }

        const requestedAny = auxFilenames.join('').trim() !== '';
        const names = filterFilenames(auxFilenames);
        if (requestedAny && names.length === 0) {
            throw new RootError('BadAuxFilesDefined', 'bad env files defined', {
                details: { given: auxFilenames },
            });
        }

        const markerIsAux = marker.endsWith(this.config.auxSuffix);
        const requests: AuxRequest[] = names.map((name) => ({ name, matches: [] }));
        const searched = requests.filter((request) => !(markerIsAux && request.name === marker));

        const projectDir = this.source.projectDir();
        this.logger.debug(`Searching for ${marker} from ${projectDir}`);

        const found: string[] = [];
        let rootDir: string | null = null;
        for (const dir of ancestorsOf(projectDir)) {
            for (const request of searched) {
                const hits = globDir(dir, request.name);
                request.matches.push(...hits);
                found.push(...hits);
            }
            if (isFile(path.join(dir, marker))) {
                rootDir = dir;
                break;
            }
        }

        if (rootDir === null) {
            throw new RootError('NoRootFound', `no root found: ${marker} is not in any parent of ${projectDir}`, {
                details: { marker, projectDir },
            });
        }
        const root = this.context.commit(rootDir);

        if (markerIsAux) {
            const markerPath = path.join(root, marker);
            found.push(markerPath);
            for (const request of requests) {
                if (request.name === marker) request.matches.push(markerPath);
            }
        }

        const candidates = [...new Set(found)];
        const envFiles = applyEnvPolicy({ requests, candidates }, this.loader);
        this.logger.debug(`Root ${root}, loaded ${envFiles.length} env file(s)`);
        return { root, envFiles };
    }

    /** Like resolveByMarker without env files; finding none is not an error. */
    resolveWithoutRequiringEnv(entryMarker: string): ResolveResult {
        try {
            return this.resolveByMarker(entryMarker);
        } catch (err: unknown) {
            if (isRootError(err, 'NoEnvDefined')) {
                return { root: this.context.get(), envFiles: [] };
            }
            throw err;
        }
    }

    /** Use an env file as the marker and require it to be loaded. */
    resolveFromEnvFile(entryMarker: string): ResolveResult {
        return this.resolveByMarker(entryMarker, entryMarker);
    }

    resolveFromGitAncestor(): string {
        const projectDir = this.source.projectDir();
        const gitRoot = this.findGitRootFrom(projectDir);
        if (gitRoot === '') {
            throw new RootError('NoGitRootFound', `no git root found above ${projectDir}`, {
                details: { projectDir },
            });
        }
        return this.context.commit(gitRoot);
    }

    /**
     * Commit an explicit directory. Relative paths are taken from the
     * project directory.
     */
    resolveFromExplicitPath(target: string): string {
        let dir = target.trim();
        if (dir === '') {
            throw new RootError('EmptyInput', 'path cannot be empty');
        }
        if (!path.isAbsolute(dir)) {
            dir = path.join(this.source.projectDir(), dir);
        }

        let stats: fs.Stats;
        try {
            stats = fs.statSync(dir);
        } catch (err: unknown) {
            throw wrapIo(err, 'stat', dir);
        }
        if (!stats.isDirectory()) {
            throw new RootError('NotADirectory', `path is not a directory: ${dir}`, {
                details: { path: dir },
            });
        }
        return this.context.commit(dir);
    }

    /** Nearest ancestor of `start` (itself included) holding a git directory, or ''. */
    findGitRootFrom(start: string): string {
        for (const dir of ancestorsOf(start)) {
            if (isDirectory(path.join(dir, this.config.gitMarker))) {
                return dir;
            }
        }
        return '';
    }

    projectDir(): string {
        return this.source.projectDir();
    }

    isTemporaryContext(): boolean {
        return this.source.isTemporaryContext();
    }
}

export { RootResolver };
