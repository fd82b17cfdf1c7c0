/**
 * Execution context detection
 *
 * Decides which directory stands for "the project" before any root search:
 * the launched program's own directory, or, when that program sits in the
 * system temp directory (compile-and-run tools put their output there), the
 * directory of the source file that started the process.
 */

import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import Logger from './logger';
import { RootError, describeError } from './errors';
import { DEFAULT_BUILD_CACHE_MARKER } from './config';
import { statIfPresent } from '../utils/fs-scan';

const SOURCE_EXTENSIONS = new Set(['.ts', '.mts', '.cts', '.tsx', '.js', '.mjs', '.cjs', '.jsx']);

/** Host capabilities the detector reads from. */
export interface ExecutionProbe {
    executablePath(): string;
    entryFile(): string;
    tempDir(): string;
}

/** Anything that can name the project directory. */
export interface ProjectDirSource {
    projectDir(): string;
    isTemporaryContext(): boolean;
}

function toFilePath(fileName: string): string {
    return fileName.startsWith('file://') ? fileURLToPath(fileName) : fileName;
}

/**
 * V8 call sites for the current stack, innermost first, without any limit on
 * depth.
 */
function collectCallSites(): NodeJS.CallSite[] {
    const originalPrepare = Error.prepareStackTrace;
    const originalLimit = Error.stackTraceLimit;
    let sites: NodeJS.CallSite[] = [];
    try {
        Error.stackTraceLimit = Infinity;
        Error.prepareStackTrace = (_err, stack) => {
            sites = stack;
            return '';
        };
        const holder: { stack?: string } = {};
        Error.captureStackTrace(holder, collectCallSites);
        // Formatting is lazy; reading the property runs prepareStackTrace.
        return holder.stack === undefined ? [] : sites;
    } finally {
        Error.prepareStackTrace = originalPrepare;
        Error.stackTraceLimit = originalLimit;
    }
}

/**
 * The file of the outermost stack frame that belongs to the program rather
 * than to the runtime's own loaders.
 */
export function findEntryFile(
    sites: ReadonlyArray<Pick<NodeJS.CallSite, 'getFileName'>> = collectCallSites()
): string {
    let outermost: string | null = null;
    for (const site of sites) {
        const fileName = site.getFileName();
        if (!fileName || fileName.startsWith('node:') || fileName.startsWith('internal/')) continue;
        outermost = toFilePath(fileName);
    }

    if (!outermost || !SOURCE_EXTENSIONS.has(path.extname(outermost).toLowerCase())) {
        throw new RootError('EntryFileNotFound', 'entry source file not found on the call stack', {
            details: { frame: outermost },
        });
    }
    return outermost;
}

export const nodeProbe: ExecutionProbe = {
    executablePath(): string {
        const script = process.argv[1];
        return script ? path.resolve(script) : process.execPath;
    },
    entryFile(): string {
        return findEntryFile();
    },
    tempDir(): string {
        return os.tmpdir();
    },
};

export class ExecutionContextDetector implements ProjectDirSource {
    probe: ExecutionProbe;
    buildCacheMarker: string;
    logger: Logger;

    constructor(probe: ExecutionProbe = nodeProbe, buildCacheMarker: string = DEFAULT_BUILD_CACHE_MARKER) {
        this.probe = probe;
        this.buildCacheMarker = buildCacheMarker;
        this.logger = new Logger('rootstake:exec');
    }

    projectDir(): string {
        const execDir = path.dirname(this.probe.executablePath());
        const tempDir = this.probe.tempDir();

        if (tempDir !== '' && execDir.includes(tempDir)) {
            const entryDir = path.dirname(this.probe.entryFile());
            this.logger.debug(`Executable runs from temp dir ${execDir}, using entry dir ${entryDir}`);
            return entryDir;
        }

        let stats: ReturnType<typeof statIfPresent>;
        try {
            stats = statIfPresent(execDir);
        } catch (err: unknown) {
            throw new RootError('ProjectDirUnresolvable', `unable to get project dir: ${describeError(err)}`, {
                cause: err,
                details: { path: execDir },
            });
        }
        if (!stats || !stats.isDirectory()) {
            throw new RootError('ProjectDirUnresolvable', `unable to get project dir from ${execDir}`, {
                details: { path: execDir },
            });
        }
        this.logger.debug(`Using executable dir ${execDir}`);
        return execDir;
    }

    /**
     * Whether the program was launched out of a transient package cache, such
     * as the one `npx` fills, instead of from a lasting install.
     */
    isTemporaryContext(): boolean {
        return this.probe.executablePath().includes(this.buildCacheMarker);
    }
}

/** A project directory decided by the caller, bypassing detection. */
export function fixedProjectDir(dir: string, temporary: boolean = false): ProjectDirSource {
    const resolved = path.resolve(dir);
    return {
        projectDir: () => resolved,
        isTemporaryContext: () => temporary,
    };
}
