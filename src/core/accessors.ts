/**
 * Root accessors
 * Read-only queries against the committed root
 */

import fs from 'fs';
import path from 'path';
import { RootContext } from './root-context';
import { RootError, wrapIo } from './errors';
import { normalizePath } from '../utils/paths';
import { globPath, walkTree, type WalkVisitor } from '../utils/fs-scan';

function isEscape(rel: string): boolean {
    return rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel);
}

class RootAccessors {
    context: RootContext;

    constructor(context: RootContext) {
        this.context = context;
    }

    getRoot(): string {
        return this.context.get();
    }

    /** The root, throwing when it was never resolved. */
    mustGetRoot(): string {
        return this.requireRoot();
    }

    isRootDirectory(target: string): boolean {
        const root = this.getRoot();
        if (root === '') return false;
        return normalizePath(target) === normalizePath(root);
    }

    /**
     * True for the root and anything below it. A relative or blank target
     * has no defined relation to the root and is never inside it.
     */
    isWithinRoot(target: string): boolean {
        const root = this.getRoot();
        if (root === '') return false;
        const clean = normalizePath(target);
        if (clean === '' || !path.isAbsolute(clean)) return false;
        return !isEscape(path.relative(normalizePath(root), clean));
    }

    /**
     * Relative path from the root to an absolute `target`; "." for the root
     * itself. Relative or blank targets are rejected rather than resolved
     * against the working directory.
     */
    relativeToRoot(target: string): string {
        const root = this.requireRoot();
        const clean = normalizePath(target);
        if (clean === '') {
            throw new RootError('EmptyInput', 'path cannot be empty');
        }
        if (!path.isAbsolute(clean)) {
            throw new RootError('RelativePath', `cannot relate relative path "${clean}" to root`, {
                details: { path: clean, root },
            });
        }
        const rel = path.relative(normalizePath(root), clean);
        return rel === '' ? '.' : rel;
    }

    /**
     * Join segments onto the root. With no root, or an absolute first
     * segment, this is a plain join.
     */
    joinFromRoot(...segments: string[]): string {
        const root = this.getRoot();
        if (root === '' || (segments.length > 0 && path.isAbsolute(segments[0]))) {
            return path.join(...segments);
        }
        return path.join(root, ...segments);
    }

    /** Parent of the root; '' when unset or when the root is the filesystem root. */
    parentOfRoot(): string {
        const root = this.getRoot();
        if (root === '') return '';
        const parent = path.dirname(root);
        return parent === root ? '' : parent;
    }

    nameOfRoot(): string {
        if (this.getRoot() === '') return '';
        try {
            this.statRoot();
        } catch {
            return '';
        }
        return path.basename(this.getRoot());
    }

    statRoot(): fs.Stats {
        const root = this.requireRoot();
        try {
            return fs.statSync(root);
        } catch (err: unknown) {
            throw wrapIo(err, 'stat', root);
        }
    }

    /** Throws unless the root is set and is an existing directory. */
    validateRoot(): void {
        const stats = this.statRoot();
        if (!stats.isDirectory()) {
            throw new RootError('NotADirectory', `root is not a directory: ${this.getRoot()}`);
        }
    }

    /** Files under the root matching a glob such as "config/*.json". */
    listFromRoot(pattern: string): string[] {
        return globPath(this.requireRoot(), pattern);
    }

    walkFromRoot(visitor: WalkVisitor): void {
        walkTree(this.requireRoot(), visitor);
    }

    private requireRoot(): string {
        const root = this.getRoot();
        if (root === '') {
            throw new RootError('RootNotSet', 'root not set');
        }
        return root;
    }
}

export { RootAccessors };
