/**
 * rootstake
 *
 * One project root per process. The functions exported here work on a
 * shared context stored in `process.env`; construct a RootContext with
 * RootResolver/RootAccessors for an isolated one.
 */

import { RootContext } from './core/root-context';
import { RootResolver, type ResolveResult } from './core/resolver';
import { RootAccessors } from './core/accessors';
import { loadConfig } from './core/config';
import type { ProjectDirSource } from './core/execution-context';
import type { WalkVisitor } from './utils/fs-scan';
import type { Stats } from 'fs';

const config = loadConfig(process.env);

export const defaultContext = new RootContext(process.env, config.rootKey);
const resolver = new RootResolver({ context: defaultContext, config });
const accessors = new RootAccessors(defaultContext);

export function setRootKey(key: string): void {
  defaultContext.setKey(key);
}

export function getRootKey(): string {
  return defaultContext.key;
}

export function resolveByMarker(entryMarker: string, ...auxFilenames: string[]): ResolveResult {
  return resolver.resolveByMarker(entryMarker, ...auxFilenames);
}

export function resolveWithoutRequiringEnv(entryMarker: string): ResolveResult {
  return resolver.resolveWithoutRequiringEnv(entryMarker);
}

export function resolveFromEnvFile(entryMarker: string): ResolveResult {
  return resolver.resolveFromEnvFile(entryMarker);
}

export function resolveFromGitAncestor(): string {
  return resolver.resolveFromGitAncestor();
}

export function resolveFromExplicitPath(target: string): string {
  return resolver.resolveFromExplicitPath(target);
}

export function findGitRootFrom(start: string): string {
  return resolver.findGitRootFrom(start);
}

/**
 * Swap where the shared resolver reads the project directory from, e.g.
 * `fixedProjectDir(dir)` for a host that knows its own layout. Returns the
 * source it replaced.
 */
export function setProjectDirSource(source: ProjectDirSource): ProjectDirSource {
  const previous = resolver.source;
  resolver.source = source;
  return previous;
}

export function getProjectDir(): string {
  return resolver.projectDir();
}

export function isTemporaryContext(): boolean {
  return resolver.isTemporaryContext();
}

export function clearRoot(): void {
  defaultContext.clear();
}

export function getRoot(): string {
  return accessors.getRoot();
}

export function mustGetRoot(): string {
  return accessors.mustGetRoot();
}

export function isRootDirectory(target: string): boolean {
  return accessors.isRootDirectory(target);
}

export function isWithinRoot(target: string): boolean {
  return accessors.isWithinRoot(target);
}

export function relativeToRoot(target: string): string {
  return accessors.relativeToRoot(target);
}

export function joinFromRoot(...segments: string[]): string {
  return accessors.joinFromRoot(...segments);
}

export function parentOfRoot(): string {
  return accessors.parentOfRoot();
}

export function nameOfRoot(): string {
  return accessors.nameOfRoot();
}

export function statRoot(): Stats {
  return accessors.statRoot();
}

export function validateRoot(): void {
  accessors.validateRoot();
}

export function listFromRoot(pattern: string): string[] {
  return accessors.listFromRoot(pattern);
}

export function walkFromRoot(visitor: WalkVisitor): void {
  accessors.walkFromRoot(visitor);
}

export { RootContext, RootResolver, RootAccessors };
export { RootError, isRootError } from './core/errors';
export type { RootErrorCode } from './core/errors';
export { loadConfig, getDefaultConfig, DEFAULT_ROOT_KEY, DEFAULT_BUILD_CACHE_MARKER } from './core/config';
export type { RootConfig } from './core/config';
export { ExecutionContextDetector, fixedProjectDir, findEntryFile, nodeProbe } from './core/execution-context';
export type { ExecutionProbe, ProjectDirSource } from './core/execution-context';
export { DotenvLoader, applyEnvPolicy } from './core/env-policy';
export type { EnvFileLoader, EnvLoadPlan, AuxRequest } from './core/env-policy';
export type { ResolveResult, ResolverOptions } from './core/resolver';
export type { RootStore } from './core/root-context';
export { normalizePath, filterFilenames, ancestorsOf } from './utils/paths';
export type { WalkEntry, WalkSignal, WalkVisitor } from './utils/fs-scan';
export { default as Logger } from './core/logger';
