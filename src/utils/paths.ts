import path from 'path';

function collapseOnce(input: string): string {
  const sep = path.sep;
  let p = input.trim().split(sep).join('/').split('/').join(sep);
  const doubled = sep + sep;
  while (p.includes(doubled)) {
    p = p.split(doubled).join(sep);
  }
  if (p.length > 1 && p.endsWith(sep) && path.parse(p).root !== p) {
    p = p.slice(0, -1);
  }
  return p;
}

/**
 * Trim, unify separators to the platform form and collapse repeated ones.
 * "/a//b/ " and "/a/b" normalize to the same string.
 */
export function normalizePath(input: string): string {
  let current = input;
  let next = collapseOnce(current);
  while (next !== current) {
    current = next;
    next = collapseOnce(current);
  }
  return next;
}

/**
 * Keep only bare filenames: trimmed, non-empty, no separator. Duplicates
 * collapse to their first occurrence.
 */
export function filterFilenames(names: readonly string[]): string[] {
  const unique = new Set<string>();
  for (const raw of names) {
    const name = raw.trim().split(path.sep).join('/');
    if (name === '' || name.includes('/')) continue;
    unique.add(name);
  }
  return [...unique];
}

/**
 * The directory itself followed by every parent up to the filesystem root.
 * Paths are not checked for existence; absolute input is expected.
 */
export function ancestorsOf(start: string): string[] {
  let dir = normalizePath(start);
  const chain: string[] = [];
  while (dir !== path.dirname(dir)) {
    chain.push(dir);
    dir = path.dirname(dir);
  }
  chain.push(dir);
  return chain;
}

export function isBareFilename(name: string): boolean {
  const trimmed = name.trim();
  return trimmed !== '' && !trimmed.includes('/') && !trimmed.includes(path.sep);
}
