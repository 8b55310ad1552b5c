/**
 * Path canonicalisation and containment
 *
 * A canonical path is absolute, free of `.`/`..` segments and resolved
 * through every symlink that exists on disk. Paths that do not exist yet
 * (the target of a write) are canonicalised through their deepest
 * existing ancestor, so a symlinked parent directory cannot hide an escape.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { errnoCode } from './errors.js';

export function expandHome(input: string): string {
  if (input === '~') return os.homedir();
  if (input.startsWith('~/')) return path.join(os.homedir(), input.slice(2));
  return input;
}

/** Symlink hops allowed while canonicalising one path (the kernel's MAXSYMLINKS). */
const MAX_SYMLINK_HOPS = 40;

/**
 * Walk the path one segment at a time, the way the kernel does: a symlink is
 * replaced by its target before any later `..` applies, so `link/..` is the
 * parent of the link's target, not the directory holding the link. Once a
 * segment does not exist, the rest is joined as text.
 */
export function canonicalize(input: string, base: string = process.cwd()): string {
  const expanded = expandHome(input);
  const full = path.isAbsolute(expanded) ? expanded : `${path.resolve(base)}${path.sep}${expanded}`;

  const pending = splitSegments(full);
  let current = path.parse(full).root || path.sep;
  let onDisk = true;
  let hops = 0;

  while (pending.length > 0) {
    const segment = pending.shift() ?? '';
    if (segment === '..') {
      current = path.dirname(current);
      // Climbing back out of a missing tail lands on real directories again.
      if (!onDisk && fs.existsSync(current)) onDisk = true;
      continue;
    }
    const next = path.join(current, segment);
    if (!onDisk) {
      current = next;
      continue;
    }

    let stat: fs.Stats;
    try {
      stat = fs.lstatSync(next);
    } catch (err) {
      const code = errnoCode(err);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') throw err;
      onDisk = false;
      current = next;
      continue;
    }

    if (!stat.isSymbolicLink()) {
      current = next;
      continue;
    }
    hops += 1;
    if (hops > MAX_SYMLINK_HOPS) {
      throw new Error(`Too many levels of symbolic links: ${input}`);
    }
    const target = fs.readlinkSync(next);
    pending.unshift(...splitSegments(target));
    if (path.isAbsolute(target)) {
      current = path.parse(target).root || path.sep;
    }
  }

  return current;
}

function splitSegments(p: string): string[] {
  return p.split(path.sep).filter((segment) => segment !== '' && segment !== '.');
}

export function isWithin(candidate: string, root: string): boolean {
  if (candidate === root) return true;
  const prefix = root.endsWith(path.sep) ? root : root + path.sep;
  return candidate.startsWith(prefix);
}

/**
 * Return the first canonical root that contains the canonical candidate,
 * or null when none does.
 */
export function findContainingRoot(candidate: string, roots: readonly string[]): string | null {
  for (const root of roots) {
    if (isWithin(candidate, root)) return root;
  }
  return null;
}

/**
 * Canonicalise configured roots. A root that cannot be resolved is dropped:
 * it admits nothing.
 */
export function canonicalizeRoots(roots: readonly string[]): string[] {
  const resolved: string[] = [];
  for (const root of roots) {
    try {
      resolved.push(canonicalize(root));
    } catch (err) {
      console.error(`  [policy] ignoring unresolvable root ${root}: ${(err as Error).message}`);
    }
  }
  return resolved;
}

/** Deepest ancestor of `target` (inclusive) that exists on disk. */
export function deepestExistingAncestor(target: string): string {
  let current = target;
  while (!fs.existsSync(current)) {
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}
