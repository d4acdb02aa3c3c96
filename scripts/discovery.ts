/**
 * Repository layout helpers: version directories, per-architecture variants,
 * and the line-oriented `config` files.
 */

import fs from 'fs';
import path from 'path';
import type { Filter, VersionRef } from './types.js';

export const DEFAULT_ARCH = 'amd64';

/**
 * Node's process.arch → Docker Official Images architecture
 */
const ARCHITECTURES: Record<string, string> = {
  x64: 'amd64',
  arm64: 'arm64v8',
  arm: 'arm32v7',
  ppc64: 'ppc64le',
  s390x: 's390x',
  ia32: 'i386',
};

export function getArch(platformArch: string = process.arch): string {
  const arch = ARCHITECTURES[platformArch];
  if (!arch) {
    throw new Error(`Architecture ${platformArch} is not supported`);
  }
  return arch;
}

/**
 * Read `name` from `<dir>/config`. Lines are `name<whitespace>value`.
 */
export function getConfig(dir: string, name: string): string | undefined {
  const file = path.join(dir, 'config');
  if (!fs.existsSync(file)) {
    return undefined;
  }

  for (const line of fs.readFileSync(file, 'utf-8').split('\n')) {
    const match = /^(\S+)\s+(.*)$/.exec(line.trim());
    if (match && match[1] === name) {
      return match[2];
    }
  }

  return undefined;
}

/**
 * Variants built for `arch`, read from the `<dir>/architectures` table
 */
export function getVariants(dir: string, arch: string): string[] {
  const file = path.join(dir, 'architectures');
  if (!fs.existsSync(file)) {
    return [];
  }

  for (const line of fs.readFileSync(file, 'utf-8').split('\n')) {
    const [name, list] = line.trim().split(/\s+/);
    if (name === arch && list) {
      return list.split(',').filter((variant) => variant !== '');
    }
  }

  return [];
}

function listDirectories(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b, 'en', { numeric: true }));
}

/**
 * Version directories under `prefix`, descending into directories that carry
 * their own `config` (e.g., a separate runtime flavor with its own baseuri).
 */
export function getVersions(root: string, prefix: string = '.'): VersionRef[] {
  const versions: VersionRef[] = [];

  for (const name of listDirectories(path.join(root, prefix))) {
    const rel = prefix === '.' ? name : path.posix.join(prefix, name);
    const dir = path.join(root, rel);

    if (fs.existsSync(path.join(dir, 'config'))) {
      versions.push(...getVersions(root, rel));
    } else if (
      fs.existsSync(path.join(dir, 'Dockerfile')) ||
      fs.existsSync(path.join(dir, 'alpine', 'Dockerfile'))
    ) {
      versions.push({ path: rel, parentPath: prefix, major: name });
    }
  }

  return versions;
}

/**
 * Replace filter entries naming a version group with the group's versions
 */
export function expandVersionFilter(root: string, filter: Filter): Filter {
  if (filter.kind === 'all') {
    return filter;
  }

  const items = new Set<string>();
  for (const item of filter.items) {
    if (fs.existsSync(path.join(root, item, 'config'))) {
      getVersions(root, item).forEach((version) => items.add(version.path));
    } else {
      items.add(item);
    }
  }

  return { kind: 'subset', items };
}
