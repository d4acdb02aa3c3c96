/**
 * Dockerfile stamping
 *
 * A Dockerfile is rendered from its template by a fixed sequence of line
 * rewrites, each anchored on a whole line (`FROM`, `ENV <NAME>`) or on a
 * placeholder token:
 *
 * 1. `FROM x` → `FROM <arch>/x` off amd64 (never for onbuild)
 * 2. `ENV NODE_VERSION` → resolved runtime version
 * 3. `ENV YARN_VERSION` → fetched, or in skip mode the existing value
 * 4. `FROM …node:<tag>-<suffix>` → tag replaced by the runtime version
 * 5. `"${<TYPE>_KEYS[@]}"` → one `<key> \` line per trusted key
 * 6. `alpine:0.0` → Alpine base version (alpine variant only)
 *
 * The template is only ever read. The result is written next to the
 * Dockerfile and renamed over it.
 */

import fs from 'fs';
import { DEFAULT_ARCH } from './discovery.js';
import type { Keyring, SubstitutionContext, Target, UpdateSettings, Variant } from './types.js';

export function prefixBaseImage(line: string, arch: string, variant: Variant): string {
  if (arch === DEFAULT_ARCH || variant === 'onbuild') {
    return line;
  }
  return line.replace(/^FROM (.*)/, (_match, image: string) => `FROM ${arch}/${image}`);
}

export function setEnv(line: string, name: string, value: string): string {
  return line.replace(new RegExp(`^(ENV ${name} ).*`), (_match, head: string) => head + value);
}

export function retagNodeImage(line: string, nodeVersion: string): string {
  return line.replace(
    /^(FROM .*node:)[^-]*(-.*)/,
    (_match, head: string, suffix: string) => head + nodeVersion + suffix
  );
}

export function setAlpineVersion(line: string, alpineVersion: string): string {
  return line.replace('alpine:0.0', () => `alpine:${alpineVersion}`);
}

export function keyPlaceholder(type: string): string {
  return `"\${${type.toUpperCase()}_KEYS[@]}"`;
}

/**
 * Replace every placeholder line with one continuation line per key,
 * indented like the placeholder
 */
export function spliceKeys(lines: string[], type: string, keys: string[]): string[] {
  const placeholder = keyPlaceholder(type);

  return lines.flatMap((line) => {
    const index = line.indexOf(placeholder);
    if (index === -1) {
      return [line];
    }

    const indent = /[ \t]*$/.exec(line.slice(0, index))?.[0] ?? '';
    return keys.map((key) => `${indent}${key} \\`);
  });
}

function spliceKeyring(lines: string[], keyring: Keyring): string[] {
  return keyring.reduce((acc, { type, keys }) => spliceKeys(acc, type, keys), lines);
}

/**
 * Third space-separated field of the `ENV <name>` line
 */
export function readEnv(dockerfile: string, name: string): string | undefined {
  const line = dockerfile.split('\n').find((l) => l.startsWith(`ENV ${name} `));
  return line?.split(' ')[2];
}

/**
 * Tag of the first base image, e.g. "3.8" for `FROM alpine:3.8`
 */
export function readAlpineVersion(dockerfile: string): string | undefined {
  const line = dockerfile.split('\n').find((l) => l.startsWith('FROM '));
  return line?.split(':')[1]?.trim() || undefined;
}

export function renderDockerfile(
  template: string,
  ctx: SubstitutionContext,
  variant: Variant,
  arch: string
): string {
  let lines = template
    .split('\n')
    .map((line) => prefixBaseImage(line, arch, variant))
    .map((line) => setEnv(line, 'NODE_VERSION', ctx.nodeVersion));

  const yarnVersion = ctx.yarnVersion;
  if (yarnVersion !== undefined) {
    lines = lines.map((line) => setEnv(line, 'YARN_VERSION', yarnVersion));
  }

  lines = lines.map((line) => retagNodeImage(line, ctx.nodeVersion));
  lines = spliceKeyring(lines, ctx.keyring);

  const alpineVersion = ctx.alpineVersion;
  if (variant === 'alpine' && alpineVersion !== undefined) {
    lines = lines.map((line) => setAlpineVersion(line, alpineVersion));
  }

  return lines.join('\n');
}

/**
 * Assemble the values for one target. In skip mode Yarn and Alpine versions
 * come from the Dockerfile about to be replaced. A missing Yarn version only
 * fails templates that declare `ENV YARN_VERSION` (onbuild has none).
 */
export function buildContext(
  target: Target,
  settings: UpdateSettings,
  nodeVersion: string
): SubstitutionContext {
  let { yarnVersion, alpineVersion } = settings;

  if (settings.skip) {
    const existing = fs.readFileSync(target.dockerfile, 'utf-8');
    yarnVersion = readEnv(existing, 'YARN_VERSION');
    alpineVersion = target.variant === 'alpine' ? readAlpineVersion(existing) : undefined;
  }

  if (
    yarnVersion === undefined &&
    readEnv(fs.readFileSync(target.template, 'utf-8'), 'YARN_VERSION') !== undefined
  ) {
    throw new Error(`No Yarn version available for ${target.dockerfile}`);
  }
  if (target.variant === 'alpine' && alpineVersion === undefined) {
    throw new Error(`No Alpine version available for ${target.dockerfile}`);
  }

  return { nodeVersion, yarnVersion, alpineVersion, keyring: settings.keyring };
}

export async function stampDockerfile(
  target: Target,
  ctx: SubstitutionContext,
  arch: string
): Promise<void> {
  const template = await fs.promises.readFile(target.template, 'utf-8');
  const output = renderDockerfile(template, ctx, target.variant, arch);
  const tmp = `${target.dockerfile}-tmp`;

  try {
    await fs.promises.writeFile(tmp, output);
    await fs.promises.rename(tmp, target.dockerfile);
  } catch (error) {
    await fs.promises.rm(tmp, { force: true });
    throw error;
  }
}
