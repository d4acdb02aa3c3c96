#!/usr/bin/env tsx

/**
 * Regenerates the versioned Dockerfiles and the CI manifest
 *
 * Every discovered Dockerfile gets a build stage in .travis.yml; only the
 * selected ones are stamped, concurrently, from their templates.
 */

import { chalk, minimist } from 'zx';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import {
  expandVersionFilter,
  getArch,
  getConfig,
  getVariants,
  getVersions,
} from './discovery.js';
import { fetchText, fetchYarnVersion, resolveFullVersion, type FetchText } from './fetch-versions.js';
import * as log from './log.js';
import { ALL, parseFilter, shouldUpdate } from './selector.js';
import { buildContext, stampDockerfile } from './stamp.js';
import { CiManifest, MANIFEST_FILE, MANIFEST_TEMPLATE } from './travis.js';
import type {
  Filter,
  Keyring,
  Target,
  TaskResult,
  UpdateReport,
  UpdateSettings,
  VersionRef,
} from './types.js';

const KEY_TYPES = ['node', 'yarn'];

const USAGE = `
  Update the node docker images.

  Usage:
    update.ts [-s] [-a ARCH] [MAJOR_VERSION(S)] [VARIANT(S)]

  Examples:
    - update.ts                   # Update all images
    - update.ts -s                # Update all images, skip updating Alpine and Yarn
    - update.ts 8,10              # Update version 8 and 10 and variants (default, slim, alpine etc.)
    - update.ts -s 8              # Update version 8 and variants, skip updating Alpine and Yarn
    - update.ts 8 slim,stretch    # Update only slim and stretch variants for version 8
    - update.ts . alpine          # Update the alpine variant for all versions

  OPTIONS:
    -s, --skip    Security update; skip updating the yarn and alpine versions.
    -a, --arch    Target architecture (default: detected from the host)
    -r, --root    Repository root (default: parent of the scripts directory)
    -h, --help    Show this message
`;

export interface UpdateOptions {
  root: string;
  skip?: boolean;
  arch?: string;
  versions?: Filter;
  variants?: Filter;

  /** HTTP text fetcher for listings and the Yarn release */
  get?: FetchText;
}

export interface CliArgs {
  help: boolean;
  skip: boolean;
  arch?: string;
  root?: string;
  versions: Filter;
  variants: Filter;
  unknown: string[];
}

export function parseArgs(argv: string[]): CliArgs {
  const unknown: string[] = [];
  const args = minimist(argv, {
    boolean: ['skip', 'help'],
    string: ['arch', 'root', '_'],
    alias: { s: 'skip', h: 'help', a: 'arch', r: 'root' },
    unknown: (arg: string) => {
      if (arg.startsWith('-') && arg !== '-') {
        unknown.push(arg);
        return false;
      }
      return true;
    },
  });

  const [versions, variants] = args._.map(String);

  return {
    help: Boolean(args.help),
    skip: Boolean(args.skip),
    arch: typeof args.arch === 'string' && args.arch !== '' ? args.arch : undefined,
    root: typeof args.root === 'string' && args.root !== '' ? args.root : undefined,
    versions: parseFilter(versions),
    variants: parseFilter(variants),
    unknown,
  };
}

export function loadKeyring(root: string): Keyring {
  return KEY_TYPES.map((type) => ({
    type,
    keys: fs
      .readFileSync(path.join(root, 'keys', `${type}.keys`), 'utf-8')
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line !== ''),
  }));
}

/**
 * Dockerfiles present for `arch`, default variant first within a version
 */
export function collectTargets(root: string, versions: VersionRef[], arch: string): Target[] {
  const targets: Target[] = [];

  for (const version of versions) {
    const parentDir = path.join(root, version.parentPath);
    const versionDir = path.join(root, version.path);

    if (fs.existsSync(path.join(versionDir, 'Dockerfile'))) {
      targets.push({
        version,
        variant: 'default',
        template: path.join(parentDir, 'Dockerfile.template'),
        dockerfile: path.join(versionDir, 'Dockerfile'),
      });
    }

    for (const variant of getVariants(parentDir, arch)) {
      const dockerfile = path.join(versionDir, variant, 'Dockerfile');
      // Skip non-docker directories
      if (variant === 'default' || !fs.existsSync(dockerfile)) {
        continue;
      }

      targets.push({
        version,
        variant,
        template: path.join(parentDir, `Dockerfile-${variant}.template`),
        dockerfile,
      });
    }
  }

  return targets;
}

async function resolveNodeVersion(
  major: string,
  baseUri: string | undefined,
  get: FetchText
): Promise<string> {
  const fallback = `${major}.0`;

  if (!baseUri) {
    log.warn(`No baseuri configured for ${major}, using ${fallback}`);
    return fallback;
  }

  try {
    const version = await resolveFullVersion(baseUri, major, get);
    if (version) {
      return version;
    }
    log.warn(`No ${major}.x release listed at ${baseUri}, using ${fallback}`);
  } catch (error) {
    log.warn(
      `Could not fetch ${baseUri} (${error instanceof Error ? error.message : String(error)}), using ${fallback}`
    );
  }

  return fallback;
}

async function updateTarget(
  target: Target,
  baseUri: string | undefined,
  settings: UpdateSettings,
  get: FetchText
): Promise<TaskResult> {
  try {
    const nodeVersion = await resolveNodeVersion(target.version.major, baseUri, get);
    const ctx = buildContext(target, settings, nodeVersion);
    await stampDockerfile(target, ctx, settings.arch);
    return { target, ok: true, nodeVersion };
  } catch (error) {
    return { target, ok: false, error };
  }
}

export async function update(options: UpdateOptions): Promise<UpdateReport> {
  const { root, skip = false, get = fetchText } = options;

  const versions = getVersions(root);
  if (versions.length === 0) {
    throw new Error('No valid versions found!');
  }

  const arch = options.arch ?? getArch();
  const versionFilter = expandVersionFilter(root, options.versions ?? ALL);
  const variantFilter = options.variants ?? ALL;

  let yarnVersion: string | undefined;
  let alpineVersion: string | undefined;
  if (!skip) {
    alpineVersion = getConfig(root, 'alpine_version');
    yarnVersion = await fetchYarnVersion(get);
    log.detail(`Yarn ${yarnVersion}, Alpine ${alpineVersion ?? '(not configured)'}`);
  }

  // A missing key list fails every stamped target, not the whole run
  let keyring: Keyring = [];
  let keyringError: unknown;
  try {
    keyring = loadKeyring(root);
  } catch (error) {
    keyringError = error ?? new Error('Could not read the trusted keys');
    log.error('Could not read the trusted keys', error);
  }

  const settings: UpdateSettings = { arch, skip, yarnVersion, alpineVersion, keyring };

  const manifest = new CiManifest(fs.readFileSync(path.join(root, MANIFEST_TEMPLATE), 'utf-8'));
  const targets = collectTargets(root, versions, arch);
  const announced = new Set<string>();
  const tasks: Promise<TaskResult>[] = [];

  for (const target of targets) {
    const { version, variant } = target;
    manifest.addStage(version.path, variant);

    if (!shouldUpdate(version.path, versionFilter) || !shouldUpdate(variant, variantFilter)) {
      continue;
    }

    if (!announced.has(version.path)) {
      announced.add(version.path);
      log.info(`Updating version ${version.path}...`);
    }

    const baseUri = getConfig(path.join(root, version.parentPath), 'baseuri');
    tasks.push(
      keyringError === undefined
        ? updateTarget(target, baseUri, settings, get)
        : Promise.resolve<TaskResult>({ target, ok: false, error: keyringError })
    );
  }

  const manifestPath = path.join(root, MANIFEST_FILE);
  fs.writeFileSync(manifestPath, manifest.render());

  const results = await Promise.all(tasks);

  return { targets, results, manifest: manifestPath, stages: manifest.size };
}

function printSummary(report: UpdateReport): void {
  console.log(chalk.bold('\n📊 Summary:\n'));

  for (const result of report.results) {
    const { version, variant } = result.target;
    if (result.ok) {
      log.success(`${version.path}/${variant} → ${result.nodeVersion}`);
    } else {
      log.error(`${version.path}/${variant}`, result.error);
    }
  }

  log.detail(`${report.stages} stages written to ${path.basename(report.manifest)}`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(USAGE);
    return;
  }

  if (args.unknown.length > 0) {
    console.error(chalk.red(`Unknown option: ${args.unknown.join(', ')}`));
    console.log(USAGE);
    process.exit(1);
  }

  console.log(chalk.bold('\n🐳 Dockerfile Updater\n'));

  const report = await update({
    root: args.root ?? fileURLToPath(new URL('..', import.meta.url)),
    skip: args.skip,
    arch: args.arch,
    versions: args.versions,
    variants: args.variants,
  });

  printSummary(report);

  const failed = report.results.filter((result) => !result.ok).length;
  if (failed > 0) {
    console.log(chalk.yellow(`\n⚠ Done with ${failed} failed Dockerfile(s)\n`));
  } else {
    console.log(chalk.bold.green('\n✅ Done!\n'));
  }
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    log.fatal(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
