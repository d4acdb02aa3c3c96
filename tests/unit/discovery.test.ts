import { describe, it, expect, afterEach } from 'vitest';
import {
  expandVersionFilter,
  getArch,
  getConfig,
  getVariants,
  getVersions,
} from '../../scripts/discovery.js';
import { ALL, parseFilter } from '../../scripts/selector.js';
import { createRepo, emptyDir, removeRepo, write } from '../helpers/repo.js';

describe('Repository Discovery', () => {
  let dir = '';

  afterEach(() => {
    if (dir) {
      removeRepo(dir);
      dir = '';
    }
  });

  describe('getArch', () => {
    it('maps Node architectures to image architectures', () => {
      expect(getArch('x64')).toBe('amd64');
      expect(getArch('arm64')).toBe('arm64v8');
      expect(getArch('arm')).toBe('arm32v7');
      expect(getArch('ppc64')).toBe('ppc64le');
      expect(getArch('s390x')).toBe('s390x');
    });

    it('rejects unsupported architectures', () => {
      expect(() => getArch('mips')).toThrow('Architecture mips is not supported');
    });
  });

  describe('getConfig', () => {
    it('reads values by name', () => {
      dir = createRepo();

      expect(getConfig(dir, 'baseuri')).toBe('https://nodejs.org/dist');
      expect(getConfig(dir, 'alpine_version')).toBe('3.8');
    });

    it('requires the whole name to match', () => {
      dir = emptyDir();
      write(dir, 'config', 'baseuri_mirror https://mirror.example\nbaseuri https://example.test/dist\n');

      expect(getConfig(dir, 'baseuri')).toBe('https://example.test/dist');
    });

    it('returns undefined for missing names and files', () => {
      dir = emptyDir();

      expect(getConfig(dir, 'baseuri')).toBeUndefined();
      write(dir, 'config', 'alpine_version 3.8\n');
      expect(getConfig(dir, 'baseuri')).toBeUndefined();
    });
  });

  describe('getVariants', () => {
    it('lists the variants of the architecture in file order', () => {
      dir = createRepo();

      expect(getVariants(dir, 'amd64')).toEqual(['alpine', 'onbuild', 'slim']);
      expect(getVariants(dir, 'arm64v8')).toEqual(['alpine', 'slim']);
    });

    it('returns nothing for unknown architectures or a missing table', () => {
      dir = createRepo();

      expect(getVariants(dir, 'arm32v6')).toEqual([]);
      expect(getVariants(dir, 'amd')).toEqual([]);
    });

    it('returns nothing without an architectures file', () => {
      dir = emptyDir();

      expect(getVariants(dir, 'amd64')).toEqual([]);
    });
  });

  describe('getVersions', () => {
    it('finds version directories in numeric order', () => {
      dir = createRepo();

      expect(getVersions(dir)).toEqual([
        { path: '8', parentPath: '.', major: '8' },
        { path: '10', parentPath: '.', major: '10' },
      ]);
    });

    it('counts a directory with only an alpine Dockerfile as a version', () => {
      dir = emptyDir();
      write(dir, '6/alpine/Dockerfile', 'FROM alpine:3.6\n');
      write(dir, 'docs/README.md', '# docs\n');

      expect(getVersions(dir)).toEqual([{ path: '6', parentPath: '.', major: '6' }]);
    });

    it('descends into directories with their own config', () => {
      dir = createRepo();
      write(dir, 'chakracore/config', 'baseuri https://example.test/chakracore\n');
      write(dir, 'chakracore/10/Dockerfile', 'FROM buildpack-deps:stretch\n');

      expect(getVersions(dir).map((version) => version.path)).toEqual(['8', '10', 'chakracore/10']);
      expect(getVersions(dir)[2]).toEqual({
        path: 'chakracore/10',
        parentPath: 'chakracore',
        major: '10',
      });
    });

    it('returns nothing for an empty repository', () => {
      dir = emptyDir();

      expect(getVersions(dir)).toEqual([]);
    });
  });

  describe('expandVersionFilter', () => {
    it('keeps the all filter', () => {
      dir = createRepo();

      expect(expandVersionFilter(dir, ALL)).toEqual(ALL);
    });

    it('expands version groups to their versions', () => {
      dir = createRepo();
      write(dir, 'chakracore/config', 'baseuri https://example.test/chakracore\n');
      write(dir, 'chakracore/8/Dockerfile', 'FROM buildpack-deps:stretch\n');
      write(dir, 'chakracore/10/Dockerfile', 'FROM buildpack-deps:stretch\n');

      const filter = expandVersionFilter(dir, parseFilter('8,chakracore'));

      expect(filter.kind).toBe('subset');
      if (filter.kind === 'subset') {
        expect([...filter.items]).toEqual(['8', 'chakracore/8', 'chakracore/10']);
      }
    });
  });
});
