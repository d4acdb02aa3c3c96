import type { Variant } from './types.js';

export const MANIFEST_FILE = '.travis.yml';
export const MANIFEST_TEMPLATE = 'travis.yml.template';
export const BANNER = '# DO NOT MODIFY. THIS FILE IS AUTOGENERATED #\n\n';

const ALPINE_DIRECTIVES = `
      after_success:
        - ccache -s
      addons:
        apt:
          packages:
            - netcat
      before_cache:
        - mv ccache/new-cache.tar.gz ccache/cache.tar.gz
      cache:
        directories:
          - ccache/
`;

/**
 * Build stage for one Dockerfile. Alpine builds compile from source and
 * carry the ccache directives.
 */
export function renderStage(version: string, variant: Variant): string {
  let stage = `
    - stage: Build
      before_script: *auto_skip
      env:
        - NODE_VERSION: "${version}"
        - VARIANT: "${variant}"
`;

  if (variant === 'alpine') {
    stage += ALPINE_DIRECTIVES;
  }

  return stage;
}

/**
 * CI manifest: the template followed by one stage per Dockerfile, in the
 * order they were added
 */
export class CiManifest {
  private readonly stages: string[] = [];

  constructor(private readonly template: string) {}

  addStage(version: string, variant: Variant): void {
    this.stages.push(renderStage(version, variant));
  }

  get size(): number {
    return this.stages.length;
  }

  render(): string {
    return BANNER + this.template + this.stages.join('');
  }
}
