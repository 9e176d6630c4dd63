/**
 * Profile defaults
 *
 * Every field a profile file omits takes its value from here, so a minimal
 * profile and a fully spelled-out one with the same values are the same
 * profile (and hash the same).
 */

import type { CommandTable, Profile } from './types.js';

export const DEFAULT_BASE_IMAGE = 'ubuntu:24.04';

export const DEFAULT_APT_PACKAGES: readonly string[] = [
  'build-essential',
  'ca-certificates',
  'curl',
  'fd-find',
  'git',
  'gnupg',
  'jq',
  'less',
  'procps',
  'python3',
  'python3-pip',
  'python3-venv',
  'ripgrep',
  'sudo',
  'vim',
];

export function createDefaultCommandTable(): CommandTable {
  return {
    default: 'shell',
    entries: {
      shell: { kind: 'alias', target: 'bash' },
      bash: { kind: 'direct', args: '' },
      zsh: {
        kind: 'direct',
        args: '',
        install: 'apt-get update && apt-get install -y --no-install-recommends zsh && rm -rf /var/lib/apt/lists/*',
      },
      node: { kind: 'direct', args: '' },
    },
  };
}

export function createDefaultProfile(): Profile {
  return {
    container: {
      baseImage: DEFAULT_BASE_IMAGE,
      user: 'code',
      homeDir: '/home/code',
      workDir: '/home/code/work',
    },
    runtime: {
      engine: 'podman',
      enableGpu: false,
      gpuDriver: 'all',
      interactive: true,
      volumes: [{ host: '$HOME/.ssh', container: '/home/code/.ssh', readonly: true }],
      tmpfs: [],
      extraArgs: [],
    },
    environment: { TERM: 'xterm-256color' },
    dependencies: {
      apt: [...DEFAULT_APT_PACKAGES],
      nodejs: { enabled: true, version: '20', source: 'nodesource' },
      githubCli: { enabled: false },
      pip: [],
      npm: [],
      custom: [],
    },
    git: { userName: '', userEmail: '' },
    shell: { aliases: { ll: 'ls -alF' }, historySearch: true },
    commands: createDefaultCommandTable(),
  };
}
