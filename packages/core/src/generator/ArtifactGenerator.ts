/**
 * ArtifactGenerator - Renders a profile into an image recipe
 *
 * The recipe is a Dockerfile plus the entrypoint script it installs. Both
 * come from mustache templates with HTML escaping turned off; every value
 * that lands in shell text is quoted here, before rendering, so the
 * templates stay plain text.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import Mustache from 'mustache';
import { quote } from 'shell-quote';
import { resolveDefaultCommand } from '../commands/CommandResolver.js';
import type { Profile } from '../config/types.js';
import { IOError, describeError } from '../errors.js';
import { atomicWriteFileSync } from '../fs/atomicWrite.js';

export interface TemplateSet {
  dockerfile: string;
  entrypoint: string;
}

export interface BuildRecipe {
  dockerfile: string;
  entrypoint: string;
}

export interface RenderOptions {
  profileName: string;
  templates: TemplateSet;
}

/** File names inside the build context */
export const DOCKERFILE_NAME = 'Dockerfile';
export const ENTRYPOINT_NAME = 'entrypoint.sh';

/** Where the entrypoint is installed inside the image */
export const ENTRYPOINT_PATH = '/usr/local/bin/kiln-entrypoint';

const TEMPLATES_DIR = fileURLToPath(new URL('../../templates', import.meta.url));

let cachedTemplates: TemplateSet | undefined;

/**
 * Read the template set. The default set ships with the package and is
 * read once per process.
 */
export function loadTemplates(dir?: string): TemplateSet {
  if (dir === undefined && cachedTemplates) {
    return cachedTemplates;
  }
  const templatesDir = dir ?? TEMPLATES_DIR;
  const read = (file: string): string => {
    const filePath = path.join(templatesDir, file);
    try {
      return fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new IOError(filePath, `Failed to read template: ${describeError(error)}`, { cause: error });
    }
  };
  const templates = {
    dockerfile: read('Dockerfile.mustache'),
    entrypoint: read('entrypoint.sh.mustache'),
  };
  if (dir === undefined) {
    cachedTemplates = templates;
  }
  return templates;
}

/**
 * Turn a user-written shell step into the body of a single RUN
 * instruction. Lines are joined with `\` continuations; continuations the
 * user already wrote are not doubled.
 */
export function joinShellLines(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.trimEnd().replace(/\\$/, '').trimEnd())
    .filter((line) => line.trim().length > 0)
    .join(' \\\n    ');
}

export function sortedAptPackages(packages: readonly string[]): string[] {
  return [...new Set(packages)].sort();
}

interface NodeJsView {
  version: string;
  nodesource: boolean;
  apt: boolean;
  nvm: boolean;
}

interface DockerfileView {
  profileName: string;
  baseImage: string;
  user: string;
  homeDir: string;
  workDir: string;
  hasAptPackages: boolean;
  aptPackages: string[];
  fdFindSymlink: boolean;
  nodejs: NodeJsView | false;
  githubCli: boolean;
  pipPackages: string;
  npmPackages: string;
  customSteps: Array<{ name: string; runs: string[] }>;
  commandInstalls: Array<{ name: string; run: string }>;
  gitUserName: string;
  gitUserEmail: string;
  aliasArgs: string;
  historySearch: boolean;
  environment: Array<{ key: string; value: string }>;
}

interface EntrypointView {
  profileName: string;
  workDir: string;
  nvm: boolean;
  defaultArgv: string;
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function dockerfileView(profile: Profile, profileName: string): DockerfileView {
  const { container, dependencies, git, shell } = profile;
  const aptPackages = sortedAptPackages(dependencies.apt);
  const nodejs = dependencies.nodejs;

  const commandInstalls = Object.entries(profile.commands.entries)
    .sort(([a], [b]) => byName(a, b))
    .flatMap(([name, definition]) =>
      definition.kind === 'direct' && definition.install !== undefined && definition.install.trim() !== ''
        ? [{ name, run: joinShellLines(definition.install) }]
        : []
    );

  const aliasLines = Object.entries(shell.aliases)
    .sort(([a], [b]) => byName(a, b))
    .map(([name, value]) => `alias ${name}=${quote([value])}`);

  return {
    profileName,
    baseImage: container.baseImage,
    user: container.user,
    homeDir: container.homeDir,
    workDir: container.workDir,
    hasAptPackages: aptPackages.length > 0,
    aptPackages,
    fdFindSymlink: aptPackages.includes('fd-find'),
    nodejs: nodejs.enabled
      ? {
          version: nodejs.version,
          nodesource: nodejs.source === 'nodesource',
          apt: nodejs.source === 'apt',
          nvm: nodejs.source === 'nvm',
        }
      : false,
    githubCli: dependencies.githubCli.enabled,
    pipPackages: quote(dependencies.pip),
    npmPackages: quote(dependencies.npm),
    customSteps: dependencies.custom.map((step) => ({
      name: step.name,
      runs: step.commands.map(joinShellLines).filter((run) => run.length > 0),
    })),
    commandInstalls,
    gitUserName: git.userName === '' ? '' : quote([git.userName]),
    gitUserEmail: git.userEmail === '' ? '' : quote([git.userEmail]),
    aliasArgs: quote(aliasLines),
    historySearch: shell.historySearch,
    environment: Object.keys(profile.environment)
      .sort(byName)
      .map((key) => ({ key, value: JSON.stringify(profile.environment[key]) })),
  };
}

function entrypointView(profile: Profile, profileName: string): EntrypointView {
  const resolved = resolveDefaultCommand(profile.commands);
  return {
    profileName,
    workDir: quote([profile.container.workDir]),
    nvm: profile.dependencies.nodejs.enabled && profile.dependencies.nodejs.source === 'nvm',
    defaultArgv: quote([resolved.executable, ...resolved.args]),
  };
}

function render(template: string, view: DockerfileView | EntrypointView): string {
  return Mustache.render(template, view, {}, { escape: (value: unknown) => String(value) });
}

/**
 * Render the recipe for a profile. Same profile and templates, same bytes.
 */
export function renderRecipe(profile: Profile, options: RenderOptions): BuildRecipe {
  return {
    dockerfile: render(options.templates.dockerfile, dockerfileView(profile, options.profileName)),
    entrypoint: render(options.templates.entrypoint, entrypointView(profile, options.profileName)),
  };
}

/**
 * Write the recipe into a build context directory.
 */
export function writeRecipe(recipe: BuildRecipe, dir: string): void {
  atomicWriteFileSync(path.join(dir, DOCKERFILE_NAME), recipe.dockerfile);
  atomicWriteFileSync(path.join(dir, ENTRYPOINT_NAME), recipe.entrypoint, { mode: 0o755 });
}
