/**
 * Path placeholder expansion for volume and tmpfs paths
 *
 * Profiles store paths such as `$HOME/.ssh` or `~/cache` unexpanded; they
 * are expanded only when a container is created, against the creating
 * user's environment and the project directory.
 */

import { ConfigError } from '../errors.js';

export type PathVariables = Readonly<Record<string, string | undefined>>;

const VARIABLE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Expand `$VAR`, `${VAR}` and a leading `~` in a path template.
 *
 * @throws ConfigError when a referenced variable is not set
 */
export function expandPathTemplate(template: string, vars: PathVariables, source = 'runtime.volumes'): string {
  const lookup = (name: string): string => {
    const value = vars[name];
    if (value === undefined) {
      throw new ConfigError(`unknown variable '${name}' in path '${template}'`, source);
    }
    return value;
  };

  let expanded = template;
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = lookup('HOME') + expanded.slice(1);
  }
  return expanded.replace(VARIABLE_PATTERN, (_match, braced: string | undefined, bare: string | undefined) =>
    lookup(braced ?? bare ?? '')
  );
}

/**
 * Variables available to path templates: the caller's environment with
 * PWD pinned to the project directory.
 */
export function pathVariables(env: PathVariables, projectDir: string): PathVariables {
  return { ...env, PWD: projectDir };
}
