/**
 * kiln CLI - Declarative development containers
 *
 * Every invocation builds a fresh commander program and service container,
 * so `runCommand` can drive the real command tree in-process.
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import {
  ConfigError,
  DEFAULT_LOGICAL_NAME,
  DEFAULT_PROFILE_NAME,
  KilnError,
  ProfileNotFoundError,
  describeError,
  describeLockState,
  listIndexEntries,
  shortDigest,
  type Environment,
  type Profile,
} from '@kiln/core';
import { ServiceContainer, type ServiceOverrides } from './services/ServiceContainer.js';
import { captureOutput, output, outputError } from './io/CliOutput.js';

export const VERSION = '0.3.0';

export interface CliOptions {
  cwd: string;
  env: Environment;
  services?: ServiceOverrides;
}

interface CliContext extends CliOptions {
  /** Exit code set by commands that run a child process */
  exitCode: number;
}

interface InitCommandOptions {
  force?: boolean;
  container?: string;
}

interface BuildCommandOptions {
  profile?: string;
  force?: boolean;
  lock: boolean;
}

interface CheckCommandOptions {
  profile?: string;
  verbose?: boolean;
}

interface ResetCommandOptions {
  container?: string;
  all?: boolean;
}

interface ListCommandOptions {
  all?: boolean;
}

interface ConfigSetOptions {
  project?: boolean;
}

interface RunCommandOptions {
  container?: string;
  strict?: boolean;
}

function warn(message: string): void {
  outputError(chalk.yellow(`Warning: ${message}`));
}

/**
 * Load a profile by name, writing the built-in default profile first when
 * the default is asked for and missing.
 */
function loadProfile(services: ServiceContainer, name: string): Profile {
  if (name === DEFAULT_PROFILE_NAME) {
    services.profiles.ensureDefault();
  }
  return services.profiles.load(name);
}

export function createProgram(context: CliContext): Command {
  let services: ServiceContainer | null = null;
  const getServices = (): ServiceContainer => {
    if (!services) {
      services = new ServiceContainer({ cwd: context.cwd, env: context.env, overrides: context.services });
    }
    return services;
  };

  const program = new Command();

  program
    .name('kiln')
    .description('Declarative, reproducible development containers')
    .version(VERSION)
    .exitOverride() // Throw instead of process.exit() - enables testing
    .enablePositionalOptions()
    .configureOutput({
      writeOut: (str) => output(str.trimEnd()),
      writeErr: (str) => outputError(str.trimEnd()),
    });

  program
    .command('init')
    .description('Create a container for this project from a built profile')
    .argument('[profile]', 'Profile to create the container from')
    .option('-f, --force', 'Replace an existing container of the same name')
    .option('-c, --container <name>', 'Logical container name', DEFAULT_LOGICAL_NAME)
    .action(async (profileArg: string | undefined, options: InitCommandOptions) => {
      const svc = getServices();
      const profileName = profileArg ?? svc.settings.get('defaultProfile');
      const profile = loadProfile(svc, profileName);
      const containers = svc.containerService(svc.projectRoot ?? svc.cwd);

      const record = await containers.init(profileName, profile, {
        logicalName: options.container,
        force: options.force,
      });

      output(
        chalk.green(`✓ Created container '${record.logicalName}' (${record.identity}) from profile '${profileName}'`)
      );
      output(chalk.dim('Run `kiln` to open a shell in it.'));
    });

  program
    .command('build')
    .description("Build a profile's image")
    .option('-p, --profile <name>', 'Profile to build')
    .option('-f, --force', 'Build even if the image is up to date')
    .option('--no-lock', 'Do not record the build in the lock file')
    .action(async (options: BuildCommandOptions) => {
      const svc = getServices();
      const profileName = options.profile ?? svc.settings.get('defaultProfile');
      const profile = loadProfile(svc, profileName);

      output(chalk.blue(`Building image for profile '${profileName}'...`));
      const result = await svc.buildService.build(profileName, profile, {
        force: options.force,
        noLock: !options.lock,
      });

      if (result.status === 'up-to-date') {
        output(
          chalk.green(`✓ Image ${result.record.imageTag} is up to date (${shortDigest(result.digest)})`)
        );
        output(chalk.dim('Use --force to rebuild.'));
        return;
      }

      output(chalk.green(`✓ Built ${result.imageTag} (${shortDigest(result.digest)})`));
      if (!result.record) {
        output(chalk.yellow('Lock not updated (--no-lock).'));
      }
    });

  program
    .command('check')
    .description('Validate a profile and report lock, image and container state')
    .option('-p, --profile <name>', 'Profile to check')
    .option('-v, --verbose', 'Show digests and lock details')
    .action(async (options: CheckCommandOptions) => {
      const svc = getServices();
      const profileName = options.profile ?? svc.settings.get('defaultProfile');
      const profile = loadProfile(svc, profileName);
      const { state, digest, record } = svc.buildService.check(profileName, profile);

      output(chalk.bold.blue(`Profile '${profileName}'`));
      output(`  ${chalk.dim('Config:')} ${chalk.green('valid')}`);
      output(`  ${chalk.dim('Lock:')} ${state === 'current' ? chalk.green(describeLockState(state)) : chalk.yellow(describeLockState(state))}`);

      if (options.verbose) {
        output(`  ${chalk.dim('Digest:')} ${digest}`);
        if (record) {
          output(`  ${chalk.dim('Locked digest:')} ${record.digest}`);
          output(`  ${chalk.dim('Built:')} ${record.createdAt}`);
          output(`  ${chalk.dim('Image id:')} ${record.imageId}`);
        }
      }

      let image: string;
      try {
        const imageId = await svc.buildService.imageId(profileName, profile);
        image = imageId ? chalk.green('present') : chalk.yellow('missing');
      } catch (error) {
        svc.logger.warn({ err: error }, 'Image query failed');
        image = chalk.yellow(`unknown (${describeError(error)})`);
      }
      output(`  ${chalk.dim('Image:')} ${image}`);

      if (state !== 'current') {
        warn(`Run \`kiln build --profile ${profileName}\` to build the image.`);
      }

      if (svc.projectRoot) {
        const containers = svc.containerService(svc.projectRoot);
        for (const container of containers.list().filter((c) => c.profileName === profileName)) {
          const drift = containers.checkDrift(container, profile);
          output(
            `  ${chalk.dim(`Container ${container.logicalName}:`)} ${drift ? chalk.yellow('profile changed since init') : chalk.green('in sync')}`
          );
          if (drift) {
            warn(drift);
          }
        }
      }
    });

  program
    .command('reset')
    .description("Remove this project's container(s)")
    .option('-c, --container <name>', 'Logical container name')
    .option('--all', 'Remove every container of this project')
    .action(async (options: ResetCommandOptions) => {
      if (options.all && options.container) {
        throw new ConfigError('use either --container or --all, not both');
      }
      const containers = getServices().requireProject();
      const removed = await containers.reset(
        options.all ? { all: true } : { logicalName: options.container ?? DEFAULT_LOGICAL_NAME }
      );

      if (removed.length === 0) {
        output(chalk.yellow('No containers to remove.'));
        return;
      }
      for (const name of removed) {
        output(chalk.green(`✓ Removed container '${name}'`));
      }
    });

  program
    .command('list')
    .description('List containers in this project')
    .option('-a, --all', 'List containers of every project on this host')
    .action((options: ListCommandOptions) => {
      const svc = getServices();
      if (options.all) {
        listAllProjects(svc);
        return;
      }
      const records = svc.projectRoot ? svc.containerService(svc.projectRoot).list() : [];

      if (records.length === 0) {
        output(chalk.yellow('No containers in this project.'));
        output(chalk.dim('Run `kiln init` to create one.'));
        return;
      }

      output(chalk.bold.blue('Containers'));
      output();
      for (const record of records) {
        output(
          `${chalk.bold(record.logicalName)} ${chalk.dim(record.identity)} profile=${record.profileName} image=${record.imageTag} created=${record.createdAt}`
        );
      }
    });

  program
    .command('profiles')
    .description('List available profiles')
    .action(() => {
      const svc = getServices();
      svc.profiles.ensureDefault();
      const defaultProfile = svc.settings.get('defaultProfile');

      output(chalk.bold.blue('Profiles'));
      output();
      for (const name of svc.profiles.list()) {
        output(`${name === defaultProfile ? chalk.green('*') : ' '} ${name}`);
      }
      output();
      output(chalk.dim(`Profiles live in ${svc.paths.profilesDir}`));
    });

  // Config subcommands
  const config = program.command('config').description('Settings commands');

  config
    .command('show')
    .description('Show current settings')
    .action(() => {
      const svc = getServices();

      output(chalk.bold.blue('Settings'));
      output();
      for (const [key, value] of Object.entries(svc.settings.getAll())) {
        const formattedValue =
          typeof value === 'boolean' ? (value ? chalk.green('true') : chalk.red('false')) : chalk.cyan(String(value));
        output(`  ${chalk.dim(key + ':')} ${formattedValue}`);
      }

      output();
      output(chalk.dim('Use `kiln config set <key> <value>` to change values.'));
    });

  config
    .command('set')
    .description('Set a settings value')
    .argument('<key>', 'Settings key')
    .argument('<value>', 'Settings value')
    .option('--project', "Write to this project's settings instead of the user settings")
    .action((key: string, value: string, options: ConfigSetOptions) => {
      const svc = getServices();
      svc.settings.update(key, value, options.project ? 'project' : 'user');
      output(chalk.green(`✓ Set ${key} = ${value}`));
    });

  program
    .command('run', { isDefault: true })
    .description('Run a command in the project container (default: the profile default command)')
    .argument('[command]', 'Command name from the profile command table')
    .argument('[args...]', 'Arguments passed to the command')
    .option('-c, --container <name>', 'Logical container name')
    .option('--strict', 'Fail instead of warning when the build lock is missing or stale')
    .passThroughOptions()
    .action(async (commandName: string | undefined, args: string[], options: RunCommandOptions) => {
      const svc = getServices();
      const containers = svc.requireProject();
      const record = containers.get(options.container);

      let liveProfile: Profile | null = null;
      let skipPreflight = false;
      try {
        liveProfile = svc.profiles.load(record.profileName);
      } catch (error) {
        if (error instanceof ConfigError) {
          warn(`Profile '${record.profileName}' is invalid; using the configuration frozen at init. ${error.message}`);
          skipPreflight = true;
        } else if (!(error instanceof ProfileNotFoundError)) {
          throw error;
        }
      }

      if (!skipPreflight) {
        const strict = options.strict === true || svc.settings.get('strict');
        for (const warning of containers.preflight(record, liveProfile, { strict })) {
          warn(warning);
        }
      }

      const plan = await containers.prepareRun(record, commandName, args, svc.cwd);
      context.exitCode = await containers.run(plan);
    });

  return program;
}

function listAllProjects(svc: ServiceContainer): void {
  const entries = listIndexEntries(svc.projectIndex.load());
  if (entries.length === 0) {
    output(chalk.yellow('No containers on this host.'));
    return;
  }

  output(chalk.bold.blue('Containers on this host'));
  let projectDir: string | null = null;
  for (const entry of entries) {
    if (entry.projectDir !== projectDir) {
      projectDir = entry.projectDir;
      output();
      output(chalk.bold(projectDir));
    }
    output(
      `  ${chalk.bold(entry.logicalName)} ${chalk.dim(entry.identity)} profile=${entry.profileName} image=${entry.imageTag} last-used=${entry.lastUsed ?? 'never'}`
    );
  }
}

function reportError(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode;
  }
  if (error instanceof KilnError) {
    outputError(chalk.red(`Error: ${error.message}`));
    if (error.hint) {
      outputError(chalk.dim(error.hint));
    }
    return error.exitCode;
  }
  outputError(chalk.red(`Error: ${describeError(error)}`));
  return 1;
}

/**
 * Run the CLI once and return the process exit code.
 */
export async function execute(args: string[], options: CliOptions): Promise<number> {
  const context: CliContext = { ...options, exitCode: 0 };
  try {
    await createProgram(context).parseAsync(args, { from: 'user' });
    return context.exitCode;
  } catch (error) {
    return reportError(error);
  }
}

/**
 * Entry point for the installed binary.
 */
export function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  return execute(argv, { cwd: process.cwd(), env: process.env });
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Run CLI command programmatically (for testing).
 * Captures output and returns result instead of writing to console.
 */
export async function runCommand(args: string[], options: CliOptions): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];

  const restoreOutput = captureOutput(
    (msg) => stdout.push(msg),
    (msg) => stderr.push(msg)
  );

  let exitCode: number;
  try {
    exitCode = await execute(args, options);
  } finally {
    restoreOutput();
  }

  return {
    stdout: stdout.join('\n'),
    stderr: stderr.join('\n'),
    exitCode,
  };
}
