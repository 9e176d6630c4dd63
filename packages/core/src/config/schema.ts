/**
 * Profile document schema
 *
 * A profile file is TOML with snake_case keys. ProfileDocumentSchema
 * validates that shape and fills in defaults; fromProfileDocument and
 * toProfileDocument convert between it and the camelCase Profile model.
 * The same document shape is used for frozen snapshots in the container
 * registry, so a snapshot re-validates exactly like a profile file.
 */

import { z } from 'zod';
import { DEFAULT_APT_PACKAGES, DEFAULT_BASE_IMAGE, createDefaultCommandTable } from './defaults.js';
import type { CommandDefinition, CommandTable, Profile } from './types.js';

const nonEmpty = (field: string) => z.string().min(1, `${field} cannot be empty`);

const ContainerSchema = z
  .object({
    base_image: nonEmpty('base_image').default(DEFAULT_BASE_IMAGE),
    user: nonEmpty('user').default('code'),
    home_dir: nonEmpty('home_dir').default('/home/code'),
    work_dir: nonEmpty('work_dir').default('/home/code/work'),
  })
  .strict();

const VolumeSchema = z
  .object({
    host: z.string().min(1, 'volume host path cannot be empty'),
    container: z.string().min(1, 'volume container path cannot be empty'),
    readonly: z.boolean().default(false),
  })
  .strict();

const TmpfsSchema = z
  .object({
    path: z.string().min(1, 'tmpfs path cannot be empty'),
    size: z.string().default('1m'),
    readonly: z.boolean().default(false),
  })
  .strict();

const RuntimeSchema = z
  .object({
    engine: z.enum(['podman', 'docker']).default('podman'),
    enable_gpu: z.boolean().default(false),
    gpu_driver: z.string().default('all'),
    interactive: z.boolean().default(true),
    volumes: z
      .array(VolumeSchema)
      .default(() => [{ host: '$HOME/.ssh', container: '/home/code/.ssh', readonly: true }]),
    tmpfs: z.array(TmpfsSchema).default([]),
    extra_args: z.array(z.string()).default([]),
  })
  .strict();

const DependenciesSchema = z
  .object({
    apt: z.array(z.string().min(1)).default(() => [...DEFAULT_APT_PACKAGES]),
    nodejs: z
      .object({
        enabled: z.boolean().default(true),
        version: z.string().min(1).default('20'),
        source: z.enum(['nodesource', 'apt', 'nvm']).default('nodesource'),
      })
      .strict()
      .default({}),
    github_cli: z.object({ enabled: z.boolean().default(false) }).strict().default({}),
    pip: z.array(z.string().min(1)).default([]),
    npm: z.array(z.string().min(1)).default([]),
    custom: z
      .array(
        z
          .object({
            name: z.string().min(1, 'custom dependency name cannot be empty'),
            commands: z.array(z.string()),
          })
          .strict()
      )
      .default([]),
  })
  .strict();

const GitSchema = z
  .object({
    user_name: z.string().default(''),
    user_email: z.string().default(''),
  })
  .strict();

const ShellSchema = z
  .object({
    aliases: z.record(z.string()).default(() => ({ ll: 'ls -alF' })),
    history_search: z.boolean().default(true),
  })
  .strict();

const CommandEntrySchema = z
  .object({
    install: z.string().optional(),
    args: z.string().optional(),
    shell: z.boolean().optional(),
    command: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((entry, ctx) => {
    if (
      entry.command !== undefined &&
      (entry.install !== undefined || entry.args !== undefined || entry.shell !== undefined)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'an alias (command = ...) cannot also set install, args or shell',
      });
    }
  });

export type CommandEntryDocument = z.infer<typeof CommandEntrySchema>;

/**
 * `[commands]` holds `default = "<name>"` next to one sub-table per command.
 */
const CommandsSchema = z
  .record(z.union([z.string(), CommandEntrySchema]))
  .transform((raw, ctx) => {
    const entries: Record<string, CommandEntryDocument> = {};
    let defaultName: string | undefined;
    for (const [name, value] of Object.entries(raw)) {
      if (name === 'default') {
        if (typeof value === 'string' && value.length > 0) {
          defaultName = value;
        } else {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [name], message: 'must be a command name' });
        }
      } else if (typeof value === 'string') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [name], message: 'must be a table' });
      } else {
        entries[name] = value;
      }
    }
    if (defaultName === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['default'], message: 'is required' });
      return z.NEVER;
    }
    return { default: defaultName, entries };
  });

const MetaSchema = z
  .object({
    description: z.string().optional(),
    generated_at: z
      .union([z.string(), z.date()])
      .transform((value) => (typeof value === 'string' ? value : value.toISOString()))
      .optional(),
  })
  .strict();

export const ProfileDocumentSchema = z
  .object({
    meta: MetaSchema.optional(),
    container: ContainerSchema.default({}),
    runtime: RuntimeSchema.default({}),
    environment: z.record(z.string()).default(() => ({ TERM: 'xterm-256color' })),
    dependencies: DependenciesSchema.default({}),
    git: GitSchema.default({}),
    shell: ShellSchema.default({}),
    commands: CommandsSchema.optional(),
  })
  .strict();

/** Validated document, defaults applied */
export type ProfileDocument = z.output<typeof ProfileDocumentSchema>;

/** Raw file shape, as written to TOML or JSON */
export type ProfileDocumentInput = z.input<typeof ProfileDocumentSchema>;

/**
 * Render zod issues as one line per problem, keyed by TOML path.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function commandFromDocument(entry: CommandEntryDocument): CommandDefinition {
  if (entry.command !== undefined) {
    return { kind: 'alias', target: entry.command };
  }
  return {
    kind: 'direct',
    args: entry.args ?? '',
    ...(entry.install !== undefined ? { install: entry.install } : {}),
    ...(entry.shell !== undefined ? { shell: entry.shell } : {}),
  };
}

function commandTableFromDocument(commands: ProfileDocument['commands']): CommandTable {
  if (!commands) {
    return createDefaultCommandTable();
  }
  const entries: Record<string, CommandDefinition> = {};
  for (const [name, entry] of Object.entries(commands.entries)) {
    entries[name] = commandFromDocument(entry);
  }
  return { default: commands.default, entries };
}

export function fromProfileDocument(doc: ProfileDocument): Profile {
  const profile: Profile = {
    container: {
      baseImage: doc.container.base_image,
      user: doc.container.user,
      homeDir: doc.container.home_dir,
      workDir: doc.container.work_dir,
    },
    runtime: {
      engine: doc.runtime.engine,
      enableGpu: doc.runtime.enable_gpu,
      gpuDriver: doc.runtime.gpu_driver,
      interactive: doc.runtime.interactive,
      volumes: doc.runtime.volumes.map((v) => ({ ...v })),
      tmpfs: doc.runtime.tmpfs.map((t) => ({ ...t })),
      extraArgs: [...doc.runtime.extra_args],
    },
    environment: { ...doc.environment },
    dependencies: {
      apt: [...doc.dependencies.apt],
      nodejs: { ...doc.dependencies.nodejs },
      githubCli: { enabled: doc.dependencies.github_cli.enabled },
      pip: [...doc.dependencies.pip],
      npm: [...doc.dependencies.npm],
      custom: doc.dependencies.custom.map((c) => ({ name: c.name, commands: [...c.commands] })),
    },
    git: { userName: doc.git.user_name, userEmail: doc.git.user_email },
    shell: { aliases: { ...doc.shell.aliases }, historySearch: doc.shell.history_search },
    commands: commandTableFromDocument(doc.commands),
  };

  if (doc.meta) {
    profile.meta = {
      ...(doc.meta.description !== undefined ? { description: doc.meta.description } : {}),
      ...(doc.meta.generated_at !== undefined ? { generatedAt: doc.meta.generated_at } : {}),
    };
  }

  return profile;
}

function commandToDocument(definition: CommandDefinition): CommandEntryDocument {
  if (definition.kind === 'alias') {
    return { command: definition.target };
  }
  return {
    ...(definition.install !== undefined ? { install: definition.install } : {}),
    args: definition.args,
    ...(definition.shell !== undefined ? { shell: definition.shell } : {}),
  };
}

/**
 * Convert a profile back to its file shape. The result contains no
 * undefined values, so it can be handed straight to a TOML or JSON writer.
 */
export function toProfileDocument(profile: Profile): ProfileDocumentInput {
  const commands: Record<string, string | CommandEntryDocument> = { default: profile.commands.default };
  for (const [name, definition] of Object.entries(profile.commands.entries)) {
    commands[name] = commandToDocument(definition);
  }

  const doc: ProfileDocumentInput = {
    container: {
      base_image: profile.container.baseImage,
      user: profile.container.user,
      home_dir: profile.container.homeDir,
      work_dir: profile.container.workDir,
    },
    runtime: {
      engine: profile.runtime.engine,
      enable_gpu: profile.runtime.enableGpu,
      gpu_driver: profile.runtime.gpuDriver,
      interactive: profile.runtime.interactive,
      volumes: profile.runtime.volumes.map((v) => ({ ...v })),
      tmpfs: profile.runtime.tmpfs.map((t) => ({ ...t })),
      extra_args: [...profile.runtime.extraArgs],
    },
    environment: { ...profile.environment },
    dependencies: {
      apt: [...profile.dependencies.apt],
      nodejs: { ...profile.dependencies.nodejs },
      github_cli: { enabled: profile.dependencies.githubCli.enabled },
      pip: [...profile.dependencies.pip],
      npm: [...profile.dependencies.npm],
      custom: profile.dependencies.custom.map((c) => ({ name: c.name, commands: [...c.commands] })),
    },
    git: { user_name: profile.git.userName, user_email: profile.git.userEmail },
    shell: { aliases: { ...profile.shell.aliases }, history_search: profile.shell.historySearch },
    commands,
  };

  if (profile.meta) {
    doc.meta = {
      ...(profile.meta.description !== undefined ? { description: profile.meta.description } : {}),
      ...(profile.meta.generatedAt !== undefined ? { generated_at: profile.meta.generatedAt } : {}),
    };
  }

  return doc;
}
