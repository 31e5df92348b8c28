#!/usr/bin/env node

import { Argument, Command } from 'commander';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { init } from './commands/init.js';
import { add } from './commands/add.js';
import { update } from './commands/update.js';
import { deleteCommand } from './commands/delete.js';
import { edit } from './commands/edit.js';
import { list } from './commands/list.js';
import { resolveLogLevel } from './core/config.js';
import { EDITABLE_KEYS } from './core/source-editor.js';
import { log, setLogLevel } from './utils/logger.js';
import { UPDATE_SCHEME_TYPES } from './types/source.js';
import { VERSION } from './version.js';
import type { GlobalOptions } from './core/config.js';
import type { AddOptions } from './commands/add.js';
import type { UpdateOptions } from './commands/update.js';
import type { ListOptions } from './commands/list.js';

type AddFlags = Omit<AddOptions, keyof GlobalOptions | 'tooling' | 'shortHashLength'> & {
  shortHashLength?: string;
};

function fail(err: unknown): never {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('pinsmith')
    .description('Pin external build artifacts to a version and content hash')
    .version(VERSION)
    .option('--source-file <path>', 'Path of the lockfile (default: $PINSMITH_SOURCE_FILE or pinsmith.lock)')
    .option('--log-level <level>', 'off, error, warn, info, debug or trace (default: info)')
    .hook('preAction', () => {
      try {
        setLogLevel(resolveLogLevel(program.opts<GlobalOptions>()));
      } catch (err) {
        fail(err);
      }
    });

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command('init')
    .description('Create an empty lockfile')
    .action(async () => {
      try {
        await init(globals());
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('add')
    .description('Add a new source, resolving its version and hash')
    .addArgument(new Argument('<scheme>', 'Update scheme').choices(UPDATE_SCHEME_TYPES))
    .argument('<artifact-url-template>', 'Artifact URL; {version} (and {branch}) are substituted')
    .option('--name <name>', 'Source name (default: repository name)')
    .option('--initial-version <version>', 'Version to pin (default: latest tag or branch head)')
    .option('--hash <hash>', 'Use this hash instead of prefetching')
    .option('-u, --unpack', 'Unpack the artifact before hashing')
    .option('--pinned', 'Exempt the source from automatic updates')
    .option('--repo-url <url>', 'Repository to check instead of inferring it (git-tags, git-branch)')
    .option('--tag-prefix <prefix>', 'Only consider tags with this prefix (git-tags)')
    .option('--branch <branch>', 'Branch to follow (git-branch)')
    .option('--short-hash-length <n>', 'Commit hash characters in the version (git-branch)')
    .action(async (scheme: string, artifactUrlTemplate: string, options: AddFlags) => {
      try {
        await add(scheme, artifactUrlTemplate, {
          ...globals(),
          ...options,
          shortHashLength:
            options.shortHashLength === undefined
              ? undefined
              : Number(options.shortHashLength),
        });
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('update [names...]')
    .description('Check sources for new versions and refresh their hashes')
    .option('--refetch', 'Prefetch even when the latest version was already checked')
    .option('--force', 'Also update pinned sources')
    .option('--pin', 'Pin the selected sources instead of updating them')
    .option('--unpin', 'Unpin the selected sources instead of updating them')
    .option('--show-updated', 'Print the version changes on stdout')
    .option('--json', 'Print the version changes as JSON')
    .action(async (names: string[], options: Omit<UpdateOptions, 'tooling'>) => {
      try {
        await update(names, { ...globals(), ...options });
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('delete <names...>')
    .description('Remove sources (nothing is removed if any name is unknown)')
    .action(async (names: string[]) => {
      try {
        await deleteCommand(names, globals());
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('edit <name> <key> <value>')
    .description(`Change one field of a source (${EDITABLE_KEYS.join(', ')})`)
    .action(async (name: string, key: string, value: string) => {
      try {
        await edit(name, key, value, globals());
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('list')
    .description('List the sources in the lockfile')
    .option('--json', 'Output as JSON')
    .action(async (options: ListOptions) => {
      try {
        await list({ ...globals(), ...options });
      } catch (err) {
        fail(err);
      }
    });

  return program;
}

// Only parse when run as CLI entry point (ESM check with symlink resolution)
const selfUrl = import.meta.url;
let isDirectRun = false;
try {
  if (process.argv[1]) {
    isDirectRun = selfUrl === pathToFileURL(realpathSync(process.argv[1])).href;
  }
} catch {
  // Non-standard invocation (missing/virtual argv path): do not parse
}
if (isDirectRun) {
  await buildProgram().parseAsync();
}
