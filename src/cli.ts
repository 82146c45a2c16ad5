import path from 'node:path';
import readline from 'node:readline/promises';
import { parseArgs } from 'node:util';
import { loadConfig, type AppConfig } from '@/config';
import type { BinariesConfig } from '@/domain/config/types';
import { EmptyLibraryError, LibraryNotFoundError } from '@/domain/errors';
import type { CatalogueStats, LibraryUpdateResult } from '@/domain/library/types';
import type { MetadataPort } from '@/ports/MetadataPort';
import { openCatalogStore } from '@/adapters/catalog/catalogStore';
import { FfmpegMetadataProbe } from '@/adapters/metadata/metadataProbe';
import { LibraryService } from '@/application/library/libraryService';
import { createPlayRuntime, type PlayRuntimeOptions, type Runtime } from '@/runtime/bootstrap';
import { createRuntimePorts, type RuntimePorts } from '@/runtime/ports';
import { registerShutdownHandlers } from '@/runtime/shutdown';
import { createLogger, errorMessage, logManager } from '@/shared/logging/logger';
import { ensureDir, isDirectory } from '@/shared/utils/file';

export const USAGE = `Usage: playroll <command> [options]

Commands:
  list                 List existing music libraries
  play <name>          Start playing music (indexes the library on first use)
  update <name>        Re-index an existing music library
  delete <name>        Delete a music library

Options:
  -p, --path <dir>     Directory of your music library (default: current directory)
  -d, --data <dir>     Directory containing data and config files (default: ~/.playroll)
  -y, --yes            Do not ask for confirmation when deleting
  -h, --help           Show this help`;

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  prompt(question: string): Promise<string>;
}

export interface CliDeps {
  io?: CliIo;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  createProbe?: (binaries: BinariesConfig) => MetadataPort;
  createRuntime?: (options: PlayRuntimeOptions) => Runtime;
  registerShutdown?: (runtime: Runtime) => () => void;
}

interface CommandContext {
  name: string;
  musicDir: string;
  yes: boolean;
  app: AppConfig;
  ports: RuntimePorts;
  io: CliIo;
  deps: CliDeps;
}

const log = createLogger('Cli');

export const consoleIo: CliIo = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
  prompt: async (question) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  },
};

/**
 * Runs one command and resolves with the process exit code.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo;
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(errorMessage(error));
    io.err(USAGE);
    return 1;
  }
  const { values, positionals } = parsed;
  const [command, name, ...extra] = positionals;
  if (values.help) {
    io.out(USAGE);
    return 0;
  }
  if (!command) {
    io.err(USAGE);
    return 1;
  }

  try {
    const app = loadConfig({ dataDir: values.data }, deps.env);
    logManager.configure({
      level: app.env.logLevel,
      json: app.env.logJson,
      stdout: process.stderr,
      stderr: process.stderr,
    });
    const ctx: CommandContext = {
      name: name ?? '',
      musicDir: path.resolve(deps.cwd ?? process.cwd(), values.path ?? '.'),
      yes: values.yes ?? false,
      app,
      ports: createRuntimePorts(app.dataDir),
      io,
      deps,
    };
    if (command === 'list') {
      return await listLibraries(ctx);
    }
    if (!['play', 'update', 'delete'].includes(command)) {
      io.err(`Unknown command "${command}"`);
      io.err(USAGE);
      return 1;
    }
    if (!name || extra.length > 0) {
      io.err(`Usage: playroll ${command} <name>`);
      return 1;
    }
    switch (command) {
      case 'play':
        return await playLibrary(ctx);
      case 'update':
        return await updateLibrary(ctx);
      default:
        return await deleteLibrary(ctx);
    }
  } catch (error) {
    log.debug('command failed', { command, error: error instanceof Error ? error.stack : error });
    io.err(errorMessage(error));
    return 1;
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      path: { type: 'string', short: 'p' },
      data: { type: 'string', short: 'd' },
      yes: { type: 'boolean', short: 'y' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

async function listLibraries(ctx: CommandContext): Promise<number> {
  const names = await ctx.ports.libraries.list();
  if (names.length === 0) {
    ctx.io.out('There are currently no music libraries!');
  } else {
    ctx.io.out(names.join('\n'));
  }
  return 0;
}

async function playLibrary(ctx: CommandContext): Promise<number> {
  const { ports, app, name, io } = ctx;
  if (!(await isDirectory(ctx.musicDir))) {
    io.err(`${ctx.musicDir} is not a valid directory!`);
    return 1;
  }
  await ensureDir(app.dataDir);
  const config = await ports.config.load();
  if (!(await ports.libraries.exists(name))) {
    const { result } = await indexLibrary(ctx, config.binaries, true);
    io.err(describeUpdate(name, result));
  }
  const runtime = (ctx.deps.createRuntime ?? createPlayRuntime)({
    dbPath: ports.libraries.databasePath(name),
    config,
    logFile: app.logFile,
  });
  const unregister = (ctx.deps.registerShutdown ?? registerShutdownHandlers)(runtime);
  try {
    await runtime.run();
  } finally {
    unregister();
  }
  return 0;
}

async function updateLibrary(ctx: CommandContext): Promise<number> {
  const { ports, name, io } = ctx;
  if (!(await ports.libraries.exists(name))) {
    throw new LibraryNotFoundError(name);
  }
  if (!(await isDirectory(ctx.musicDir))) {
    io.err(`${ctx.musicDir} is not a valid directory!`);
    return 1;
  }
  const config = await ports.config.load();
  const { result, stats } = await indexLibrary(ctx, config.binaries, false);
  io.out(describeUpdate(name, result));
  io.out(describeStats(name, stats));
  return 0;
}

async function deleteLibrary(ctx: CommandContext): Promise<number> {
  const { ports, name, io } = ctx;
  if (!(await ports.libraries.exists(name))) {
    throw new LibraryNotFoundError(name);
  }
  if (!ctx.yes) {
    const answer = await io.prompt(`Delete ${name}? y/n `);
    if (answer.trim().toLowerCase() !== 'y') {
      io.err('Delete aborted');
      return 1;
    }
  }
  await ports.libraries.remove(name);
  io.out(`${name} deleted!`);
  return 0;
}

/**
 * Scans the music directory into the named library. A library created by
 * this call is removed again when nothing playable was found.
 */
async function indexLibrary(
  ctx: CommandContext,
  binaries: BinariesConfig,
  created: boolean,
): Promise<{ result: LibraryUpdateResult; stats: CatalogueStats }> {
  const { ports, name } = ctx;
  const store = await openCatalogStore(ports.libraries.databasePath(name));
  const probe = (ctx.deps.createProbe ?? ((b) => new FfmpegMetadataProbe(b)))(binaries);
  try {
    const result = await new LibraryService(store, probe).update(ctx.musicDir);
    return { result, stats: store.getStats() };
  } catch (error) {
    if (created && error instanceof EmptyLibraryError) {
      store.close();
      await ports.libraries.remove(name);
    }
    throw error;
  } finally {
    store.close();
  }
}

export function describeUpdate(name: string, result: LibraryUpdateResult): string {
  return (
    `${name}: ${result.stored} tracks indexed from ${result.found} files` +
    ` (${result.skipped} skipped, ${result.removed} removed)`
  );
}

export function describeStats(name: string, stats: CatalogueStats): string {
  return (
    `${name} now holds ${stats.tracks} tracks` +
    ` (${stats.favourites} favourites, play counts ${stats.minListenCount}-${stats.maxListenCount})`
  );
}
