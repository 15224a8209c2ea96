import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { AxiosRequestConfig } from 'axios';
import { addRepositoriesToWatch, parseRepoList } from './admin/watch-resources.js';
import { describeGroupMembers } from './admin/group-members.js';
import {
  describeRepositoryProperties,
  setRepositoryProperty,
} from './admin/repo-properties.js';
import { describeHttpError } from './http/platform-http.js';
import { createPlatformClients } from './index.js';
import { generateViolationsReport } from './report/report-generator.js';
import { ConnectionConfig, LogLevel, ReportConfig } from './schemas/config.schema.js';
import { Logger } from './utils/logger.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface CliDeps {
  logger?: Logger;
  /** Environment for connection fallbacks */
  env?: Record<string, string | undefined>;
  /** Command output (property lists, group members) */
  print?: (text: string) => void;
  /** Axios transport override */
  adapter?: AxiosRequestConfig['adapter'];
  /** Directory relative paths resolve against */
  cwd?: string;
}

type Command = 'report' | 'group-members' | 'repo-properties' | 'watch-add-repos';

type CliArgs = {
  command: Command;
  positionals: string[];
  flags: Map<string, string | boolean>;
};

export const USAGE = [
  'Usage:',
  '  watch-violations [report] <server_base_url> <access_token> <watch_name> [options]',
  '  watch-violations group-members <server_base_url> <access_token> <group_name>',
  '  watch-violations repo-properties get <server_base_url> <access_token> <repo>',
  '  watch-violations repo-properties set <server_base_url> <access_token> <repo> <key> <value>',
  '  watch-violations watch-add-repos <server_base_url> <access_token> <watch_name> <repo_list_file>',
  '',
  'Report options:',
  '  --format csv|tsv            output delimiter (default csv)',
  '  --layout extended|legacy    column layout (default extended)',
  '  --page-size N               violations per request (default 100)',
  '  --output-dir DIR            where report files are written (default .)',
  '  --keep-intermediate         keep the unenriched violations file',
  '  --log-level LEVEL           debug|info|warn|error (default info)',
  '',
  'watch-add-repos options:',
  '  --backup-dir DIR            where the current watch is saved before updating (default backup)',
  '',
  'server_base_url and access_token may be omitted when XRAY_SERVER_URL and',
  'XRAY_ACCESS_TOKEN are set.',
  '',
  'Example:',
  '  watch-violations https://myorg.example.com my_secret_token prod_watch',
].join('\n');

const COMMANDS: readonly Command[] = [
  'report',
  'group-members',
  'repo-properties',
  'watch-add-repos',
];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

const DEFAULT_BACKUP_DIR = 'backup';

const BOOLEAN_FLAGS = new Set(['keep-intermediate', 'help']);

class UsageError extends Error {}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export function parseArgs(argv: string[]): CliArgs {
  const flags = new Map<string, string | boolean>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? '';
    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }

    const name = token.slice(2);
    if (BOOLEAN_FLAGS.has(name)) {
      flags.set(name, true);
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for --${name}`);
    }

    flags.set(name, value);
    i += 1;
  }

  const first = positionals[0];
  if (first !== undefined && isCommand(first)) {
    return { command: first, positionals: positionals.slice(1), flags };
  }
  return { command: 'report', positionals, flags };
}

/**
 * Positional arguments of a command with the connection pair filled in from
 * the environment when the caller left it out.
 */
function withConnection(
  positionals: string[],
  expected: number,
  env: Record<string, string | undefined>,
): string[] {
  if (positionals.length === expected) return positionals;

  const serverUrl = env['XRAY_SERVER_URL'];
  const accessToken = env['XRAY_ACCESS_TOKEN'];
  if (positionals.length === expected - 2 && serverUrl && accessToken) {
    return [serverUrl, accessToken, ...positionals];
  }

  throw new UsageError(`Expected ${expected} arguments, got ${positionals.length}`);
}

function stringFlag(flags: Map<string, string | boolean>, name: string): string | undefined {
  const value = flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function numberFlag(flags: Map<string, string | boolean>, name: string): number | undefined {
  const value = stringFlag(flags, name);
  return value === undefined ? undefined : Number(value);
}

// ---------------------------------------------------------------------------
// main
// ---------------------------------------------------------------------------

/**
 * Run the CLI and return the process exit code.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const print = deps.print ?? ((text: string) => console.log(text));
  let logger = deps.logger ?? new Logger();

  try {
    const args = parseArgs(argv);
    if (args.flags.get('help') === true) {
      print(USAGE);
      return 0;
    }

    const level = LogLevel.safeParse(stringFlag(args.flags, 'log-level') ?? 'info');
    if (!level.success) {
      throw new UsageError('--log-level must be one of debug, info, warn, error');
    }
    logger = logger.withLevel(level.data);

    return await runCommand(args, {
      env,
      print,
      logger,
      adapter: deps.adapter,
      cwd: deps.cwd ?? process.cwd(),
    });
  } catch (err) {
    if (err instanceof UsageError) {
      logger.error(err.message);
      print(USAGE);
      return 1;
    }
    throw err;
  }
}

async function runCommand(
  args: CliArgs,
  ctx: {
    env: Record<string, string | undefined>;
    print: (text: string) => void;
    logger: Logger;
    adapter?: AxiosRequestConfig['adapter'];
    cwd: string;
  },
): Promise<number> {
  const { flags } = args;
  const { logger } = ctx;

  switch (args.command) {
    case 'report': {
      const [serverUrl, accessToken, watchName] = withConnection(args.positionals, 3, ctx.env);
      const input = {
        serverUrl,
        accessToken,
        watchName,
        format: stringFlag(flags, 'format'),
        layout: stringFlag(flags, 'layout'),
        pageSize: numberFlag(flags, 'page-size'),
        outputDir: path.resolve(ctx.cwd, stringFlag(flags, 'output-dir') ?? '.'),
        keepIntermediate: flags.get('keep-intermediate') === true,
        logLevel: stringFlag(flags, 'log-level'),
      };

      const config = ReportConfig.safeParse(input);
      if (!config.success) {
        logger.error(
          `Invalid arguments: ${config.error.errors
            .map((e) => `${e.path.join('.')}: ${e.message}`)
            .join(', ')}`,
        );
        return 1;
      }

      const clients = createPlatformClients(
        config.data,
        config.data.requestTimeoutMs,
        ctx.adapter,
      );
      const result = await generateViolationsReport({ input, ...clients, logger });
      if (!result.success) {
        logger.error(result.error);
        return 1;
      }
      return 0;
    }

    case 'group-members': {
      const [serverUrl, accessToken, groupName = ''] = withConnection(
        args.positionals,
        3,
        ctx.env,
      );
      const { accessClient } = connect(serverUrl, accessToken, ctx.adapter);
      logger.info(`Fetching members of group '${groupName}' from '${serverUrl}'...`);
      try {
        ctx.print(await describeGroupMembers(accessClient, groupName));
      } catch (err) {
        logger.error(
          `Failed to fetch members for group '${groupName}' (${describeHttpError(err)}).`,
        );
        return 1;
      }
      return 0;
    }

    case 'repo-properties': {
      const [action, ...rest] = args.positionals;
      if (action === 'get') {
        const [serverUrl, accessToken, repoKey = ''] = withConnection(rest, 3, ctx.env);
        const { accessClient } = connect(serverUrl, accessToken, ctx.adapter);
        try {
          ctx.print((await describeRepositoryProperties(accessClient, repoKey)).trimEnd());
        } catch (err) {
          logger.error(
            `Failed to read properties of repository '${repoKey}' (${describeHttpError(err)}).`,
          );
          return 1;
        }
        return 0;
      }
      if (action === 'set') {
        const [serverUrl, accessToken, repoKey = '', key = '', value = ''] = withConnection(
          rest,
          5,
          ctx.env,
        );
        const { accessClient } = connect(serverUrl, accessToken, ctx.adapter);
        try {
          await setRepositoryProperty(accessClient, repoKey, key, value, logger);
        } catch (err) {
          logger.error(
            `Failed to set property on repository '${repoKey}' (${describeHttpError(err)}).`,
          );
          return 1;
        }
        return 0;
      }
      throw new UsageError('repo-properties needs an action: get or set');
    }

    case 'watch-add-repos': {
      const [serverUrl, accessToken, watchName = '', listFile = ''] = withConnection(
        args.positionals,
        4,
        ctx.env,
      );

      let content: string;
      try {
        content = await readFile(path.resolve(ctx.cwd, listFile), 'utf-8');
      } catch {
        logger.error(`ERROR: Repository list file not found at: ${listFile}`);
        return 1;
      }

      const clients = connect(serverUrl, accessToken, ctx.adapter);
      const result = await addRepositoriesToWatch({
        ...clients,
        watchName,
        repoKeys: parseRepoList(content),
        logger,
        backupDir: path.resolve(ctx.cwd, stringFlag(flags, 'backup-dir') ?? DEFAULT_BACKUP_DIR),
      });
      if (!result.success) {
        logger.error(`ERROR: ${result.error}`);
        return 1;
      }
      return 0;
    }
  }
}

function connect(
  serverUrl: string | undefined,
  accessToken: string | undefined,
  adapter: AxiosRequestConfig['adapter'] | undefined,
) {
  const connection = ConnectionConfig.safeParse({ serverUrl, accessToken });
  if (!connection.success) {
    throw new UsageError(
      `Invalid connection: ${connection.error.errors.map((e) => e.message).join(', ')}`,
    );
  }
  return createPlatformClients(connection.data, connection.data.lookupTimeoutMs, adapter);
}
