/**
 * Command-line flags, their mapping onto config keys, and user-facing error text.
 */

import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';

import { ClientError } from '../client/error-utils.js';
import { SessionStoreError } from '../session/store.js';
import type { RedlineConfig } from '../types.js';
import { errorMessage, PKG_VERSION } from '../utils.js';

/** Convert raw errors into user-friendly messages (no stack traces). */
export function friendlyError(e: unknown): string {
  const msg = errorMessage(e);
  if (e instanceof SessionStoreError) {
    return `Session store failure: ${msg}. The session log cannot be trusted; exiting.`;
  }
  if (msg.includes('Connection timeout') || msg.includes('ECONNREFUSED') || msg.startsWith('Cannot reach')) {
    return `Connection failed: ${msg}. Check --endpoint and that the model server is reachable.`;
  }
  if (e instanceof ClientError && e.status === 401) {
    return `Authentication failed (401). Set REDLINE_API_KEY or OPENAI_API_KEY. (${msg})`;
  }
  if (e instanceof ClientError && (e.status === 429 || e.status === 503)) {
    return `The model service is busy (${e.status}); try again in a few seconds. (${msg})`;
  }
  if (e instanceof Error && e.name === 'AbortError') {
    return 'Aborted.';
  }
  return msg;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('expected a positive integer');
  return n;
}

const CliOptionsSchema = z.object({
  sessionId: z.string().optional(),
  dbPath: z.string().optional(),
  model: z.string().optional(),
  endpoint: z.string().optional(),
  workspaceRoot: z.string().optional(),
  approval: z.boolean().default(true),
  autoApprove: z.boolean().optional(),
  toolCalls: z.boolean().default(true),
  mcpFilesystem: z.boolean().default(true),
  mcpFilesystemRoot: z.string().optional(),
  maxIterations: z.number().int().positive().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function buildProgram(): Command {
  return new Command()
    .name('redline')
    .description('Inspect and edit PDF, Word and Excel documents by asking for it in plain language.')
    .version(PKG_VERSION, '-V, --version')
    .option('--session-id <id>', 'resume (or create) this session')
    .option('--db-path <dir>', 'session log directory')
    .option('--model <name>', 'model name sent to the endpoint')
    .option('--endpoint <url>', 'OpenAI-compatible API base URL')
    .option('--workspace-root <path>', 'directory edits are confined to')
    .option('--no-approval', 'apply every change without asking')
    .option('--auto-approve', 'show each change, then apply it without asking')
    .option('--no-tool-calls', 'hide tool call notices (dispatch is unchanged)')
    .option('--no-mcp-filesystem', 'do not start the MCP filesystem server')
    .option('--mcp-filesystem-root <path>', 'root directory for the MCP filesystem server')
    .option('--max-iterations <n>', 'model steps allowed per request', positiveInt)
    .option('--config <path>', 'config file (default ~/.config/redline/config.json)')
    .option('--verbose', 'log model requests to stderr')
    .addHelpText(
      'after',
      `
REPL commands:
  help       show this list
  history    print the turns of the current session
  session    show the session id and log directory
  exit, quit leave (Ctrl-D works too; Ctrl-C cancels a running request)

Environment:
  REDLINE_WORKSPACE_ROOT, REDLINE_AUTO_APPROVE, REDLINE_ENDPOINT, REDLINE_MODEL,
  REDLINE_API_KEY (or OPENAI_API_KEY), REDLINE_DB_PATH, REDLINE_MAX_ITERATIONS,
  REDLINE_CONTEXT_WINDOW, REDLINE_VERBOSE`
    );
}

/**
 * Only flags the user actually gave become config overrides, so an absent flag never
 * hides an environment variable or config file value.
 */
export function cliToConfig(opts: CliOptions): Partial<RedlineConfig> {
  const out: Partial<RedlineConfig> = {};
  if (opts.model) out.model = opts.model;
  if (opts.endpoint) out.endpoint = opts.endpoint;
  if (opts.dbPath) out.db_path = opts.dbPath;
  if (opts.workspaceRoot) out.workspace_root = opts.workspaceRoot;
  if (opts.mcpFilesystemRoot) out.mcp_filesystem_root = opts.mcpFilesystemRoot;
  if (opts.maxIterations !== undefined) out.max_iterations = opts.maxIterations;
  if (opts.verbose) out.verbose = true;
  if (!opts.toolCalls) out.show_tool_calls = false;
  if (!opts.mcpFilesystem) out.mcp_filesystem = false;
  // --no-approval wins over --auto-approve.
  if (!opts.approval) out.approval_mode = 'off';
  else if (opts.autoApprove) out.approval_mode = 'auto';
  return out;
}

export function parseCli(
  argv: string[],
  program: Command = buildProgram()
): { opts: CliOptions; cli: Partial<RedlineConfig> } {
  program.parse(argv, { from: 'user' });
  const opts = CliOptionsSchema.parse(program.opts());
  return { opts, cli: cliToConfig(opts) };
}
