#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { stdin as input, stdout as output } from 'node:process';
import readline from 'node:readline/promises';
import { pathToFileURL } from 'node:url';

import { createSession } from './agent.js';
import { friendlyError, parseCli } from './cli/args.js';
import { runRepl } from './cli/repl.js';
import { OpenAIClient } from './client.js';
import { loadConfig } from './config.js';
import { ApprovalGate } from './confirm/gate.js';
import { HeadlessConfirmProvider } from './confirm/headless.js';
import { TerminalConfirmProvider } from './confirm/terminal.js';
import { LibreOfficeEngine } from './documents/recalc.js';
import { MCPManager } from './mcp.js';
import { SessionStore } from './session/store.js';
import { banner, err, makeStyler, resolveColorMode, warn } from './term.js';
import { buildRegistry } from './tools/index.js';
import { MutationPipeline } from './tools/mutation.js';
import type { ConfirmationProvider } from './types.js';
import { newSessionId, PKG_VERSION } from './utils.js';

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { opts, cli } = parseCli(argv);
  const { config } = await loadConfig({ configPath: opts.config, cli });
  const S = makeStyler(resolveColorMode('auto').enabled);
  const interactive = Boolean(input.isTTY);

  const rl = readline.createInterface({ input, output, terminal: interactive });
  const provider: ConfirmationProvider =
    interactive || config.approval_mode !== 'prompt'
      ? new TerminalConfirmProvider(rl, { styler: S })
      : new HeadlessConfirmProvider();
  const gate = new ApprovalGate(config.approval_mode, provider);
  const pipeline = new MutationPipeline(gate);

  let mcp: MCPManager | undefined;
  if (config.mcp_filesystem) {
    mcp = new MCPManager({
      root: config.mcp_filesystem_root ?? config.workspace_root,
      callTimeoutMs: config.mcp_call_timeout_sec * 1000,
    });
    await mcp.init();
    for (const w of mcp.getWarnings()) console.error(warn(w, S));
  }

  const store = new SessionStore(config.db_path);
  try {
    const registry = buildRegistry(pipeline, mcp, { formulaEngine: new LibreOfficeEngine(config.soffice_path) });
    const sessionId = opts.sessionId ?? newSessionId();
    const resumed = opts.sessionId !== undefined && store.exists(opts.sessionId);
    const client = new OpenAIClient({
      endpoint: config.endpoint,
      apiKey: config.api_key,
      verbose: config.verbose,
      responseTimeoutSec: config.response_timeout,
    });
    const session = createSession({ config, store, sessionId, registry, client });

    console.log(banner(`redline ${PKG_VERSION}`, S));
    console.log(
      S.dim(
        `session ${session.id} · model ${config.model} · workspace ${config.workspace_root} · approval ${config.approval_mode}`
      )
    );
    if (!interactive && config.approval_mode === 'prompt') {
      console.error(warn('stdin is not a terminal; proposed changes will be declined (use --auto-approve)', S));
    }
    console.log(S.dim('Type "help" for commands.'));

    await runRepl({ session, config, rl, styler: S, resumed });
  } finally {
    rl.close();
    store.close();
    await mcp?.close();
  }
  return 0;
}

const entry = process.argv[1];
// Run when executed (directly or through the npm bin symlink), not when imported.
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      console.error(err(friendlyError(e), makeStyler(resolveColorMode('auto').enabled)));
      process.exitCode = 1;
    });
}
