import fs from 'node:fs/promises';
import path from 'node:path';

import type { ApprovalMode, RedlineConfig } from './types.js';
import { configDir, errorCode, stateDir } from './utils.js';

export const DEFAULTS: RedlineConfig = {
  endpoint: 'https://api.openai.com/v1',
  model: 'gpt-4.1',
  db_path: path.join(stateDir(), 'sessions'),
  workspace_root: process.cwd(),
  approval_mode: 'prompt',
  show_tool_calls: true,
  mcp_filesystem: true,
  mcp_call_timeout_sec: 30,
  max_tokens: 4096,
  temperature: 0.2,
  context_window: 128000,
  max_iterations: 20,
  response_timeout: 600,
  max_tool_output_chars: 50_000,
  soffice_path: 'soffice',
  verbose: false,
};

export function defaultConfigPath() {
  return path.join(configDir(), 'config.json');
}

export function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

function parseNum(v: string | undefined): number | undefined {
  if (v == null || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

export function parseApprovalMode(v: unknown): ApprovalMode | undefined {
  if (typeof v !== 'string') return undefined;
  const lower = v.trim().toLowerCase();
  if (lower === 'prompt' || lower === 'auto' || lower === 'off') return lower;
  return undefined;
}

function pickString(v: unknown): string | undefined {
  return typeof v === 'string' && v.trim() ? v : undefined;
}

function pickNumber(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function pickBool(v: unknown): boolean | undefined {
  if (typeof v === 'boolean') return v;
  if (typeof v === 'string') return parseBool(v);
  return undefined;
}

/** Keep only recognised keys of a parsed config.json, with the right primitive types. */
function fromFile(raw: unknown): Partial<RedlineConfig> {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return {};
  const r = new Map(Object.entries(raw));
  return {
    endpoint: pickString(r.get('endpoint')),
    model: pickString(r.get('model')),
    api_key: pickString(r.get('api_key')),
    db_path: pickString(r.get('db_path')),
    workspace_root: pickString(r.get('workspace_root')),
    approval_mode: parseApprovalMode(r.get('approval_mode')),
    show_tool_calls: pickBool(r.get('show_tool_calls')),
    mcp_filesystem: pickBool(r.get('mcp_filesystem')),
    mcp_filesystem_root: pickString(r.get('mcp_filesystem_root')),
    mcp_call_timeout_sec: pickNumber(r.get('mcp_call_timeout_sec')),
    max_tokens: pickNumber(r.get('max_tokens')),
    temperature: pickNumber(r.get('temperature')),
    context_window: pickNumber(r.get('context_window')),
    max_iterations: pickNumber(r.get('max_iterations')),
    response_timeout: pickNumber(r.get('response_timeout')),
    max_tool_output_chars: pickNumber(r.get('max_tool_output_chars')),
    soffice_path: pickString(r.get('soffice_path')),
    verbose: pickBool(r.get('verbose')),
  };
}

function fromEnv(env: NodeJS.ProcessEnv): Partial<RedlineConfig> {
  const autoApprove = parseBool(env.REDLINE_AUTO_APPROVE);
  return {
    endpoint: env.REDLINE_ENDPOINT,
    model: env.REDLINE_MODEL,
    api_key: env.REDLINE_API_KEY ?? env.OPENAI_API_KEY,
    db_path: env.REDLINE_DB_PATH,
    workspace_root: env.REDLINE_WORKSPACE_ROOT,
    approval_mode: autoApprove ? 'auto' : parseApprovalMode(env.REDLINE_APPROVAL_MODE),
    show_tool_calls: parseBool(env.REDLINE_SHOW_TOOL_CALLS),
    mcp_filesystem: parseBool(env.REDLINE_MCP_FILESYSTEM),
    mcp_filesystem_root: env.REDLINE_MCP_FILESYSTEM_ROOT,
    max_tokens: parseNum(env.REDLINE_MAX_TOKENS),
    temperature: parseNum(env.REDLINE_TEMPERATURE),
    context_window: parseNum(env.REDLINE_CONTEXT_WINDOW),
    max_iterations: parseNum(env.REDLINE_MAX_ITERATIONS),
    response_timeout: parseNum(env.REDLINE_RESPONSE_TIMEOUT),
    soffice_path: env.REDLINE_SOFFICE_PATH,
    verbose: parseBool(env.REDLINE_VERBOSE),
  };
}

function pick<K extends keyof RedlineConfig>(
  key: K,
  layers: Partial<RedlineConfig>[]
): RedlineConfig[K] | undefined {
  for (const layer of layers) {
    const v = layer[key];
    if (v !== undefined && v !== '') return v;
  }
  return undefined;
}

/**
 * Resolve the runtime config: defaults < config file < environment < CLI flags.
 * The result is built once at startup and handed to constructors; nothing else reads env.
 */
export async function loadConfig(opts: {
  configPath?: string;
  cli?: Partial<RedlineConfig>;
  env?: NodeJS.ProcessEnv;
}): Promise<{ config: RedlineConfig; configPath: string }> {
  const configPath = opts.configPath ?? defaultConfigPath();
  const env = opts.env ?? process.env;

  let fileCfg: Partial<RedlineConfig> = {};
  try {
    const raw = await fs.readFile(configPath, 'utf8');
    if (raw.trim().length) {
      fileCfg = fromFile(JSON.parse(raw));
    }
  } catch (e: unknown) {
    if (errorCode(e) !== 'ENOENT') throw e;
  }

  // Highest precedence first.
  const layers = [opts.cli ?? {}, fromEnv(env), fileCfg];
  const value = <K extends keyof RedlineConfig>(key: K): RedlineConfig[K] =>
    pick(key, layers) ?? DEFAULTS[key];

  const merged: RedlineConfig = {
    endpoint: value('endpoint').replace(/\/+$/, ''),
    model: value('model'),
    api_key: pick('api_key', layers),
    db_path: value('db_path'),
    workspace_root: value('workspace_root'),
    approval_mode: value('approval_mode'),
    show_tool_calls: value('show_tool_calls'),
    mcp_filesystem: value('mcp_filesystem'),
    mcp_filesystem_root: pick('mcp_filesystem_root', layers),
    mcp_call_timeout_sec: value('mcp_call_timeout_sec'),
    max_tokens: value('max_tokens'),
    temperature: value('temperature'),
    context_window: value('context_window'),
    max_iterations: value('max_iterations'),
    response_timeout: value('response_timeout'),
    max_tool_output_chars: value('max_tool_output_chars'),
    soffice_path: value('soffice_path'),
    verbose: value('verbose'),
  };

  // Workspace root falls back to the MCP filesystem root when only that was given.
  if (!pick('workspace_root', layers) && merged.mcp_filesystem_root) {
    merged.workspace_root = merged.mcp_filesystem_root;
  }

  merged.workspace_root = path.resolve(merged.workspace_root);
  merged.db_path = path.resolve(merged.db_path);
  if (merged.mcp_filesystem_root) merged.mcp_filesystem_root = path.resolve(merged.mcp_filesystem_root);
  merged.max_iterations = Math.max(1, Math.floor(merged.max_iterations));
  merged.max_tool_output_chars = Math.max(1000, Math.floor(merged.max_tool_output_chars));

  return { config: merged, configPath };
}
