import { LibreOfficeEngine, type FormulaEngine } from '../documents/recalc.js';
import type { MCPManager } from '../mcp.js';
import { DOCX_TOOLS } from './docx-tools.js';
import type { MutationPipeline } from './mutation.js';
import { PDF_TOOLS } from './pdf-tools.js';
import { ToolRegistry, type ToolDefinition } from './registry.js';
import { SEARCH_TOOLS } from './search-tools.js';
import { xlsxTools } from './xlsx-tools.js';

export type DocumentToolOptions = {
  /** Engine behind recalculate_formulas; LibreOffice on the PATH by default. */
  formulaEngine?: FormulaEngine;
};

export function documentTools(opts: DocumentToolOptions = {}): ToolDefinition<unknown>[] {
  return [
    ...DOCX_TOOLS,
    ...xlsxTools(opts.formulaEngine ?? new LibreOfficeEngine()),
    ...PDF_TOOLS,
    ...SEARCH_TOOLS,
  ];
}

/** Build the startup registry: document tools, then any MCP tools. Frozen on return. */
export function buildRegistry(pipeline: MutationPipeline, mcp?: MCPManager, opts: DocumentToolOptions = {}): ToolRegistry {
  const registry = new ToolRegistry(pipeline);
  for (const def of documentTools(opts)) registry.register(def);
  for (const def of mcp?.toolDefinitions() ?? []) {
    if (registry.has(def.name)) {
      console.error(`[mcp] skipped '${def.name}' (conflicts with a document tool)`);
      continue;
    }
    registry.register(def);
  }
  registry.freeze();
  return registry;
}
