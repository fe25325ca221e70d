/**
 * System prompt, composed from small sections so the CLI can drop or replace one
 * (e.g. when the MCP filesystem tools are not available).
 */

export interface PromptSection {
  name: string;
  /** Return an empty string to skip the section. */
  build(ctx: PromptContext): string;
}

export interface PromptContext {
  workspaceRoot: string;
  /** Names of the registered tools. */
  toolNames: string[];
  approvalMode: 'prompt' | 'auto' | 'off';
}

const identity: PromptSection = {
  name: 'identity',
  build: () =>
    'You are a document assistant working in a terminal. You read and edit PDF, Word (.docx) and ' +
    'Excel (.xlsx) files in the user\'s workspace using the provided tools.',
};

const workspace: PromptSection = {
  name: 'workspace',
  build: (ctx) =>
    `Workspace root: ${ctx.workspaceRoot}\n` +
    'Use paths relative to the workspace root. Edits outside it are refused.',
};

const rules: PromptSection = {
  name: 'rules',
  build: () => `Rules:
- Read before you edit: extract or search the document first so you use its exact wording.
- Large documents are paginated. Use search tools or page/row/paragraph ranges instead of reading everything.
- directed_search_document ranks passages of any document type; read the hits in full with retrieve_document_segments.
- Make one focused edit per tool call and explain in "description" why the change is needed.
- Pass output_path when the user asks for a copy instead of changing the original.
- PDFs are read-only. If the user wants a PDF changed, say so and suggest editing the source document.
- Tool results starting with "ERROR:" describe what went wrong; fix the arguments instead of repeating the call.`,
};

const approvals: PromptSection = {
  name: 'approvals',
  build: (ctx) => {
    if (ctx.approvalMode !== 'prompt') return '';
    return (
      'Every edit is shown to the user as a diff and needs their approval. If a result says the change ' +
      'was declined, nothing was written: do not retry it unless the user asks again, possibly with different wording.'
    );
  },
};

const filesystem: PromptSection = {
  name: 'filesystem',
  build: (ctx) => {
    const fsTools = ctx.toolNames.filter((n) => n.startsWith('fs_'));
    if (!fsTools.length) return '';
    return `Filesystem tools (${fsTools.join(', ')}) list and move files; prefer the document tools for document content.`;
  },
};

export const DEFAULT_SECTIONS: readonly PromptSection[] = [identity, workspace, rules, approvals, filesystem];

export function buildSystemPrompt(ctx: PromptContext, sections: readonly PromptSection[] = DEFAULT_SECTIONS): string {
  return sections
    .map((s) => s.build(ctx).trim())
    .filter(Boolean)
    .join('\n\n');
}
