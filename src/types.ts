export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; tool_calls?: ToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string };

export type ToolSchema = {
  type: 'function';
  function: {
    name: string;
    description?: string;
    // OpenAI style JSON schema
    parameters: Record<string, unknown>;
  };
};

export type ToolCall = {
  id: string;
  index?: number;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
};

export type Usage = {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
};

/** One `data:` payload of a streamed /chat/completions response. */
export type ChatCompletionChunk = {
  id?: string;
  model?: string;
  choices?: Array<{
    index?: number;
    delta?: {
      role?: 'assistant';
      content?: string | null;
      tool_calls?: Array<{
        index?: number;
        id?: string;
        type?: 'function';
        function?: { name?: string; arguments?: string };
      }>;
    };
    finish_reason?: string | null;
  }>;
  usage?: Usage | null;
};

/** Events produced by the model collaborator while one request streams. */
export type ModelEvent =
  | { type: 'text'; text: string }
  | { type: 'tool_call'; call: ToolCallRequest }
  | { type: 'done'; finishReason: string | null; usage?: Usage };

export interface ModelClient {
  streamChat(opts: {
    model: string;
    messages: ChatMessage[];
    tools?: ToolSchema[];
    temperature?: number;
    max_tokens?: number;
    signal?: AbortSignal;
  }): AsyncGenerator<ModelEvent>;
}

// ── Session data ─────────────────────────────────────────────────────────

export type ToolCallRequest = {
  id: string;
  name: string;
  /** Raw JSON text as the model produced it; validated at dispatch. */
  arguments: string;
};

export type ToolResult = {
  callId: string;
  ok: boolean;
  content: string;
};

export type Turn =
  | { kind: 'user'; at: string; text: string }
  | { kind: 'model_text'; at: string; text: string }
  | { kind: 'tool_call'; at: string; call: ToolCallRequest }
  | { kind: 'tool_result'; at: string; result: ToolResult }
  | { kind: 'cancelled'; at: string; reason: string };

export type TurnKind = Turn['kind'];

export type Session = {
  id: string;
  createdAt: string;
  dbPath: string;
  turns: Turn[];
};

// ── Approvals ────────────────────────────────────────────────────────────

export type ApprovalMode = 'prompt' | 'auto' | 'off';

export type Verdict = 'pending' | 'approved' | 'rejected';

export type ChangeTarget = {
  /** Absolute, confined path the change was read from. */
  path: string;
  /** Absolute, confined path the change will be written to. */
  outputPath: string;
  /** Sheet, cell or paragraph the change is about, when narrower than the file. */
  anchor?: string;
};

export type ChangeDescriptor = {
  id: string;
  tool: string;
  target: ChangeTarget;
  before: string;
  after: string;
  diff: string;
  summary: string;
  /** Why the model wants the change, when it said. */
  reason?: string;
  verdict: Verdict;
};

export type ConfirmRequest = {
  tool: string;
  summary: string;
  path: string;
  anchor?: string;
  reason?: string;
  diff: string;
};

export interface ConfirmationProvider {
  /** Resolve true to apply the change. Anything else leaves the document untouched. */
  confirm(req: ConfirmRequest, signal?: AbortSignal): Promise<boolean>;
  /** Shown in auto mode, where the change is applied without asking. */
  notify?(req: ConfirmRequest): void;
}

// ── Configuration ────────────────────────────────────────────────────────

export type RedlineConfig = {
  endpoint: string;
  model: string;
  api_key?: string;
  db_path: string;
  workspace_root: string;
  approval_mode: ApprovalMode;
  show_tool_calls: boolean;
  mcp_filesystem: boolean;
  mcp_filesystem_root?: string;
  mcp_call_timeout_sec: number;
  max_tokens: number;
  temperature: number;
  context_window: number;
  max_iterations: number;
  response_timeout: number;
  max_tool_output_chars: number;
  /** LibreOffice binary used by recalculate_formulas. */
  soffice_path: string;
  verbose: boolean;
};
