export type ContentBlock =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'image'; readonly data: string; readonly mimeType: string }
  | { readonly type: 'resource'; readonly uri: string; readonly text?: string };

export type ToolInvocation = {
  readonly server: string | null;
  readonly tool: string;
  readonly arguments: unknown;
};

export type ToolCallResult =
  | { readonly ok: true; readonly content: ReadonlyArray<ContentBlock> }
  | { readonly ok: false; readonly error: string };

export type PlanStepStatus = 'pending' | 'in_progress' | 'completed';

export type PlanStep = {
  readonly step: string;
  readonly status: PlanStepStatus;
};

export type SessionConfiguredEvent = {
  readonly type: 'session_configured';
  readonly sessionId: string;
  readonly model: string;
};

export type AgentMessageEvent = {
  readonly type: 'agent_message';
  readonly message: string;
};

export type AgentMessageDeltaEvent = {
  readonly type: 'agent_message_delta';
  readonly delta: string;
};

export type AgentReasoningEvent = {
  readonly type: 'agent_reasoning';
  readonly text: string;
};

export type ToolCallBeginEvent = {
  readonly type: 'tool_call_begin';
  readonly callId: string;
  readonly invocation: ToolInvocation;
};

export type ToolCallEndEvent = {
  readonly type: 'tool_call_end';
  readonly callId: string;
  readonly invocation: ToolInvocation;
  readonly result: ToolCallResult;
};

export type ExecCommandBeginEvent = {
  readonly type: 'exec_command_begin';
  readonly callId: string;
  readonly command: ReadonlyArray<string>;
  readonly cwd: string;
};

export type ExecCommandOutputDeltaEvent = {
  readonly type: 'exec_command_output_delta';
  readonly callId: string;
  readonly stream: 'stdout' | 'stderr';
  readonly chunk: Uint8Array;
};

export type ExecCommandEndEvent = {
  readonly type: 'exec_command_end';
  readonly callId: string;
  readonly exitCode: number;
};

export type TaskStartedEvent = {
  readonly type: 'task_started';
};

export type TaskCompleteEvent = {
  readonly type: 'task_complete';
  readonly lastAgentMessage: string | null;
};

export type PlanUpdateEvent = {
  readonly type: 'plan_update';
  readonly explanation: string | null;
  readonly plan: ReadonlyArray<PlanStep>;
};

export type ErrorEvent = {
  readonly type: 'error';
  readonly message: string;
};

export type TurnAbortedEvent = {
  readonly type: 'turn_aborted';
  readonly reason: string;
};

export type ShutdownCompleteEvent = {
  readonly type: 'shutdown_complete';
};

/** An event a transport received but could not classify. */
export type UnrecognizedEvent = {
  readonly type: 'unrecognized';
  readonly name: string;
  readonly payload: unknown;
};

export type BackendEvent =
  | SessionConfiguredEvent
  | AgentMessageEvent
  | AgentMessageDeltaEvent
  | AgentReasoningEvent
  | ToolCallBeginEvent
  | ToolCallEndEvent
  | ExecCommandBeginEvent
  | ExecCommandOutputDeltaEvent
  | ExecCommandEndEvent
  | TaskStartedEvent
  | TaskCompleteEvent
  | PlanUpdateEvent
  | ErrorEvent
  | TurnAbortedEvent
  | ShutdownCompleteEvent
  | UnrecognizedEvent;

export type BackendEventType = BackendEvent['type'];
