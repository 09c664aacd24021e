import { z } from 'zod';
import { NetworkError } from '../types/error.js';
import type { BackendEvent, ToolInvocation } from '../types/event.js';

const contentBlockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('image'), data: z.string(), mimeType: z.string() }),
  z.object({ type: z.literal('resource'), uri: z.string(), text: z.string().optional() }),
]);

const invocationSchema = z
  .object({
    server: z.string().nullable().default(null),
    tool: z.string(),
    arguments: z.unknown(),
  })
  .transform((invocation): ToolInvocation => ({
    server: invocation.server,
    tool: invocation.tool,
    arguments: invocation.arguments ?? null,
  }));

const toolCallResultSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), content: z.array(contentBlockSchema) }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

const wireEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('session_configured'), sessionId: z.string(), model: z.string() }),
  z.object({ type: z.literal('agent_message'), message: z.string() }),
  z.object({ type: z.literal('agent_message_delta'), delta: z.string() }),
  z.object({ type: z.literal('agent_reasoning'), text: z.string() }),
  z.object({ type: z.literal('tool_call_begin'), callId: z.string(), invocation: invocationSchema }),
  z.object({
    type: z.literal('tool_call_end'),
    callId: z.string(),
    invocation: invocationSchema,
    result: toolCallResultSchema,
  }),
  z.object({
    type: z.literal('exec_command_begin'),
    callId: z.string(),
    command: z.array(z.string()),
    cwd: z.string(),
  }),
  z.object({
    type: z.literal('exec_command_output_delta'),
    callId: z.string(),
    stream: z.enum(['stdout', 'stderr']),
    // base64 on the wire
    chunk: z.string().transform((value) => new Uint8Array(Buffer.from(value, 'base64'))),
  }),
  z.object({ type: z.literal('exec_command_end'), callId: z.string(), exitCode: z.number().int() }),
  z.object({ type: z.literal('task_started') }),
  z.object({ type: z.literal('task_complete'), lastAgentMessage: z.string().nullable().default(null) }),
  z.object({
    type: z.literal('plan_update'),
    explanation: z.string().nullable().default(null),
    plan: z.array(
      z.object({
        step: z.string(),
        status: z.enum(['pending', 'in_progress', 'completed']),
      }),
    ),
  }),
  z.object({ type: z.literal('error'), message: z.string() }),
  z.object({ type: z.literal('turn_aborted'), reason: z.string() }),
  z.object({ type: z.literal('shutdown_complete') }),
]);

const KNOWN_TYPES: ReadonlySet<string> = new Set(
  wireEventSchema.options.map((option) => option.shape.type.value),
);

/**
 * Decodes one JSON event received from a remote backend.
 *
 * Events whose `type` is not known are passed on as `unrecognized` so that
 * newer backends keep working; a known event with an invalid shape is a
 * stream fault.
 */
export function decodeWireEvent(data: string): BackendEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (err) {
    throw new NetworkError(
      `Malformed event payload: ${data.slice(0, 200)}`,
      null,
      false,
      null,
      err instanceof Error ? err : undefined,
    );
  }

  const type = typeof raw === 'object' && raw !== null && 'type' in raw ? raw.type : undefined;
  if (typeof type !== 'string' || !KNOWN_TYPES.has(type)) {
    return { type: 'unrecognized', name: typeof type === 'string' ? type : '', payload: raw };
  }

  const parsed = wireEventSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new NetworkError(`Invalid '${type}' event: ${issues.join('; ')}`);
  }

  return parsed.data;
}
