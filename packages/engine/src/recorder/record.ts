import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { SessionRecordError } from '../types/error.js';

const recordedMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.number().int().nonnegative(),
});

export const sessionRecordSchema = z.object({
  messages: z.array(recordedMessageSchema),
  turnCount: z.number().int().nonnegative(),
  metadata: z.object({
    sessionId: z.string().min(1),
    createdAt: z.number().int().nonnegative(),
    updatedAt: z.number().int().nonnegative(),
    model: z.string(),
    custom: z.record(z.unknown()).default({}),
  }),
});

/** Saved form of an agent session. */
export type SessionRecord = z.output<typeof sessionRecordSchema>;

export async function writeSessionRecord(path: string, record: SessionRecord): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
}

export async function readSessionRecord(path: string): Promise<SessionRecord> {
  const text = await readFile(path, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new SessionRecordError(`Session file ${path} is not valid JSON`, err instanceof Error ? err : undefined);
  }

  const result = sessionRecordSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new SessionRecordError(`Invalid session file ${path}: ${issues.join('; ')}`);
  }
  return result.data;
}
