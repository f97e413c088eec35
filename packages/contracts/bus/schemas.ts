/**
 * Runtime payload schemas.
 *
 * The bus is typed at compile time, but anything can reach it from an
 * outside bridge (`publishRaw`). Subscribers validate every payload against
 * these schemas and report a "malformed" receive result instead of handing
 * an invalid object to a worker.
 */

import { z } from "zod";
import type { TopicName, TopicPayloads } from "./topics";

export const sampleBatchSchema = z
  .object({
    channels: z.record(z.string(), z.array(z.number().finite())),
    sampleRate: z.number().positive(),
    t0: z.number(),
    t1: z.number(),
  })
  .refine((batch) => batch.t1 >= batch.t0, {
    message: "t1 must not precede t0",
    path: ["t1"],
  });

export const blinkEventSchema = z.object({
  triggered: z.boolean(),
});

export const moveEventSchema = z.object({
  direction: z.union([z.literal(-1), z.literal(0), z.literal(1)]),
});

export const statusSchema = z.object({
  modeCode: z.union([z.literal(0), z.literal(1), z.literal(2)]),
});

export const commandSchema = z.object({
  direction: z.union([z.literal(-1), z.literal(1)]),
});

export const TOPIC_SCHEMAS: { readonly [K in TopicName]: z.ZodType<TopicPayloads[K]> } = {
  "raw-sample": sampleBatchSchema,
  "blink-event": blinkEventSchema,
  "move-event": moveEventSchema,
  status: statusSchema,
  command: commandSchema,
};

export interface PayloadIssue {
  path: string;
  message: string;
}

export type PayloadParseResult<K extends TopicName> =
  | { ok: true; payload: TopicPayloads[K] }
  | { ok: false; issues: PayloadIssue[] };

/**
 * Validate an untrusted payload for a topic.
 */
export function parseTopicPayload<K extends TopicName>(
  topic: K,
  raw: unknown
): PayloadParseResult<K> {
  const schema: z.ZodType<TopicPayloads[K]> = TOPIC_SCHEMAS[topic];
  const result = schema.safeParse(raw);
  if (result.success) {
    return { ok: true, payload: result.data };
  }
  return {
    ok: false,
    issues: result.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
      message: issue.message,
    })),
  };
}
