import { z } from "zod";

import type { JsonValue, RpcRequest } from "./types.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const RequestIdSchema = z.union([z.string(), z.number(), z.null()]);

export const RpcRequestSchema: z.ZodType<RpcRequest, z.ZodTypeDef, unknown> = z.object({
  id: RequestIdSchema,
  method: z.string(),
  params: z
    .array(JsonValueSchema)
    .nullish()
    .transform((value) => value ?? undefined),
});

/** Best-effort id of a frame that failed validation, for the error response. */
export function peekRequestId(value: unknown): JsonValue | undefined {
  if (!value || typeof value !== "object" || !("id" in value)) return undefined;
  const parsed = RequestIdSchema.safeParse(value.id);
  return parsed.success ? parsed.data : undefined;
}
