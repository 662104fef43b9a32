import { z } from "zod";

export const SerializedErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  stack: z.string().optional(),
});

export type SerializedError = z.infer<typeof SerializedErrorSchema>;

/** the single message a worker posts before it finishes */
export const WorkerResultSchema = z.discriminatedUnion("ok", [
  z.object({
    ok: z.literal(true),
    value: z.unknown(),
    heapUsedKb: z.number().optional(),
  }),
  z.object({
    ok: z.literal(false),
    error: SerializedErrorSchema,
    heapUsedKb: z.number().optional(),
  }),
]);

export type WorkerResult = z.infer<typeof WorkerResultSchema>;

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "Error", message: String(error) };
}
