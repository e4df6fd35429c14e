import { z } from "zod";
import { errorMessage } from "../errors/catalog.js";
import { scorePartition } from "./engine.js";

const IndexedFileSchema = z.object({
  path: z.string(),
  name: z.string(),
  discoveredAt: z.string(),
});

export const ScoreRequestSchema = z.object({
  id: z.number().int(),
  task: z.object({
    query: z.string(),
    threshold: z.number(),
    extensions: z.array(z.string()),
    files: z.array(IndexedFileSchema),
  }),
});

export const ScoreResponseSchema = z.union([
  z.object({
    id: z.number().int(),
    results: z.array(
      z.object({
        file: IndexedFileSchema,
        normalizedName: z.string(),
        score: z.number(),
      }),
    ),
  }),
  z.object({
    id: z.number().int(),
    error: z.string(),
  }),
]);

export type ScoreRequest = z.infer<typeof ScoreRequestSchema>;
export type ScoreResponse = z.infer<typeof ScoreResponseSchema>;

/** Id used when a request is too malformed to carry its own. */
export const UNKNOWN_REQUEST_ID = -1;

/** Worker-side handler: one request in, one response out. Never throws. */
export function handleScoreRequest(message: unknown): ScoreResponse {
  const parsed = ScoreRequestSchema.safeParse(message);
  if (!parsed.success) {
    return { id: UNKNOWN_REQUEST_ID, error: "Malformed score request" };
  }

  const { id, task } = parsed.data;
  try {
    return { id, results: scorePartition(task) };
  } catch (err) {
    return { id, error: errorMessage(err) };
  }
}
