import { z } from "zod";
import { BatchFileResultSchema } from "../store/batchState.js";

export const VideoTaskSchema = z.object({
  filePath: z.string(),
  outputDir: z.string(),
  model: z.string(),
  outputFormat: z.string(),
});

export const WorkerRequestSchema = z.object({
  id: z.number().int(),
  task: VideoTaskSchema,
});

export const WorkerResponseSchema = z.discriminatedUnion("ok", [
  z.object({ id: z.number().int(), ok: z.literal(true), result: BatchFileResultSchema }),
  z.object({ id: z.number().int(), ok: z.literal(false), error: z.string() }),
]);

export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;
export type WorkerResponse = z.infer<typeof WorkerResponseSchema>;
