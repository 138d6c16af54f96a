import { z } from 'zod';

/**
 * Stage checkpoints
 *
 * Resumption data written by the worker as each stage makes progress.
 * Payloads are validated on read; a document that no longer matches its
 * schema reads as "no checkpoint".
 */

export const audioSegmentSchema = z.object({
  index: z.number().int().min(0),
  path: z.string(),
  start: z.number().min(0),
  duration: z.number().min(0),
});
export type AudioSegment = z.infer<typeof audioSegmentSchema>;

export const segmentingCheckpointSchema = z.object({
  segments: z.array(audioSegmentSchema),
  /** Segments planned before encoding; encode failures leave gaps */
  plannedCount: z.number().int().min(0),
  segmentDuration: z.number().min(0),
});
export type SegmentingCheckpoint = z.infer<typeof segmentingCheckpointSchema>;

export const segmentTranscriptSchema = z.object({
  index: z.number().int().min(0),
  text: z.string(),
  language: z.string().optional(),
});
export type SegmentTranscript = z.infer<typeof segmentTranscriptSchema>;

export const transcribingCheckpointSchema = z.object({
  completed: z.array(segmentTranscriptSchema),
  failed: z.array(
    z.object({
      index: z.number().int().min(0),
      message: z.string(),
    })
  ),
});
export type TranscribingCheckpoint = z.infer<
  typeof transcribingCheckpointSchema
>;

export const mergingCheckpointSchema = z.object({
  transcript: z.string(),
  wordCount: z.number().int().min(0),
  segmentCount: z.number().int().min(0),
  failedSegments: z.number().int().min(0),
});
export type MergingCheckpoint = z.infer<typeof mergingCheckpointSchema>;

export const speakerSchema = z.object({
  id: z.string(),
  duration: z.number(),
  confidence: z.number(),
});

export const diarizingCheckpointSchema = z.object({
  diarizedTranscript: z.string(),
  speakerCount: z.number().int().min(1),
  speakers: z.array(speakerSchema),
  method: z.string(),
});
export type DiarizingCheckpoint = z.infer<typeof diarizingCheckpointSchema>;

export const outputsCheckpointSchema = z.object({
  assetKinds: z.array(z.string()),
});
export type OutputsCheckpoint = z.infer<typeof outputsCheckpointSchema>;

export interface StageCheckpoints {
  segmenting: SegmentingCheckpoint;
  transcribing: TranscribingCheckpoint;
  merging: MergingCheckpoint;
  diarizing: DiarizingCheckpoint;
  generating_outputs: OutputsCheckpoint;
}

export type CheckpointStage = keyof StageCheckpoints;

const checkpointSchemas: {
  [S in CheckpointStage]: z.ZodType<StageCheckpoints[S]>;
} = {
  segmenting: segmentingCheckpointSchema,
  transcribing: transcribingCheckpointSchema,
  merging: mergingCheckpointSchema,
  diarizing: diarizingCheckpointSchema,
  generating_outputs: outputsCheckpointSchema,
};

export function parseCheckpoint<S extends CheckpointStage>(
  stage: S,
  raw: unknown
): StageCheckpoints[S] | null {
  if (raw === undefined || raw === null) return null;
  const schema: z.ZodType<StageCheckpoints[S]> = checkpointSchemas[stage];
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
