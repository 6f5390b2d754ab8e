import { z } from 'zod';

import type { TaskOutputs, TaskTokenUsage } from '@libs/entities';

import { EngineError } from '../tasks/errors';

const progressFields = {
  stage: z.string().min(1).default('Processing'),
  overall_progress: z.number().finite().default(0),
  part_index: z.number().int().default(1),
  total_parts: z.number().int().default(1),
  stage_current: z.number().int().default(0),
  stage_total: z.number().int().default(1),
};

const artifactPath = z.string().min(1).nullish();

const rawEngineEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('progress_start'), ...progressFields }),
  z.object({ type: z.literal('progress_update'), ...progressFields }),
  z.object({ type: z.literal('progress_end'), ...progressFields }),
  z.object({
    type: z.literal('finish'),
    output_artifacts: z
      .object({ mono: artifactPath, dual: artifactPath })
      .default({}),
    token_usage: z.record(z.number()).nullish(),
  }),
  z.object({
    type: z.literal('error'),
    error_detail: z.string().min(1).default('Unknown error'),
  }),
]);

export type EngineProgressType =
  | 'progress_start'
  | 'progress_update'
  | 'progress_end';

export interface EngineProgressEvent {
  type: EngineProgressType;
  stage: string;
  /** Whole percent, clamped to 0..100. */
  overallProgress: number;
  partIndex: number;
  totalParts: number;
  stageCurrent: number;
  stageTotal: number;
}

export interface EngineFinishEvent {
  type: 'finish';
  outputArtifacts: TaskOutputs;
  tokenUsage: TaskTokenUsage | null;
}

export interface EngineErrorEvent {
  type: 'error';
  errorDetail: string;
}

export type EngineEvent =
  | EngineProgressEvent
  | EngineFinishEvent
  | EngineErrorEvent;

export function clampProgress(value: number): number {
  return Math.min(100, Math.max(0, Math.trunc(value)));
}

/**
 * Decodes one raw engine event. Anything that is not one of the known
 * event shapes is an {@link EngineError}.
 */
export function decodeEngineEvent(raw: unknown): EngineEvent {
  const parsed = rawEngineEventSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'event'}: ${issue.message}`)
      .join('; ');
    throw new EngineError(`Malformed engine event: ${detail}`);
  }

  const event = parsed.data;
  switch (event.type) {
    case 'finish': {
      const outputArtifacts: TaskOutputs = {};
      if (event.output_artifacts.mono) {
        outputArtifacts.mono = event.output_artifacts.mono;
      }
      if (event.output_artifacts.dual) {
        outputArtifacts.dual = event.output_artifacts.dual;
      }
      return {
        type: 'finish',
        outputArtifacts,
        tokenUsage: event.token_usage ?? null,
      };
    }
    case 'error':
      return { type: 'error', errorDetail: event.error_detail };
    default:
      return {
        type: event.type,
        stage: event.stage,
        overallProgress: clampProgress(event.overall_progress),
        partIndex: event.part_index,
        totalParts: event.total_parts,
        stageCurrent: event.stage_current,
        stageTotal: event.stage_total,
      };
  }
}

/**
 * `Layout (1/2, 2/5)`: stage, part of total parts, step of stage steps.
 */
export function formatProgressMessage(event: EngineProgressEvent): string {
  return `${event.stage} (${event.partIndex}/${event.totalParts}, ${event.stageCurrent}/${event.stageTotal})`;
}
