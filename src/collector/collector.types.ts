/**
 * Feedback event types.
 *
 * Events are tied to an earlier routing decision by content id. Each
 * (contentId, source) pair is accepted at most once; later duplicates
 * are acknowledged and ignored.
 */

import { z } from 'zod';

export const FEEDBACK_SOURCES = ['generation', 'engagement', 'editorial', 'quality_flag'] as const;
export type FeedbackSource = typeof FEEDBACK_SOURCES[number];

export const GenerationPayloadSchema = z.object({
  /** Named output fields, e.g. headline, lede, whyItMatters */
  fields: z.record(z.string()),
  /** Source references cited by the generated item */
  sources: z.array(z.string()).default([]),
  tokensUsed: z.number().int().nonnegative().optional(),
  cost: z.number().nonnegative().optional(),
});

const EngagementPayloadSchema = z.object({
  clicked: z.boolean(),
  dwellSeconds: z.number().nonnegative().default(0),
  shared: z.boolean().default(false),
});

const EditorialPayloadSchema = z.object({
  decision: z.enum(['accepted', 'rejected']),
  /** Fraction of the text the editor changed, 0-1 */
  editRatio: z.number().min(0).max(1).default(0),
  note: z.string().optional(),
});

const QualityFlagPayloadSchema = z.object({
  flag: z.enum(['hallucination', 'factual_error', 'reference_missing', 'tone', 'other']),
  note: z.string().optional(),
});

const contentId = z.string().min(1).max(200);
const occurredAt = z.coerce.date().optional();

export const FeedbackEventInputSchema = z.discriminatedUnion('source', [
  z.object({ contentId, occurredAt, source: z.literal('generation'), payload: GenerationPayloadSchema }),
  z.object({ contentId, occurredAt, source: z.literal('engagement'), payload: EngagementPayloadSchema }),
  z.object({ contentId, occurredAt, source: z.literal('editorial'), payload: EditorialPayloadSchema }),
  z.object({ contentId, occurredAt, source: z.literal('quality_flag'), payload: QualityFlagPayloadSchema }),
]);

export type FeedbackEventInput = z.input<typeof FeedbackEventInputSchema>;
export type FeedbackBody = z.infer<typeof FeedbackEventInputSchema>;
export type GenerationPayload = z.infer<typeof GenerationPayloadSchema>;

/**
 * Position in the ingestion order. Events are totally ordered by
 * (ingestedAt, seq).
 */
export interface DrainCursor {
  ingestedAt: Date;
  seq: number;
}

export type FeedbackEvent = FeedbackBody & {
  id: string;
  seq: number;
  occurredAt: Date;
  ingestedAt: Date;
};

export interface NewFeedbackEvent {
  id: string;
  body: FeedbackBody;
  occurredAt: Date;
}

export interface IngestResult {
  accepted: boolean;
  duplicate: boolean;
  event?: FeedbackEvent;
  errors?: string[];
}

export function cursorOf(event: FeedbackEvent): DrainCursor {
  return { ingestedAt: event.ingestedAt, seq: event.seq };
}

export function compareCursor(a: DrainCursor, b: DrainCursor): number {
  const byTime = a.ingestedAt.getTime() - b.ingestedAt.getTime();
  return byTime !== 0 ? byTime : a.seq - b.seq;
}
