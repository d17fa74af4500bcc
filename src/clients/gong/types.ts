/**
 * Gong v2 API wire types
 *
 * Schemas validate the fields the archive relies on and pass everything
 * else through untouched, so records keep the full upstream payload.
 */

import { z } from 'zod';

/**
 * Call ids arrive as strings; numeric ids are normalized to strings
 */
const CallIdSchema = z.union([z.string().min(1), z.number()]).transform(String);

/**
 * Call participant
 */
export const PartySchema = z
  .object({
    id: z.string().nullish(),
    name: z.string().nullish(),
    emailAddress: z.string().nullish(),
    title: z.string().nullish(),
    userId: z.string().nullish(),
    speakerId: z.string().nullish(),
    affiliation: z.string().nullish(),
  })
  .passthrough();

export type Party = z.infer<typeof PartySchema>;

/**
 * Call metadata as listed by /v2/calls, or flattened from /v2/calls/extensive
 */
export const CallRecordSchema = z
  .object({
    id: CallIdSchema,
    title: z.string().nullish(),
    url: z.string().nullish(),
    scheduled: z.string().nullish(),
    started: z.string().nullish(),
    /** Call length as reported upstream */
    duration: z.number().nullish(),
    direction: z.string().nullish(),
    system: z.string().nullish(),
    scope: z.string().nullish(),
    language: z.string().nullish(),
    parties: z.array(PartySchema).nullish(),
  })
  .passthrough();

export type CallRecord = z.infer<typeof CallRecordSchema>;

/**
 * Pagination block shared by list endpoints
 */
export const RecordsInfoSchema = z
  .object({
    totalRecords: z.number().int().nonnegative(),
    currentPageSize: z.number().int().optional(),
    currentPageNumber: z.number().int().optional(),
    cursor: z.string().nullish(),
  })
  .passthrough();

export type RecordsInfo = z.infer<typeof RecordsInfoSchema>;

/**
 * Response of GET /v2/calls
 */
export const CallsPageSchema = z.object({
  requestId: z.string().optional(),
  records: RecordsInfoSchema,
  calls: z.array(CallRecordSchema).default([]),
});

export type CallsPage = z.infer<typeof CallsPageSchema>;

/**
 * Call as returned by POST /v2/calls/extensive, before flattening
 */
export const ExtensiveCallSchema = z
  .object({
    metaData: z.record(z.unknown()).optional(),
    parties: z.array(z.unknown()).optional(),
    context: z.unknown().optional(),
    content: z.unknown().optional(),
    interaction: z.unknown().optional(),
  })
  .passthrough();

export type ExtensiveCall = z.infer<typeof ExtensiveCallSchema>;

/**
 * Response of POST /v2/calls/extensive
 */
export const ExtensiveCallsPageSchema = z.object({
  requestId: z.string().optional(),
  records: RecordsInfoSchema,
  calls: z.array(ExtensiveCallSchema).default([]),
});

/**
 * One sentence of a monologue; offsets are milliseconds from call start
 */
export const SentenceSchema = z
  .object({
    start: z.number(),
    end: z.number(),
    text: z.string(),
  })
  .passthrough();

export type Sentence = z.infer<typeof SentenceSchema>;

/**
 * Consecutive sentences by one speaker
 */
export const MonologueSchema = z
  .object({
    speakerId: z.string().nullish(),
    topic: z.string().nullish(),
    sentences: z.array(SentenceSchema).default([]),
  })
  .passthrough();

export type Monologue = z.infer<typeof MonologueSchema>;

/**
 * Transcript of a single call
 */
export const CallTranscriptSchema = z
  .object({
    callId: CallIdSchema,
    transcript: z.array(MonologueSchema).default([]),
  })
  .passthrough();

export type CallTranscript = z.infer<typeof CallTranscriptSchema>;

/**
 * Response of POST /v2/calls/transcript
 */
export const TranscriptsResponseSchema = z.object({
  requestId: z.string().optional(),
  records: RecordsInfoSchema.optional(),
  callTranscripts: z.array(CallTranscriptSchema).default([]),
});

export type TranscriptsResponse = z.infer<typeof TranscriptsResponseSchema>;

/**
 * Fields requested from /v2/calls/extensive
 */
export const EXTENSIVE_CONTENT_SELECTOR = {
  exposedFields: {
    parties: true,
    content: {
      structure: false,
      topics: false,
      trackers: false,
      trackerOccurrences: false,
      pointsOfInterest: false,
      brief: true,
      outline: true,
      highlights: true,
      callOutcome: true,
      keyPoints: true,
    },
    interaction: {
      speakers: true,
      video: true,
      personInteractionStats: true,
      questions: true,
    },
    collaboration: {
      publicComments: true,
    },
    media: true,
  },
} as const;
