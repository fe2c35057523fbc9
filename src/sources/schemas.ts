/**
 * Validation schemas for artifacts delivered by the external stores
 *
 * Stores write snake_case JSON; each schema validates one record and
 * transforms it into the corresponding entity variant.
 */

import { z } from 'zod';
import {
  DECISION_STATUSES,
  QUESTION_STATUSES,
  type DecisionEntity,
  type JsonValue,
  type QuestionEntity
} from '../core/types.js';
import type { ChunkRecord } from './types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);

export const JsonObjectSchema = z.record(JsonValueSchema);

const stringList = z.array(z.string()).default([]);
const optionalText = z.string().nullish().transform(value => value ?? '');

export const QuestionRecordSchema = z
  .object({
    id: z.string().min(1),
    question: optionalText,
    audience: optionalText,
    category: optionalText,
    priority: z.union([z.string(), z.number()]).nullish().transform(value => (value == null ? 'medium' : String(value))),
    status: z.enum(QUESTION_STATUSES).default('pending'),
    related_roadmap_items: stringList,
    created_at: z.string().nullish()
  })
  .transform((record): QuestionEntity => ({
    kind: 'question',
    id: record.id,
    text: record.question,
    audience: record.audience,
    category: record.category,
    priority: record.priority,
    status: record.status,
    relatedRoadmapItems: record.related_roadmap_items,
    ...(record.created_at ? { createdAt: record.created_at } : {})
  }));

export const QuestionsFileSchema = z.object({
  questions: z.array(QuestionRecordSchema).default([])
});

export const DecisionRecordSchema = z
  .object({
    id: z.string().min(1),
    decision: optionalText,
    rationale: optionalText,
    implications: stringList,
    owner: optionalText,
    status: z.enum(DECISION_STATUSES).default('active'),
    question_id: z.string().nullish(),
    related_roadmap_items: stringList,
    created_at: z.string().nullish()
  })
  .transform((record): DecisionEntity => ({
    kind: 'decision',
    id: record.id,
    statement: record.decision,
    rationale: record.rationale,
    implications: record.implications,
    owner: record.owner,
    status: record.status,
    ...(record.question_id ? { questionId: record.question_id } : {}),
    relatedRoadmapItems: record.related_roadmap_items,
    ...(record.created_at ? { createdAt: record.created_at } : {})
  }));

export const DecisionsFileSchema = z.object({
  decisions: z.array(DecisionRecordSchema).default([])
});

/**
 * Chunk as exported by the vector store. The embedding is carried either as
 * `vector` or `embedding`.
 */
export const ChunkRecordSchema = z
  .object({
    id: z.string().min(1),
    content: z.string(),
    lens: z.string().default('unknown'),
    source_name: optionalText,
    source_file: optionalText,
    chunk_index: z.number().int().nonnegative().default(0),
    token_count: z.number().int().nonnegative().default(0),
    vector: z.array(z.number()).optional(),
    embedding: z.array(z.number()).optional()
  })
  .transform((record): ChunkRecord => ({
    entity: {
      kind: 'chunk',
      id: record.id,
      content: record.content,
      lens: record.lens,
      sourceName: record.source_name,
      sourcePath: record.source_file,
      chunkIndex: record.chunk_index,
      tokenCount: record.token_count
    },
    embedding: record.vector ?? record.embedding
  }));

/**
 * Competitive assessment list entry. Entries without an id are kept here and
 * skipped at integration.
 */
export const CompetitiveListSchema = z.array(JsonObjectSchema);

/**
 * Format zod issues as a single line
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
