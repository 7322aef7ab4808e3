import { z } from 'zod';

import { GraphValueSchema } from './graph.schema.js';

/**
 * Question answering schemas
 */

export const IntentSchema = z.enum([
  'patients-by-condition',
  'medications-by-condition',
  'medications-by-patient',
  'provider-by-patient',
  'observations-by-patient',
  'encounters-by-patient',
]);

export const QuestionStatusSchema = z.enum([
  'answered',
  'not_found',
  'unsupported',
  'needs_parameter',
  'no_data',
]);

export const QuestionModeSchema = z.enum(['rules', 'translated']);

export const TabularResultSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.array(GraphValueSchema)),
});

export const QuestionAnswerSchema = z.object({
  status: QuestionStatusSchema,
  intent: IntentSchema.nullable(),
  parameter: z.string().nullable(),
  message: z.string(),
  table: TabularResultSchema.nullable(),
});

export const QuestionRequestSchema = z.object({
  question: z.string().trim().min(1, 'Question is required').max(500, 'Question too long'),
  mode: QuestionModeSchema.default('rules'),
});

export type Intent = z.infer<typeof IntentSchema>;
export type QuestionStatus = z.infer<typeof QuestionStatusSchema>;
export type QuestionMode = z.infer<typeof QuestionModeSchema>;
export type TabularResult = z.infer<typeof TabularResultSchema>;
export type QuestionAnswer = z.infer<typeof QuestionAnswerSchema>;
export type QuestionRequest = z.infer<typeof QuestionRequestSchema>;
