import { z } from 'zod';

export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/;

const timestampSchema = z.string().regex(TIMESTAMP_PATTERN, "Invalid time format. Use 'YYYY-MM-DD HH:MM'");

export const categoryTypeSchema = z.enum([
  'Time',
  'Location',
  'Event',
  'Shopping',
  'Call',
  'Meeting',
  'Deadline',
  'Health',
  'Routine',
  'Other',
]);

export const triggerTypeSchema = z.enum(['Time', 'Location']);

export const triggerSchema = z.object({
  triggerType: triggerTypeSchema,
  triggerValue: z.string(),
});

export const noteSchema = z.object({
  text: z.string(),
  createdAt: timestampSchema,
  updatedAt: timestampSchema.nullable().optional(),
  categoryType: categoryTypeSchema,
  triggers: z.array(triggerSchema).default([]),
});

export const textBasedHintSchema = z.object({
  context: z.array(noteSchema),
  current_time: timestampSchema,
});

export const timePatternsSchema = z.object({
  context: z.array(noteSchema),
});
