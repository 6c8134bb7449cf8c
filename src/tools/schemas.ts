import { z } from 'zod';

export function idField(entity: string): z.ZodString {
  return z.string().trim().min(1).describe(`The ID of the ${entity}`);
}

export const PositionSchema = z
  .union([z.enum(['top', 'bottom']), z.number().nonnegative()])
  .describe("Position: 'top', 'bottom' or a positive number");

export const BoardFilterSchema = z
  .enum([
    'all',
    'closed',
    'members',
    'open',
    'organization',
    'public',
    'starred',
  ])
  .default('open')
  .describe('Which boards to return');

export const LabelColorSchema = z
  .enum([
    'green',
    'yellow',
    'orange',
    'red',
    'purple',
    'blue',
    'sky',
    'lime',
    'pink',
    'black',
  ])
  .describe('Label color');

export const IsoDateSchema = z
  .string()
  .datetime({ offset: true })
  .describe('ISO 8601 timestamp, e.g. 2025-01-31T12:00:00.000Z');

export const KeepFromSourceSchema = z
  .enum([
    'all',
    'attachments',
    'checklists',
    'comments',
    'customFields',
    'due',
    'labels',
    'members',
    'start',
    'stickers',
  ])
  .describe('What to keep from the source card');

export const CustomFieldValueSchema = z
  .record(z.unknown())
  .describe(
    'Typed value, e.g. {"text": "High"}, {"number": "42"}, {"checked": "true"}, {"date": "2025-01-31T12:00:00.000Z"} or {"idValue": "<option id>"}'
  );
