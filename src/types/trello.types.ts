import { z } from 'zod';

/**
 * Response shapes of the Trello REST API. Only the fields the gateway
 * relies on are declared; everything else Trello returns is passed
 * through untouched.
 */

export const TrelloLabelSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    color: z.string().nullable().optional(),
  })
  .passthrough();

export const TrelloBoardSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    desc: z.string().nullable().optional(),
    closed: z.boolean().optional(),
    idOrganization: z.string().nullable().optional(),
    url: z.string().optional(),
  })
  .passthrough();

export const TrelloListSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    closed: z.boolean().optional(),
    idBoard: z.string().optional(),
    pos: z.number().optional(),
  })
  .passthrough();

export const TrelloCardSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    desc: z.string().nullable().optional(),
    closed: z.boolean().optional(),
    idList: z.string().optional(),
    idBoard: z.string().optional(),
    url: z.string().optional(),
    pos: z.number().optional(),
    labels: z.array(TrelloLabelSchema).optional(),
    due: z.string().nullable().optional(),
  })
  .passthrough();

export const TrelloMemberSchema = z
  .object({
    id: z.string(),
    fullName: z.string().optional(),
    username: z.string().optional(),
    email: z.string().nullable().optional(),
    url: z.string().nullable().optional(),
  })
  .passthrough();

export const TrelloWorkspaceSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    displayName: z.string().optional(),
    url: z.string().optional(),
    desc: z.string().nullable().optional(),
  })
  .passthrough();

export const TrelloActionSchema = z
  .object({
    id: z.string(),
    type: z.string().optional(),
    date: z.string().optional(),
    data: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const TrelloAttachmentSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

export const TrelloCustomFieldSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

export const TrelloCustomFieldItemSchema = z
  .object({
    id: z.string().optional(),
    idCustomField: z.string().optional(),
    value: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

export const TrelloCheckItemSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    state: z.enum(['complete', 'incomplete']).optional(),
    idChecklist: z.string().optional(),
    pos: z.number().optional(),
  })
  .passthrough();

export const TrelloChecklistSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    idCard: z.string().optional(),
    idBoard: z.string().optional(),
    pos: z.number().optional(),
    checkItems: z.array(TrelloCheckItemSchema).optional(),
  })
  .passthrough();

export const TrelloSearchResultSchema = z
  .object({
    cards: z.array(TrelloCardSchema).default([]),
    boards: z.array(TrelloBoardSchema).default([]),
  })
  .passthrough();

/** Bodies Trello returns for deletes and membership changes vary. */
export const TrelloAnySchema = z.unknown();

export type TrelloLabel = z.infer<typeof TrelloLabelSchema>;
export type TrelloBoard = z.infer<typeof TrelloBoardSchema>;
export type TrelloList = z.infer<typeof TrelloListSchema>;
export type TrelloCard = z.infer<typeof TrelloCardSchema>;
export type TrelloMember = z.infer<typeof TrelloMemberSchema>;
export type TrelloWorkspace = z.infer<typeof TrelloWorkspaceSchema>;
export type TrelloAction = z.infer<typeof TrelloActionSchema>;
export type TrelloAttachment = z.infer<typeof TrelloAttachmentSchema>;
export type TrelloCustomField = z.infer<typeof TrelloCustomFieldSchema>;
export type TrelloCustomFieldItem = z.infer<
  typeof TrelloCustomFieldItemSchema
>;
export type TrelloCheckItem = z.infer<typeof TrelloCheckItemSchema>;
export type TrelloChecklist = z.infer<typeof TrelloChecklistSchema>;
export type TrelloSearchResult = z.infer<typeof TrelloSearchResultSchema>;
