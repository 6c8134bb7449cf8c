import { z } from 'zod';

import type { TrelloServices } from '../../services/trello-services.js';

import { idField, PositionSchema } from '../schemas.js';
import { defineTool, type GatewayTool } from '../tool-definition.js';

export function createChecklistTools({
  checklists,
}: TrelloServices): GatewayTool[] {
  return [
    defineTool({
      name: 'get_checklist',
      title: 'Get Checklist',
      description: 'Retrieves a checklist and its items.',
      inputSchema: { checklist_id: idField('checklist') },
      handler: ({ checklist_id }) => checklists.getChecklist(checklist_id),
    }),
    defineTool({
      name: 'get_card_checklists',
      title: 'Get Card Checklists',
      description: 'Retrieves all checklists on a card.',
      inputSchema: { card_id: idField('card') },
      handler: ({ card_id }) => checklists.getCardChecklists(card_id),
    }),
    defineTool({
      name: 'create_checklist',
      title: 'Create Checklist',
      description: 'Creates a checklist on a card.',
      mutating: true,
      inputSchema: {
        card_id: idField('card'),
        name: z.string().min(1).describe('Checklist name'),
        pos: PositionSchema.optional(),
        source_checklist_id: z
          .string()
          .min(1)
          .optional()
          .describe('Checklist to copy items from'),
      },
      handler: ({ card_id, name, pos, source_checklist_id }) =>
        checklists.createChecklist({
          idCard: card_id,
          name,
          pos,
          idChecklistSource: source_checklist_id,
        }),
    }),
    defineTool({
      name: 'update_checklist',
      title: 'Update Checklist',
      description: 'Renames or moves a checklist.',
      mutating: true,
      inputSchema: {
        checklist_id: idField('checklist'),
        name: z.string().min(1).optional().describe('New checklist name'),
        pos: PositionSchema.optional(),
      },
      handler: ({ checklist_id, ...payload }) =>
        checklists.updateChecklist(checklist_id, payload),
    }),
    defineTool({
      name: 'delete_checklist',
      title: 'Delete Checklist',
      description: 'Deletes a checklist.',
      mutating: true,
      inputSchema: { checklist_id: idField('checklist') },
      handler: ({ checklist_id }) => checklists.deleteChecklist(checklist_id),
    }),
    defineTool({
      name: 'add_checkitem',
      title: 'Add Check Item',
      description: 'Adds an item to a checklist.',
      mutating: true,
      inputSchema: {
        checklist_id: idField('checklist'),
        name: z.string().min(1).describe('Item text'),
        checked: z.boolean().optional().describe('Create the item as done'),
        pos: PositionSchema.optional(),
      },
      handler: ({ checklist_id, ...payload }) =>
        checklists.addCheckItem(checklist_id, payload),
    }),
    defineTool({
      name: 'update_checkitem',
      title: 'Update Check Item',
      description: 'Renames, completes, reopens or moves a checklist item.',
      mutating: true,
      inputSchema: {
        card_id: idField('card holding the checklist'),
        checkitem_id: idField('check item'),
        name: z.string().min(1).optional().describe('New item text'),
        state: z
          .enum(['complete', 'incomplete'])
          .optional()
          .describe('Completion state'),
        pos: PositionSchema.optional(),
        checklist_id: z
          .string()
          .min(1)
          .optional()
          .describe('Checklist to move the item to'),
      },
      handler: ({ card_id, checkitem_id, checklist_id, ...payload }) =>
        checklists.updateCheckItem(card_id, checkitem_id, {
          ...payload,
          idChecklist: checklist_id,
        }),
    }),
    defineTool({
      name: 'delete_checkitem',
      title: 'Delete Check Item',
      description: 'Deletes an item from a checklist.',
      mutating: true,
      inputSchema: {
        checklist_id: idField('checklist'),
        checkitem_id: idField('check item'),
      },
      handler: ({ checklist_id, checkitem_id }) =>
        checklists.deleteCheckItem(checklist_id, checkitem_id),
    }),
  ];
}
