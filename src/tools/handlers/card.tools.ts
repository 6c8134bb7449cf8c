import { z } from 'zod';

import type { TrelloServices } from '../../services/trello-services.js';

import {
  idField,
  IsoDateSchema,
  KeepFromSourceSchema,
  PositionSchema,
} from '../schemas.js';
import { defineTool, type GatewayTool } from '../tool-definition.js';

const IdListSchema = z.array(z.string().min(1));

export function createCardTools({ cards }: TrelloServices): GatewayTool[] {
  return [
    defineTool({
      name: 'get_card',
      title: 'Get Card',
      description: 'Retrieves a specific card by its ID.',
      inputSchema: { card_id: idField('card') },
      handler: ({ card_id }) => cards.getCard(card_id),
    }),
    defineTool({
      name: 'get_cards',
      title: 'Get Cards',
      description: 'Retrieves all cards in a list.',
      inputSchema: { list_id: idField('list') },
      handler: ({ list_id }) => cards.getCards(list_id),
    }),
    defineTool({
      name: 'create_card',
      title: 'Create Card',
      description: 'Creates a card in a list.',
      mutating: true,
      inputSchema: {
        list_id: idField('list'),
        name: z.string().min(1).describe('Card name'),
        desc: z.string().optional().describe('Card description'),
        pos: PositionSchema.optional(),
        due: IsoDateSchema.optional(),
        start: IsoDateSchema.optional(),
        idMembers: IdListSchema.optional().describe('Member IDs to assign'),
        idLabels: IdListSchema.optional().describe('Label IDs to apply'),
      },
      handler: ({ list_id, ...payload }) =>
        cards.createCard({ idList: list_id, ...payload }),
    }),
    defineTool({
      name: 'update_card',
      title: 'Update Card',
      description: 'Updates the attributes of a card, including moving it.',
      mutating: true,
      inputSchema: {
        card_id: idField('card'),
        name: z.string().min(1).optional().describe('New card name'),
        desc: z.string().optional().describe('New description'),
        closed: z.boolean().optional().describe('Archive or reopen the card'),
        idList: z.string().min(1).optional().describe('List to move to'),
        pos: PositionSchema.optional(),
        due: IsoDateSchema.nullable().optional(),
        start: IsoDateSchema.nullable().optional(),
        dueComplete: z.boolean().optional().describe('Mark the due date done'),
        idMembers: IdListSchema.optional().describe('Replace assigned members'),
        idLabels: IdListSchema.optional().describe('Replace applied labels'),
      },
      handler: ({ card_id, ...payload }) => cards.updateCard(card_id, payload),
    }),
    defineTool({
      name: 'delete_card',
      title: 'Delete Card',
      description: 'Permanently deletes a card.',
      mutating: true,
      inputSchema: { card_id: idField('card') },
      handler: ({ card_id }) => cards.deleteCard(card_id),
    }),
    defineTool({
      name: 'copy_card',
      title: 'Copy Card',
      description: 'Copies a card into a list.',
      mutating: true,
      inputSchema: {
        idCardSource: idField('card to copy'),
        idList: idField('target list'),
        name: z.string().min(1).optional().describe('Name of the copy'),
        desc: z.string().optional().describe('Description of the copy'),
        pos: PositionSchema.optional(),
        keepFromSource: KeepFromSourceSchema.default('all'),
      },
      handler: (payload) => cards.copyCard(payload),
    }),
    defineTool({
      name: 'get_card_comments',
      title: 'Get Card Comments',
      description: 'Retrieves the comments on a card.',
      inputSchema: { card_id: idField('card') },
      handler: ({ card_id }) => cards.getComments(card_id),
    }),
    defineTool({
      name: 'add_comment_to_card',
      title: 'Add Comment',
      description: 'Posts a comment on a card.',
      mutating: true,
      inputSchema: {
        card_id: idField('card'),
        text: z.string().min(1).describe('Comment text'),
      },
      handler: ({ card_id, text }) => cards.addComment(card_id, text),
    }),
    defineTool({
      name: 'add_member_to_card',
      title: 'Add Member To Card',
      description: 'Assigns a member to a card.',
      mutating: true,
      inputSchema: {
        card_id: idField('card'),
        member_id: idField('member'),
      },
      handler: ({ card_id, member_id }) => cards.addMember(card_id, member_id),
    }),
    defineTool({
      name: 'remove_member_from_card',
      title: 'Remove Member From Card',
      description: 'Removes a member from a card.',
      mutating: true,
      inputSchema: {
        card_id: idField('card'),
        member_id: idField('member'),
      },
      handler: ({ card_id, member_id }) =>
        cards.removeMember(card_id, member_id),
    }),
  ];
}
