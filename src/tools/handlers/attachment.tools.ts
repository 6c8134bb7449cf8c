import { z } from 'zod';

import type { TrelloServices } from '../../services/trello-services.js';

import { idField } from '../schemas.js';
import { defineTool, type GatewayTool } from '../tool-definition.js';

export function createAttachmentTools({
  attachments,
}: TrelloServices): GatewayTool[] {
  return [
    defineTool({
      name: 'get_card_attachments',
      title: 'Get Card Attachments',
      description: 'Retrieves the attachments of a card.',
      inputSchema: { card_id: idField('card') },
      handler: ({ card_id }) => attachments.getAttachments(card_id),
    }),
    defineTool({
      name: 'add_attachment_to_card',
      title: 'Add Attachment',
      description: 'Attaches a URL to a card.',
      mutating: true,
      inputSchema: {
        card_id: idField('card'),
        url: z.string().url().describe('URL to attach'),
        name: z.string().min(1).optional().describe('Attachment name'),
      },
      handler: ({ card_id, url, name }) =>
        attachments.addAttachment(card_id, url, name),
    }),
    defineTool({
      name: 'delete_attachment_from_card',
      title: 'Delete Attachment',
      description: 'Removes an attachment from a card.',
      mutating: true,
      inputSchema: {
        card_id: idField('card'),
        attachment_id: idField('attachment'),
      },
      handler: ({ card_id, attachment_id }) =>
        attachments.deleteAttachment(card_id, attachment_id),
    }),
  ];
}
