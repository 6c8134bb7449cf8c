import type { TrelloServices } from '../../services/trello-services.js';

import { CustomFieldValueSchema, idField } from '../schemas.js';
import { defineTool, type GatewayTool } from '../tool-definition.js';

export function createCustomFieldTools({
  customFields,
}: TrelloServices): GatewayTool[] {
  return [
    defineTool({
      name: 'get_board_custom_field_definitions',
      title: 'Get Custom Field Definitions',
      description: 'Retrieves the custom field definitions of a board.',
      inputSchema: { board_id: idField('board') },
      handler: ({ board_id }) => customFields.getBoardCustomFields(board_id),
    }),
    defineTool({
      name: 'get_card_custom_field_items',
      title: 'Get Card Custom Fields',
      description: 'Retrieves the custom field values set on a card.',
      inputSchema: { card_id: idField('card') },
      handler: ({ card_id }) => customFields.getCardCustomFields(card_id),
    }),
    defineTool({
      name: 'update_card_custom_field_value',
      title: 'Update Custom Field Value',
      description:
        'Sets a custom field value on a card. The value is keyed by the field type; see get_board_custom_field_definitions.',
      mutating: true,
      inputSchema: {
        card_id: idField('card'),
        custom_field_id: idField('custom field'),
        value: CustomFieldValueSchema,
      },
      handler: ({ card_id, custom_field_id, value }) =>
        customFields.updateCardCustomField(card_id, custom_field_id, value),
    }),
  ];
}
