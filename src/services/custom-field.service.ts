import {
  TrelloAnySchema,
  type TrelloCustomField,
  type TrelloCustomFieldItem,
  TrelloCustomFieldItemSchema,
  TrelloCustomFieldSchema,
} from '../types/trello.types.js';

import type { TrelloApi } from './trello-client.js';

export type CustomFieldValue = Record<string, unknown>;

/**
 * Trello expects `{ value: { text | number | checked | date: ... } }` or
 * `{ idValue }` for dropdowns. A payload that already carries `value` or
 * `idValue` is sent as is; a bare typed value is wrapped.
 */
export function buildCustomFieldPayload(
  value: CustomFieldValue
): CustomFieldValue {
  if ('value' in value || 'idValue' in value) return value;
  return { value };
}

export class CustomFieldService {
  constructor(private readonly api: TrelloApi) {}

  getBoardCustomFields(boardId: string): Promise<TrelloCustomField[]> {
    return this.api.request(
      {
        method: 'GET',
        path: `/boards/${encodeURIComponent(boardId)}/customFields`,
      },
      TrelloCustomFieldSchema.array()
    );
  }

  getCardCustomFields(cardId: string): Promise<TrelloCustomFieldItem[]> {
    return this.api.request(
      {
        method: 'GET',
        path: `/cards/${encodeURIComponent(cardId)}/customFieldItems`,
      },
      TrelloCustomFieldItemSchema.array()
    );
  }

  updateCardCustomField(
    cardId: string,
    customFieldId: string,
    value: CustomFieldValue
  ): Promise<unknown> {
    return this.api.request(
      {
        method: 'PUT',
        path: `/cards/${encodeURIComponent(cardId)}/customField/${encodeURIComponent(customFieldId)}/item`,
        body: buildCustomFieldPayload(value),
      },
      TrelloAnySchema
    );
  }
}
