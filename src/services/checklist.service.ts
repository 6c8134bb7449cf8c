import {
  TrelloAnySchema,
  type TrelloCheckItem,
  TrelloCheckItemSchema,
  type TrelloChecklist,
  TrelloChecklistSchema,
} from '../types/trello.types.js';

import type { TrelloApi } from './trello-client.js';

export type CreateChecklistPayload = {
  idCard: string;
  name: string;
  pos?: 'top' | 'bottom' | number | undefined;
  idChecklistSource?: string | undefined;
};

export type UpdateChecklistPayload = {
  name?: string | undefined;
  pos?: 'top' | 'bottom' | number | undefined;
};

export type AddCheckItemPayload = {
  name: string;
  checked?: boolean | undefined;
  pos?: 'top' | 'bottom' | number | undefined;
};

export type UpdateCheckItemPayload = {
  name?: string | undefined;
  state?: 'complete' | 'incomplete' | undefined;
  pos?: 'top' | 'bottom' | number | undefined;
  idChecklist?: string | undefined;
};

function checklistPath(checklistId: string, suffix = ''): string {
  return `/checklists/${encodeURIComponent(checklistId)}${suffix}`;
}

export class ChecklistService {
  constructor(private readonly api: TrelloApi) {}

  getChecklist(checklistId: string): Promise<TrelloChecklist> {
    return this.api.request(
      { method: 'GET', path: checklistPath(checklistId) },
      TrelloChecklistSchema
    );
  }

  getCardChecklists(cardId: string): Promise<TrelloChecklist[]> {
    return this.api.request(
      {
        method: 'GET',
        path: `/cards/${encodeURIComponent(cardId)}/checklists`,
      },
      TrelloChecklistSchema.array()
    );
  }

  createChecklist(payload: CreateChecklistPayload): Promise<TrelloChecklist> {
    return this.api.request(
      { method: 'POST', path: '/checklists', body: { ...payload } },
      TrelloChecklistSchema
    );
  }

  updateChecklist(
    checklistId: string,
    payload: UpdateChecklistPayload
  ): Promise<TrelloChecklist> {
    return this.api.request(
      { method: 'PUT', path: checklistPath(checklistId), body: { ...payload } },
      TrelloChecklistSchema
    );
  }

  deleteChecklist(checklistId: string): Promise<unknown> {
    return this.api.request(
      { method: 'DELETE', path: checklistPath(checklistId) },
      TrelloAnySchema
    );
  }

  addCheckItem(
    checklistId: string,
    payload: AddCheckItemPayload
  ): Promise<TrelloCheckItem> {
    return this.api.request(
      {
        method: 'POST',
        path: checklistPath(checklistId, '/checkItems'),
        body: { ...payload },
      },
      TrelloCheckItemSchema
    );
  }

  /** Check items are updated through their card, not their checklist. */
  updateCheckItem(
    cardId: string,
    checkItemId: string,
    payload: UpdateCheckItemPayload
  ): Promise<TrelloCheckItem> {
    return this.api.request(
      {
        method: 'PUT',
        path: `/cards/${encodeURIComponent(cardId)}/checkItem/${encodeURIComponent(checkItemId)}`,
        body: { ...payload },
      },
      TrelloCheckItemSchema
    );
  }

  deleteCheckItem(checklistId: string, checkItemId: string): Promise<unknown> {
    return this.api.request(
      {
        method: 'DELETE',
        path: checklistPath(
          checklistId,
          `/checkItems/${encodeURIComponent(checkItemId)}`
        ),
      },
      TrelloAnySchema
    );
  }
}
