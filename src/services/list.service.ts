import { type TrelloList, TrelloListSchema } from '../types/trello.types.js';

import type { TrelloApi } from './trello-client.js';

export type ListPosition = 'top' | 'bottom' | number;

export type CreateListPayload = {
  idBoard: string;
  name: string;
  pos?: ListPosition | undefined;
};

export type UpdateListPayload = {
  name?: string | undefined;
  closed?: boolean | undefined;
  pos?: ListPosition | undefined;
  idBoard?: string | undefined;
};

export class ListService {
  constructor(private readonly api: TrelloApi) {}

  getList(listId: string): Promise<TrelloList> {
    return this.api.request(
      { method: 'GET', path: `/lists/${encodeURIComponent(listId)}` },
      TrelloListSchema
    );
  }

  getLists(boardId: string): Promise<TrelloList[]> {
    return this.api.request(
      { method: 'GET', path: `/boards/${encodeURIComponent(boardId)}/lists` },
      TrelloListSchema.array()
    );
  }

  createList(payload: CreateListPayload): Promise<TrelloList> {
    return this.api.request(
      { method: 'POST', path: '/lists', body: { ...payload } },
      TrelloListSchema
    );
  }

  updateList(listId: string, payload: UpdateListPayload): Promise<TrelloList> {
    return this.api.request(
      {
        method: 'PUT',
        path: `/lists/${encodeURIComponent(listId)}`,
        body: { ...payload },
      },
      TrelloListSchema
    );
  }

  /** Trello cannot delete lists; they are archived instead. */
  archiveList(listId: string): Promise<TrelloList> {
    return this.api.request(
      {
        method: 'PUT',
        path: `/lists/${encodeURIComponent(listId)}/closed`,
        query: { value: true },
      },
      TrelloListSchema
    );
  }
}
