import {
  TrelloActionSchema,
  type TrelloAction,
  TrelloAnySchema,
  type TrelloCard,
  TrelloCardSchema,
} from '../types/trello.types.js';

import type { TrelloApi } from './trello-client.js';

export type CreateCardPayload = {
  idList: string;
  name: string;
  desc?: string | undefined;
  pos?: 'top' | 'bottom' | number | undefined;
  due?: string | undefined;
  start?: string | undefined;
  dueComplete?: boolean | undefined;
  idMembers?: string[] | undefined;
  idLabels?: string[] | undefined;
};

export type UpdateCardPayload = {
  name?: string | undefined;
  desc?: string | undefined;
  closed?: boolean | undefined;
  idList?: string | undefined;
  idBoard?: string | undefined;
  pos?: 'top' | 'bottom' | number | undefined;
  due?: string | null | undefined;
  start?: string | null | undefined;
  dueComplete?: boolean | undefined;
  idMembers?: string[] | undefined;
  idLabels?: string[] | undefined;
};

export type KeepFromSource =
  | 'all'
  | 'attachments'
  | 'checklists'
  | 'comments'
  | 'customFields'
  | 'due'
  | 'labels'
  | 'members'
  | 'start'
  | 'stickers';

export type CopyCardPayload = {
  idCardSource: string;
  idList: string;
  name?: string | undefined;
  desc?: string | undefined;
  pos?: 'top' | 'bottom' | number | undefined;
  keepFromSource?: KeepFromSource | undefined;
};

function cardPath(cardId: string, suffix = ''): string {
  return `/cards/${encodeURIComponent(cardId)}${suffix}`;
}

export class CardService {
  constructor(private readonly api: TrelloApi) {}

  getCard(cardId: string): Promise<TrelloCard> {
    return this.api.request(
      { method: 'GET', path: cardPath(cardId) },
      TrelloCardSchema
    );
  }

  getCards(listId: string): Promise<TrelloCard[]> {
    return this.api.request(
      { method: 'GET', path: `/lists/${encodeURIComponent(listId)}/cards` },
      TrelloCardSchema.array()
    );
  }

  createCard(payload: CreateCardPayload): Promise<TrelloCard> {
    return this.api.request(
      { method: 'POST', path: '/cards', body: { ...payload } },
      TrelloCardSchema
    );
  }

  updateCard(cardId: string, payload: UpdateCardPayload): Promise<TrelloCard> {
    return this.api.request(
      { method: 'PUT', path: cardPath(cardId), body: { ...payload } },
      TrelloCardSchema
    );
  }

  deleteCard(cardId: string): Promise<unknown> {
    return this.api.request(
      { method: 'DELETE', path: cardPath(cardId) },
      TrelloAnySchema
    );
  }

  copyCard(payload: CopyCardPayload): Promise<TrelloCard> {
    return this.api.request(
      {
        method: 'POST',
        path: '/cards',
        body: { ...payload, keepFromSource: payload.keepFromSource ?? 'all' },
      },
      TrelloCardSchema
    );
  }

  getComments(cardId: string): Promise<TrelloAction[]> {
    return this.api.request(
      {
        method: 'GET',
        path: cardPath(cardId, '/actions'),
        query: { filter: 'commentCard' },
      },
      TrelloActionSchema.array()
    );
  }

  addComment(cardId: string, text: string): Promise<TrelloAction> {
    return this.api.request(
      {
        method: 'POST',
        path: cardPath(cardId, '/actions/comments'),
        body: { text },
      },
      TrelloActionSchema
    );
  }

  addMember(cardId: string, memberId: string): Promise<unknown> {
    return this.api.request(
      {
        method: 'POST',
        path: cardPath(cardId, '/idMembers'),
        body: { value: memberId },
      },
      TrelloAnySchema
    );
  }

  removeMember(cardId: string, memberId: string): Promise<unknown> {
    return this.api.request(
      {
        method: 'DELETE',
        path: cardPath(cardId, `/idMembers/${encodeURIComponent(memberId)}`),
      },
      TrelloAnySchema
    );
  }
}
