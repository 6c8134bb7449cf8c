import {
  TrelloActionSchema,
  type TrelloAction,
  type TrelloBoard,
  TrelloBoardSchema,
  type TrelloLabel,
  TrelloLabelSchema,
  type TrelloMember,
  TrelloMemberSchema,
  type TrelloWorkspace,
  TrelloWorkspaceSchema,
} from '../types/trello.types.js';

import type { TrelloApi } from './trello-client.js';

export type BoardFilter =
  | 'all'
  | 'closed'
  | 'members'
  | 'open'
  | 'organization'
  | 'public'
  | 'starred';

export type CreateLabelPayload = {
  name: string;
  color?: string | undefined;
};

export type CreateBoardPayload = {
  name: string;
  desc?: string | undefined;
  idOrganization?: string | undefined;
  defaultLists?: boolean | undefined;
  prefs_background?: string | undefined;
  prefs_permissionLevel?: 'private' | 'org' | 'public' | undefined;
};

export type UpdateBoardPayload = {
  name?: string | undefined;
  desc?: string | undefined;
  closed?: boolean | undefined;
  prefs_background?: string | undefined;
};

export class BoardService {
  constructor(private readonly api: TrelloApi) {}

  getBoard(boardId: string): Promise<TrelloBoard> {
    return this.api.request(
      { method: 'GET', path: `/boards/${encodeURIComponent(boardId)}` },
      TrelloBoardSchema
    );
  }

  getBoards(
    filter: BoardFilter = 'open',
    memberId = 'me'
  ): Promise<TrelloBoard[]> {
    return this.api.request(
      {
        method: 'GET',
        path: `/members/${encodeURIComponent(memberId)}/boards`,
        query: { filter },
      },
      TrelloBoardSchema.array()
    );
  }

  getWorkspaces(): Promise<TrelloWorkspace[]> {
    return this.api.request(
      { method: 'GET', path: '/members/me/organizations' },
      TrelloWorkspaceSchema.array()
    );
  }

  getWorkspaceBoards(
    workspaceId: string,
    filter: BoardFilter = 'open'
  ): Promise<TrelloBoard[]> {
    return this.api.request(
      {
        method: 'GET',
        path: `/organizations/${encodeURIComponent(workspaceId)}/boards`,
        query: { filter },
      },
      TrelloBoardSchema.array()
    );
  }

  getBoardLabels(boardId: string): Promise<TrelloLabel[]> {
    return this.api.request(
      { method: 'GET', path: `/boards/${encodeURIComponent(boardId)}/labels` },
      TrelloLabelSchema.array()
    );
  }

  createBoardLabel(
    boardId: string,
    payload: CreateLabelPayload
  ): Promise<TrelloLabel> {
    return this.api.request(
      {
        method: 'POST',
        path: `/boards/${encodeURIComponent(boardId)}/labels`,
        body: { ...payload },
      },
      TrelloLabelSchema
    );
  }

  getBoardMembers(boardId: string): Promise<TrelloMember[]> {
    return this.api.request(
      { method: 'GET', path: `/boards/${encodeURIComponent(boardId)}/members` },
      TrelloMemberSchema.array()
    );
  }

  getMe(): Promise<TrelloMember> {
    return this.api.request(
      { method: 'GET', path: '/members/me' },
      TrelloMemberSchema
    );
  }

  getBoardActions(
    boardId: string,
    filter = 'all',
    limit = 50
  ): Promise<TrelloAction[]> {
    return this.api.request(
      {
        method: 'GET',
        path: `/boards/${encodeURIComponent(boardId)}/actions`,
        query: { filter, limit },
      },
      TrelloActionSchema.array()
    );
  }

  createBoard(payload: CreateBoardPayload): Promise<TrelloBoard> {
    return this.api.request(
      { method: 'POST', path: '/boards', body: { ...payload } },
      TrelloBoardSchema
    );
  }

  updateBoard(
    boardId: string,
    payload: UpdateBoardPayload
  ): Promise<TrelloBoard> {
    return this.api.request(
      {
        method: 'PUT',
        path: `/boards/${encodeURIComponent(boardId)}`,
        body: { ...payload },
      },
      TrelloBoardSchema
    );
  }
}
