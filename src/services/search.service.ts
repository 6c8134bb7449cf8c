import {
  type TrelloBoard,
  type TrelloCard,
  TrelloSearchResultSchema,
} from '../types/trello.types.js';

import type { TrelloApi } from './trello-client.js';

export const SEARCH_RESULT_LIMIT = 20;

export interface SearchResults {
  readonly cards: TrelloCard[];
  readonly boards: TrelloBoard[];
}

export class SearchService {
  constructor(private readonly api: TrelloApi) {}

  async search(
    query: string,
    modelTypes = 'cards,boards'
  ): Promise<SearchResults> {
    const result = await this.api.request(
      {
        method: 'GET',
        path: '/search',
        query: {
          query,
          modelTypes,
          partial: true,
          cards_limit: SEARCH_RESULT_LIMIT,
          boards_limit: SEARCH_RESULT_LIMIT,
        },
      },
      TrelloSearchResultSchema
    );
    return { cards: result.cards, boards: result.boards };
  }
}
