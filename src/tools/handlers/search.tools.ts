import { z } from 'zod';

import type { TrelloServices } from '../../services/trello-services.js';

import { defineTool, type GatewayTool } from '../tool-definition.js';

export function createSearchTools({ search }: TrelloServices): GatewayTool[] {
  return [
    defineTool({
      name: 'search_trello',
      title: 'Search Trello',
      description:
        'Searches cards and boards. Returns at most 20 of each, matching partial words.',
      inputSchema: {
        query: z.string().trim().min(1).describe('Text to search for'),
        model_types: z
          .string()
          .min(1)
          .default('cards,boards')
          .describe('Comma-separated model types to search'),
      },
      handler: ({ query, model_types }) => search.search(query, model_types),
    }),
  ];
}
