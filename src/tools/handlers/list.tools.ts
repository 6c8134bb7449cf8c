import { z } from 'zod';

import type { TrelloServices } from '../../services/trello-services.js';

import { idField, PositionSchema } from '../schemas.js';
import { defineTool, type GatewayTool } from '../tool-definition.js';

export function createListTools({ lists }: TrelloServices): GatewayTool[] {
  return [
    defineTool({
      name: 'get_list',
      title: 'Get List',
      description: 'Retrieves a specific list by its ID.',
      inputSchema: { list_id: idField('list') },
      handler: ({ list_id }) => lists.getList(list_id),
    }),
    defineTool({
      name: 'get_lists',
      title: 'Get Lists',
      description: 'Retrieves all lists on a board.',
      inputSchema: { board_id: idField('board') },
      handler: ({ board_id }) => lists.getLists(board_id),
    }),
    defineTool({
      name: 'create_list',
      title: 'Create List',
      description: 'Creates a list on a board.',
      mutating: true,
      inputSchema: {
        board_id: idField('board'),
        name: z.string().min(1).describe('List name'),
        pos: PositionSchema.optional(),
      },
      handler: ({ board_id, name, pos }) =>
        lists.createList({ idBoard: board_id, name, pos }),
    }),
    defineTool({
      name: 'update_list',
      title: 'Update List',
      description: 'Renames, moves or archives a list.',
      mutating: true,
      inputSchema: {
        list_id: idField('list'),
        name: z.string().min(1).optional().describe('New list name'),
        closed: z.boolean().optional().describe('Archive or reopen the list'),
        pos: PositionSchema.optional(),
      },
      handler: ({ list_id, ...payload }) => lists.updateList(list_id, payload),
    }),
    defineTool({
      name: 'delete_list',
      title: 'Archive List',
      description:
        'Archives a list. Trello does not delete lists; archived lists can be reopened with update_list.',
      mutating: true,
      inputSchema: { list_id: idField('list') },
      handler: ({ list_id }) => lists.archiveList(list_id),
    }),
  ];
}
