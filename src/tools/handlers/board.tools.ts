import { z } from 'zod';

import type { TrelloServices } from '../../services/trello-services.js';

import {
  BoardFilterSchema,
  idField,
  LabelColorSchema,
} from '../schemas.js';
import { defineTool, type GatewayTool } from '../tool-definition.js';

export function createBoardTools({ boards }: TrelloServices): GatewayTool[] {
  return [
    defineTool({
      name: 'get_board',
      title: 'Get Board',
      description: 'Retrieves a specific board by its ID.',
      inputSchema: { board_id: idField('board') },
      handler: ({ board_id }) => boards.getBoard(board_id),
    }),
    defineTool({
      name: 'get_boards',
      title: 'Get Boards',
      description: 'Retrieves the boards of the authenticated member.',
      inputSchema: { filter: BoardFilterSchema },
      handler: ({ filter }) => boards.getBoards(filter),
    }),
    defineTool({
      name: 'get_workspaces',
      title: 'Get Workspaces',
      description:
        'Retrieves the workspaces (organizations) of the authenticated member.',
      inputSchema: {},
      handler: () => boards.getWorkspaces(),
    }),
    defineTool({
      name: 'get_workspace_boards',
      title: 'Get Workspace Boards',
      description: 'Retrieves the boards of a workspace.',
      inputSchema: {
        workspace_id: idField('workspace'),
        filter: BoardFilterSchema,
      },
      handler: ({ workspace_id, filter }) =>
        boards.getWorkspaceBoards(workspace_id, filter),
    }),
    defineTool({
      name: 'get_board_labels',
      title: 'Get Board Labels',
      description: 'Retrieves all labels of a board.',
      inputSchema: { board_id: idField('board') },
      handler: ({ board_id }) => boards.getBoardLabels(board_id),
    }),
    defineTool({
      name: 'create_board_label',
      title: 'Create Board Label',
      description: 'Creates a label on a board.',
      mutating: true,
      inputSchema: {
        board_id: idField('board'),
        name: z.string().min(1).describe('Label name'),
        color: LabelColorSchema.optional(),
      },
      handler: ({ board_id, name, color }) =>
        boards.createBoardLabel(board_id, { name, color }),
    }),
    defineTool({
      name: 'get_board_members',
      title: 'Get Board Members',
      description:
        'Retrieves the members of a board. Email is only present when the token may read it.',
      inputSchema: { board_id: idField('board') },
      handler: ({ board_id }) => boards.getBoardMembers(board_id),
    }),
    defineTool({
      name: 'get_me',
      title: 'Get Me',
      description: 'Retrieves the profile of the authenticated member.',
      inputSchema: {},
      handler: () => boards.getMe(),
    }),
    defineTool({
      name: 'get_board_actions',
      title: 'Get Board Actions',
      description: 'Retrieves recent activity on a board.',
      inputSchema: {
        board_id: idField('board'),
        filter: z
          .string()
          .min(1)
          .default('all')
          .describe("Comma-separated action types, or 'all'"),
        limit: z
          .number()
          .int()
          .min(1)
          .max(1000)
          .default(50)
          .describe('Maximum number of actions (1-1000)'),
      },
      handler: ({ board_id, filter, limit }) =>
        boards.getBoardActions(board_id, filter, limit),
    }),
    defineTool({
      name: 'create_board',
      title: 'Create Board',
      description: 'Creates a new board.',
      mutating: true,
      inputSchema: {
        name: z.string().min(1).describe('Board name'),
        desc: z.string().optional().describe('Board description'),
        idOrganization: z
          .string()
          .optional()
          .describe('Workspace to create the board in'),
        defaultLists: z
          .boolean()
          .default(true)
          .describe('Create the default To Do / Doing / Done lists'),
        prefs_background: z
          .string()
          .default('blue')
          .describe('Background color or image'),
        prefs_permissionLevel: z
          .enum(['private', 'org', 'public'])
          .default('private')
          .describe('Who can see the board'),
      },
      handler: (payload) => boards.createBoard(payload),
    }),
    defineTool({
      name: 'update_board',
      title: 'Update Board',
      description: 'Updates the attributes of a board.',
      mutating: true,
      inputSchema: {
        board_id: idField('board'),
        name: z.string().min(1).optional().describe('New board name'),
        desc: z.string().optional().describe('New board description'),
        closed: z.boolean().optional().describe('Archive or reopen the board'),
        prefs_background: z
          .string()
          .optional()
          .describe('Background color or image'),
      },
      handler: ({ board_id, ...payload }) =>
        boards.updateBoard(board_id, payload),
    }),
  ];
}
