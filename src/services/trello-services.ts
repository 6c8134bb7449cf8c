import { AttachmentService } from './attachment.service.js';
import { BoardService } from './board.service.js';
import { CardService } from './card.service.js';
import { ChecklistService } from './checklist.service.js';
import { CustomFieldService } from './custom-field.service.js';
import { ListService } from './list.service.js';
import { SearchService } from './search.service.js';
import type { TrelloApi } from './trello-client.js';

export interface TrelloServices {
  readonly boards: BoardService;
  readonly lists: ListService;
  readonly cards: CardService;
  readonly attachments: AttachmentService;
  readonly customFields: CustomFieldService;
  readonly checklists: ChecklistService;
  readonly search: SearchService;
}

export function createTrelloServices(api: TrelloApi): TrelloServices {
  return {
    boards: new BoardService(api),
    lists: new ListService(api),
    cards: new CardService(api),
    attachments: new AttachmentService(api),
    customFields: new CustomFieldService(api),
    checklists: new ChecklistService(api),
    search: new SearchService(api),
  };
}
