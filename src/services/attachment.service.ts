import {
  TrelloAnySchema,
  type TrelloAttachment,
  TrelloAttachmentSchema,
} from '../types/trello.types.js';

import type { TrelloApi } from './trello-client.js';

function attachmentsPath(cardId: string): string {
  return `/cards/${encodeURIComponent(cardId)}/attachments`;
}

export class AttachmentService {
  constructor(private readonly api: TrelloApi) {}

  getAttachments(cardId: string): Promise<TrelloAttachment[]> {
    return this.api.request(
      { method: 'GET', path: attachmentsPath(cardId) },
      TrelloAttachmentSchema.array()
    );
  }

  getAttachment(
    cardId: string,
    attachmentId: string
  ): Promise<TrelloAttachment> {
    return this.api.request(
      {
        method: 'GET',
        path: `${attachmentsPath(cardId)}/${encodeURIComponent(attachmentId)}`,
      },
      TrelloAttachmentSchema
    );
  }

  addAttachment(
    cardId: string,
    url: string,
    name?: string
  ): Promise<TrelloAttachment> {
    return this.api.request(
      {
        method: 'POST',
        path: attachmentsPath(cardId),
        body: name ? { url, name } : { url },
      },
      TrelloAttachmentSchema
    );
  }

  async deleteAttachment(
    cardId: string,
    attachmentId: string
  ): Promise<boolean> {
    await this.api.request(
      {
        method: 'DELETE',
        path: `${attachmentsPath(cardId)}/${encodeURIComponent(attachmentId)}`,
      },
      TrelloAnySchema
    );
    return true;
  }
}
