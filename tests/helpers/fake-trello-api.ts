import type {
  ResponseSchema,
  TrelloApi,
  TrelloRequest,
} from '../../src/services/trello-client.js';

export type FakeResponder = (request: TrelloRequest) => unknown;

/** Records every request and answers through the caller's responder. */
export class FakeTrelloApi implements TrelloApi {
  readonly requests: TrelloRequest[] = [];

  constructor(private readonly respond: FakeResponder = () => ({})) {}

  async request<T>(
    request: TrelloRequest,
    schema: ResponseSchema<T>
  ): Promise<T> {
    this.requests.push(request);
    return schema.parse(this.respond(request));
  }

  last(): TrelloRequest | undefined {
    return this.requests.at(-1);
  }
}
