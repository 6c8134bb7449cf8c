import { Agent, type Dispatcher, fetch } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';

import { UpstreamError } from '../errors/app-error.js';

import { getErrorMessage, isAbortError } from '../utils/error-details.js';

import { logDebug } from './logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;

export interface TrelloRequest {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query?: Readonly<Record<string, QueryValue>>;
  readonly body?: Readonly<Record<string, unknown>>;
}

export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/** Boundary the domain services talk to; tests substitute a fake. */
export interface TrelloApi {
  request: <T>(
    request: TrelloRequest,
    schema: ResponseSchema<T>
  ) => Promise<T>;
}

export interface TrelloClientOptions {
  readonly apiKey: string;
  readonly token: string;
  readonly baseUrl: URL;
  readonly timeoutMs: number;
  readonly dispatcher?: Dispatcher;
}

const ERROR_BODY_LIMIT = 200;
const DEFAULT_RETRY_AFTER_SECONDS = 60;

function parseRetryAfter(header: string | null): number {
  if (!header) return DEFAULT_RETRY_AFTER_SECONDS;
  const parsed = Number.parseInt(header, 10);
  return Number.isNaN(parsed) ? DEFAULT_RETRY_AFTER_SECONDS : parsed;
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}…` : text;
}

function parseJsonBody(text: string): unknown {
  if (!text) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

export class TrelloClient implements TrelloApi {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly base: URL;

  constructor(private readonly options: TrelloClientOptions) {
    this.ownsDispatcher = !options.dispatcher;
    this.dispatcher =
      options.dispatcher ??
      new Agent({ keepAliveTimeout: 60000, connections: 25, pipelining: 1 });
    this.base = new URL(
      options.baseUrl.href.endsWith('/')
        ? options.baseUrl.href
        : `${options.baseUrl.href}/`
    );
  }

  buildUrl(
    path: string,
    query: Readonly<Record<string, QueryValue>> = {}
  ): URL {
    const url = new URL(path.replace(/^\/+/, ''), this.base);
    url.searchParams.set('key', this.options.apiKey);
    url.searchParams.set('token', this.options.token);
    for (const [name, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(name, String(value));
    }
    return url;
  }

  async request<T>(
    request: TrelloRequest,
    schema: ResponseSchema<T>
  ): Promise<T> {
    const { method, path } = request;
    const url = this.buildUrl(path, request.query);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (request.body) headers['Content-Type'] = 'application/json';

    logDebug('Trello request', { method, path });

    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: request.body ? JSON.stringify(request.body) : undefined,
        signal: AbortSignal.timeout(this.options.timeoutMs),
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new UpstreamError(
          `Trello request timed out after ${this.options.timeoutMs}ms`,
          path,
          504,
          { method, timeout: this.options.timeoutMs }
        );
      }
      throw new UpstreamError(
        'Network error: could not reach Trello',
        path,
        undefined,
        { method, message: getErrorMessage(error) }
      );
    }

    const text = await response.text();

    if (!response.ok) {
      const details: Record<string, unknown> = { method };
      if (response.status === 429) {
        details.retryAfter = parseRetryAfter(
          response.headers.get('retry-after')
        );
      }
      throw new UpstreamError(
        `Trello API ${response.status}: ${truncate(text || response.statusText, ERROR_BODY_LIMIT)}`,
        path,
        response.status,
        details
      );
    }

    const parsed = schema.safeParse(parseJsonBody(text));
    if (!parsed.success) {
      throw new UpstreamError(
        'Unexpected Trello response shape',
        path,
        undefined,
        {
          method,
          issues: parsed.error.issues.map((issue) => issue.message),
        }
      );
    }
    return parsed.data;
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
