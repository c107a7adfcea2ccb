import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { AxiosError, AxiosResponse, Method, isAxiosError } from 'axios';
import { Agent as HttpsAgent } from 'https';
import { lastValueFrom } from 'rxjs';
import { ClientApiConfig } from '../config/client-api.config';
import { BookApiError, BookApiTransportError } from '../errors';
import { buildHttpsAgent, isCertValidationError } from '../http/https-agent';
import { Book, RawBookPayload } from './dto/book.dto';
import { ApiProblem, BookApiResponse, OpenApiDocument } from './interfaces/book-api-response.interface';

export const BOOKS_PATH = '/api/v1/Books';
export const SCHEMA_PATH = '/swagger/v1/swagger.json';

export type BookId = number | string;

@Injectable()
export class BookClient implements OnModuleDestroy {
  private readonly logger = new Logger(BookClient.name);
  private readonly httpsAgent?: HttpsAgent;

  constructor(
    private readonly httpService: HttpService,
    @Inject(ClientApiConfig) private readonly config: ClientApiConfig,
  ) {
    this.httpsAgent = buildHttpsAgent(config.tls, this.logger);
  }

  get urlBase(): string {
    return this.config.urlBase;
  }

  listBooks(): Promise<BookApiResponse<Book[]>> {
    return this.send<Book[]>('GET', BOOKS_PATH);
  }

  getBook(id: BookId): Promise<BookApiResponse<Book>> {
    return this.send<Book>('GET', this.bookPath(id));
  }

  createBook(book: RawBookPayload): Promise<BookApiResponse<Book>> {
    return this.send<Book>('POST', BOOKS_PATH, book);
  }

  updateBook(id: BookId, book: RawBookPayload): Promise<BookApiResponse<Book>> {
    return this.send<Book>('PUT', this.bookPath(id), book);
  }

  deleteBook(id: BookId): Promise<BookApiResponse<null>> {
    return this.send<null>('DELETE', this.bookPath(id));
  }

  getSchema(): Promise<BookApiResponse<OpenApiDocument>> {
    return this.send<OpenApiDocument>('GET', SCHEMA_PATH);
  }

  async getBookSchema(): Promise<Record<string, unknown>> {
    const response = await this.getSchema();
    if (!response.ok) {
      throw new BookApiError(`Failed to fetch the API schema (${response.status})`, response.status, response.data);
    }

    const document = response.data;
    return document.components?.schemas?.Book ?? document.definitions?.Book ?? {};
  }

  async getExistingBookIds(): Promise<number[]> {
    const response = await this.listBooks();
    if (!response.ok) {
      throw new BookApiError(`Failed to list books (${response.status})`, response.status, response.data);
    }

    const books: unknown = response.data;
    if (!Array.isArray(books)) {
      throw new BookApiError(`Book list is not an array (${response.status})`, response.status, books);
    }

    return response.data.map((book) => book.id);
  }

  async bookExists(id: number): Promise<boolean> {
    const ids = await this.getExistingBookIds();
    return ids.includes(id);
  }

  onModuleDestroy(): void {
    this.httpsAgent?.destroy();
  }

  url(path: string): string {
    return `${this.config.urlBase}/${path.replace(/^\/+/, '')}`;
  }

  private bookPath(id: BookId): string {
    return `${BOOKS_PATH}/${encodeURIComponent(String(id))}`;
  }

  private async send<T>(method: Method, path: string, data?: unknown): Promise<BookApiResponse<T>> {
    const url = this.url(path);
    let response: AxiosResponse<T>;

    try {
      response = await lastValueFrom(
        this.httpService.request<T>({
          method,
          url,
          data,
          headers: { Accept: 'application/json' },
          httpsAgent: this.httpsAgent,
          transformResponse: parseBody,
          validateStatus: () => true,
        }),
      );
    } catch (error) {
      this.handleTransportError(error, method, url);
    }

    this.logger.debug(`${method} ${path} -> ${response.status}`);

    if (response.status >= 200 && response.status < 300) {
      return { ok: true, status: response.status, data: response.data };
    }

    return { ok: false, status: response.status, data: toProblem(response.data) };
  }

  private handleTransportError(error: unknown, method: string, url: string): never {
    if (!isAxiosError(error)) {
      throw error;
    }

    const reason = this.describeAxiosError(error);
    this.logger.error(`${method} ${url} failed: ${reason}`, error.stack);

    if (isCertValidationError(error.code)) {
      throw new BookApiTransportError(
        'SSL certificate validation failed for the Books API. Provide a trusted CA bundle via CLIENT_API_CA_FILE/CLIENT_API_CA_CERT or disable validation (CLIENT_API_REJECT_UNAUTHORIZED=false) in development environments.',
        method,
        url,
        error.code,
      );
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      throw new BookApiTransportError('Request to the Books API timed out', method, url, error.code);
    }

    throw new BookApiTransportError(`Unable to reach the Books API (${reason})`, method, url, error.code);
  }

  private describeAxiosError(error: AxiosError): string {
    if (error.code) {
      return error.code;
    }
    return error.message;
  }
}

/** Empty bodies become null; anything that is not JSON is kept as text. */
export function parseBody(raw: unknown): unknown {
  if (typeof raw !== 'string') {
    return raw ?? null;
  }
  if (raw.trim() === '') {
    return null;
  }

  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toProblem(body: unknown): ApiProblem | null {
  if (!isRecord(body)) {
    return body === null || body === undefined ? null : { title: String(body) };
  }

  const problem: ApiProblem = {};
  if (typeof body.type === 'string') problem.type = body.type;
  if (typeof body.title === 'string') problem.title = body.title;
  if (typeof body.status === 'number') problem.status = body.status;
  if (typeof body.traceId === 'string') problem.traceId = body.traceId;
  if (isRecord(body.errors)) {
    problem.errors = Object.fromEntries(
      Object.entries(body.errors).map(([field, messages]) => [
        field,
        Array.isArray(messages) ? messages.map(String) : [String(messages)],
      ]),
    );
  }

  return problem;
}
