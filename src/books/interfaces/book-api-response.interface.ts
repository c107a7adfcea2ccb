/** RFC 7807 problem details, as returned by the Books API on 4xx. */
export interface ApiProblem {
  type?: string;
  title?: string;
  status?: number;
  traceId?: string;
  errors?: Record<string, string[]>;
}

interface BookApiSuccess<T> {
  ok: true;
  status: number;
  data: T;
}

interface BookApiFailure {
  ok: false;
  status: number;
  data: ApiProblem | null;
}

export type BookApiResponse<T> = BookApiSuccess<T> | BookApiFailure;

export interface OpenApiDocument {
  components?: { schemas?: Record<string, Record<string, unknown>> };
  definitions?: Record<string, Record<string, unknown>>;
  [key: string]: unknown;
}
