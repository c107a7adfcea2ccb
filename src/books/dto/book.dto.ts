import { IsDateString, IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export interface Book {
  id: number;
  title: string | null;
  description: string | null;
  pageCount: number;
  excerpt: string | null;
  publishDate: string;
}

export type BookPayload = Partial<Book>;

/** Arbitrary JSON, for exercising validation on the remote side. */
export type RawBookPayload = BookPayload | Record<string, unknown>;

export class BookDto implements Book {
  @IsInt()
  id!: number;

  @IsOptional()
  @IsString()
  title!: string | null;

  @IsOptional()
  @IsString()
  description!: string | null;

  @IsInt()
  pageCount!: number;

  @IsOptional()
  @IsString()
  excerpt!: string | null;

  @IsNotEmpty()
  @IsDateString()
  publishDate!: string;
}
