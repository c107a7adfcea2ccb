import { Book } from './dto/book.dto';
import type { BookClient } from './book-client.service';

export const DEFAULT_PUBLISH_DATE = '2023-01-01T00:00:00Z';

export function buildValidBookData(id: number): Book {
  return {
    id,
    title: `Creating valid book randomic${id}`,
    description: `Default Description for create book ${id}`,
    pageCount: 100,
    excerpt: `This is a default excerpt. book randomic${id}`,
    publishDate: DEFAULT_PUBLISH_DATE,
  };
}

export function randomBookId(min = 10_000, max = 99_999): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

/** An id guaranteed to be above every id the target currently reports. */
export async function findNonexistentBookId(client: BookClient): Promise<number> {
  const ids = await client.getExistingBookIds();
  return ids.length > 0 ? Math.max(...ids) + 1000 : 1;
}
