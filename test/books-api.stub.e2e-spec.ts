import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { StubBooksApiModule } from './support/books-api.stub';

describe('Stub Books API (e2e)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [StubBooksApiModule],
    }).compile();

    app = moduleFixture.createNestApplication({ logger: false });
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('serves the seeded books in id order', async () => {
    const response = await request(app.getHttpServer()).get('/api/v1/Books').expect(200);

    expect(response.body).toHaveLength(10);
    expect(response.body[0]).toEqual({
      id: 1,
      title: 'Book 1',
      description: 'Seeded description 1',
      pageCount: 100,
      excerpt: 'Seeded excerpt 1',
      publishDate: '2020-01-01T00:00:00.000Z',
    });
  });

  it('answers unknown ids with problem details', async () => {
    const response = await request(app.getHttpServer()).get('/api/v1/Books/999').expect(404);

    expect(response.body).toMatchObject({
      type: 'https://tools.ietf.org/html/rfc9110#section-15.5.5',
      title: 'Not Found',
      status: 404,
    });
    expect(response.body.traceId).toMatch(/^00-[0-9a-f]{32}-00$/);
  });

  it('rejects non-numeric ids', async () => {
    const response = await request(app.getHttpServer()).get('/api/v1/Books/abc').expect(400);

    expect(response.body).toMatchObject({
      title: 'One or more validation errors occurred.',
      status: 400,
      errors: { id: ['The value is not valid.'] },
    });
  });

  it('validates created books field by field', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/v1/Books')
      .send({ title: 'No id', pageCount: 'many', publishDate: '2024-01-01T00:00:00Z' })
      .expect(400);

    expect(Object.keys(response.body.errors).sort()).toEqual(['id', 'pageCount']);
    expect(response.body.errors.id).toEqual(['id must be an integer number']);
  });

  it('stores, updates and deletes a book', async () => {
    const server = app.getHttpServer();
    const book = {
      id: 500,
      title: 'Stub book',
      description: 'Created by the stub test',
      pageCount: 12,
      excerpt: 'Once upon a time',
      publishDate: '2024-01-01T00:00:00Z',
    };

    await request(server).post('/api/v1/Books').send({ ...book, unknownField: true }).expect(200, book);
    await request(server).get('/api/v1/Books/500').expect(200, book);
    await request(server)
      .put('/api/v1/Books/500')
      .send({ ...book, id: 501, title: 'Renamed' })
      .expect(200, { ...book, title: 'Renamed' });
    await request(server).delete('/api/v1/Books/500').expect(200);
    await request(server).get('/api/v1/Books/500').expect(404);
    await request(server).delete('/api/v1/Books/500').expect(404);
  });

  it('refuses to update a book that does not exist', async () => {
    await request(app.getHttpServer())
      .put('/api/v1/Books/777')
      .send({ id: 777, pageCount: 1, publishDate: '2024-01-01T00:00:00Z' })
      .expect(404);
  });

  it('publishes the Book schema', async () => {
    const response = await request(app.getHttpServer()).get('/swagger/v1/swagger.json').expect(200);

    expect(Object.keys(response.body.components.schemas.Book.properties)).toEqual([
      'id',
      'title',
      'description',
      'pageCount',
      'excerpt',
      'publishDate',
    ]);
  });
});
