import 'reflect-metadata';
import { LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { BookClientModule, BookClientModuleOptions } from './books/book-client.module';
import { BookClient } from './books/book-client.service';

export * from './errors';
export * from './config/client-api.config';
export * from './config/client-api.environment';
export * from './http/https-agent';
export * from './books/dto/book.dto';
export * from './books/interfaces/book-api-response.interface';
export * from './books/book-client.service';
export * from './books/book-client.module';
export * from './books/book-payloads';

export interface CreateBookClientOptions extends BookClientModuleOptions {
  logger?: LogLevel[] | false;
}

export interface BookClientHandle {
  client: BookClient;
  close(): Promise<void>;
}

/**
 * Boots a standalone Nest context around a BookClient. Configuration errors
 * reject here, before any request is issued.
 */
export async function createBookClient(options: CreateBookClientOptions = {}): Promise<BookClientHandle> {
  const { logger = ['error', 'warn'], ...moduleOptions } = options;
  const app = await NestFactory.createApplicationContext(BookClientModule.register(moduleOptions), {
    logger,
    abortOnError: false,
  });

  return {
    client: app.get(BookClient),
    close: () => app.close(),
  };
}
