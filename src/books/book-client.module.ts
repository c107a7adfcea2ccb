import { DynamicModule, Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ClientApiConfig } from '../config/client-api.config';
import { validateClientApiEnvironment } from '../config/client-api.environment';
import { BookClient } from './book-client.service';

export interface BookClientModuleOptions {
  /** Overrides `CLIENT_API_URL_BASE`. */
  urlBase?: string;
  /** Load a `.env` file from the working directory. Defaults to true. */
  envFile?: boolean;
}

@Module({})
export class BookClientModule {
  static register(options: BookClientModuleOptions = {}): DynamicModule {
    return {
      module: BookClientModule,
      imports: [
        ConfigModule.forRoot({
          ignoreEnvFile: options.envFile === false,
          validate: validateClientApiEnvironment,
        }),
        HttpModule,
      ],
      providers: [
        {
          provide: ClientApiConfig,
          inject: [ConfigService],
          useFactory: (configService: ConfigService) =>
            ClientApiConfig.fromEnv((key) => configService.get<string>(key), options.urlBase),
        },
        BookClient,
      ],
      exports: [BookClient, ClientApiConfig],
    };
  }
}
