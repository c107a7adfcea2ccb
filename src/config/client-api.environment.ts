import { plainToInstance, Transform } from 'class-transformer';
import { IsIn, IsNotEmpty, IsOptional, IsString, IsUrl, validateSync } from 'class-validator';
import { ClientApiConfigError } from '../errors';

export const BOOLEAN_STRINGS = ['true', '1', 'yes', 'on', 'false', '0', 'no', 'off'];

export const URL_OPTIONS = {
  protocols: ['http', 'https'],
  require_protocol: true,
  require_tld: false,
};

export class ClientApiEnvironment {
  @IsOptional()
  @IsUrl(URL_OPTIONS)
  CLIENT_API_URL_BASE?: string;

  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsIn(BOOLEAN_STRINGS, { message: 'CLIENT_API_REJECT_UNAUTHORIZED must be a boolean flag' })
  CLIENT_API_REJECT_UNAUTHORIZED?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  CLIENT_API_CA_FILE?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  CLIENT_API_CA_CERT?: string;
}

export function validateClientApiEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const environment = plainToInstance(ClientApiEnvironment, config);
  const errors = validateSync(environment);

  if (errors.length > 0) {
    const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new ClientApiConfigError(problems);
  }

  return config;
}
