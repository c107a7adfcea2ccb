import { isURL } from 'class-validator';
import { ClientApiConfigError } from '../errors';
import { URL_OPTIONS } from './client-api.environment';

export const DEFAULT_URL_BASE = 'https://fakerestapi.azurewebsites.net';

export interface ClientApiTlsOptions {
  rejectUnauthorized?: boolean;
  caFile?: string;
  caCert?: string;
}

export type EnvironmentReader = (key: string) => string | undefined;

export function normalizeBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['false', '0', 'no', 'off'].includes(normalized)) {
      return false;
    }
  }

  return undefined;
}

export class ClientApiConfig {
  private constructor(
    private readonly baseUrl: string,
    readonly tls: Readonly<ClientApiTlsOptions>,
  ) {
    Object.freeze(this);
  }

  get urlBase(): string {
    return this.baseUrl;
  }

  static create(urlBase: string, tls: ClientApiTlsOptions = {}): ClientApiConfig {
    const trimmed = urlBase.trim();

    if (!trimmed) {
      throw new ClientApiConfigError(['base URL is not set']);
    }
    if (!isURL(trimmed, URL_OPTIONS)) {
      throw new ClientApiConfigError([`base URL "${trimmed}" is not a well-formed http(s) URL`]);
    }

    return new ClientApiConfig(trimmed.replace(/\/+$/, ''), { ...tls });
  }

  static fromEnv(read: EnvironmentReader, urlBase?: string): ClientApiConfig {
    return ClientApiConfig.create(urlBase ?? read('CLIENT_API_URL_BASE') ?? DEFAULT_URL_BASE, {
      rejectUnauthorized: normalizeBoolean(read('CLIENT_API_REJECT_UNAUTHORIZED')),
      caFile: read('CLIENT_API_CA_FILE'),
      caCert: read('CLIENT_API_CA_CERT'),
    });
  }
}
