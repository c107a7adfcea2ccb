export class BookHarnessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ClientApiConfigError extends BookHarnessError {
  constructor(readonly problems: string[]) {
    super(`Invalid Books API configuration: ${problems.join('; ')}`);
  }
}

export class BookApiTransportError extends BookHarnessError {
  constructor(
    message: string,
    readonly method: string,
    readonly url: string,
    readonly code?: string,
  ) {
    super(message);
  }
}

export class BookApiError extends BookHarnessError {
  constructor(
    message: string,
    readonly status: number,
    readonly body: unknown,
  ) {
    super(message);
  }
}
