export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class TransportError extends Error {
  readonly endpoint: string;
  readonly status: number | null;

  constructor(endpoint: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${endpoint}: ${message}`, { cause: options.cause });
    this.name = "TransportError";
    this.endpoint = endpoint;
    this.status = options.status ?? null;
  }
}

export class DocumentParseError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "DocumentParseError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
