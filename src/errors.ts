export class ConfigError extends Error {
  readonly check: string | null;

  constructor(message: string, options: { check?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.check = options.check ?? null;
  }
}

export function toErrorMessage(error: unknown) {
  return error instanceof Error ? error.message : typeof error === "string" ? error : JSON.stringify(error);
}
