/** Startup/configuration problem; fatal before any run starts. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** Transient failure of an external signal source. */
export class ProviderError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(
    provider: string,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(`[${provider}] ${message}`, { cause: options?.cause });
    this.name = "ProviderError";
    this.provider = provider;
    this.status = options?.status;
  }
}

/** Reasoning output that does not match the expected shape. */
export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
  }
}
