export class InvalidWindowError extends Error {
  constructor(
    public windowMs: unknown,
    message: string
  ) {
    super(message);
    this.name = 'InvalidWindowError';
  }
}

export class ConfigError extends Error {
  constructor(
    public variables: string[],
    message: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const isInvalidWindowError = (e: unknown): e is InvalidWindowError => e instanceof InvalidWindowError;
export const isConfigError = (e: unknown): e is ConfigError => e instanceof ConfigError;
