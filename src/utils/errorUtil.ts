export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class JobSourceError extends Error {
  constructor(
    message: string,
    readonly method: string,
    readonly url: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "JobSourceError";
  }
}

export const toErrorMessage = (e: unknown): string => {
  if (e instanceof Error) return e.message;
  return String(e);
};
