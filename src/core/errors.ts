/** VTube Studio 返回的 APIError */
export class ApiError extends Error {
  constructor(
    readonly errorID: number,
    message: string,
    readonly requestType?: string,
  ) {
    super(`APIError ${errorID}: ${message}`);
    this.name = 'ApiError';
  }
}

export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
