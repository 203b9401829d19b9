/**
 * Error types raised by the router and its collaborators.
 *
 * Every error carries a stable `code` so callers (and the stdio server) can
 * branch on the kind without `instanceof` chains across module copies.
 */

export const ErrorCode = {
  CONFIG_ERROR: 'CONFIG_ERROR',
  UNKNOWN_SERVER: 'UNKNOWN_SERVER',
  CONNECT_ERROR: 'CONNECT_ERROR',
  CALL_ERROR: 'CALL_ERROR',
  CLOSE_ERROR: 'CLOSE_ERROR',
  MATCH_ERROR: 'MATCH_ERROR',
  GATEWAY_ERROR: 'GATEWAY_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class RouterError extends Error {
  readonly code: ErrorCodeType;

  constructor(code: ErrorCodeType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing runtime parameter, malformed server entry or unusable tool index */
export class ConfigurationError extends RouterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.CONFIG_ERROR, message, options);
  }
}

export class UnknownServerError extends RouterError {
  constructor(readonly serverName: string) {
    super(ErrorCode.UNKNOWN_SERVER, `Server "${serverName}" is not defined in the configuration`);
  }
}

export class ConnectError extends RouterError {
  constructor(readonly serverName: string, cause: unknown) {
    super(ErrorCode.CONNECT_ERROR, `Failed to connect to server "${serverName}": ${describe(cause)}`, { cause });
  }
}

export class CallError extends RouterError {
  constructor(readonly serverName: string, readonly toolName: string, cause: unknown) {
    super(
      ErrorCode.CALL_ERROR,
      `Tool "${toolName}" failed on server "${serverName}": ${describe(cause)}`,
      { cause }
    );
  }
}

export interface CloseFailure {
  serverName: string;
  error: unknown;
}

/** Raised by shutdown once every close attempt has finished and at least one failed */
export class CloseError extends RouterError {
  constructor(readonly failures: CloseFailure[], readonly closed: string[]) {
    const summary = failures.map(f => `${f.serverName}: ${describe(f.error)}`).join('; ');
    super(
      ErrorCode.CLOSE_ERROR,
      `Failed to close ${failures.length} connection(s): ${summary}`,
      { cause: failures[0]?.error }
    );
  }
}

export class MatchError extends RouterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.MATCH_ERROR, message, options);
  }
}

export class GatewayError extends RouterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.GATEWAY_ERROR, message, options);
  }
}
