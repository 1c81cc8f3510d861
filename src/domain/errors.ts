export type ErrorKind =
  | "connection"
  | "timeout"
  | "auth"
  | "malformed_data"
  | "cancelled"
  | "internal";

export type MonitorErrorCode =
  | "auth.invalid_credentials"
  | "auth.protocol_mismatch"
  | "auth.transport"
  | "client.authentication_failed"
  | "client.section_unavailable"
  | "client.malformed_response"
  | "discovery.no_slots_found"
  | "orchestrator.partial_failure"
  | "orchestrator.total_failure"
  | "orchestrator.cancelled"
  | "orchestrator.pool_failure"
  | "http.timeout"
  | "http.network_error"
  | "monitor.not_connected"
  | "monitor.unexpected_error"
  | "monitor.unknown_error"
  | "settings.invalid_number"
  | "settings.invalid_host"
  | "settings.unsupported_version";

export interface TechnicalError {
  status?: number;
  code: MonitorErrorCode;
  message: string;
  hint?: string;
  cause?: unknown;
}

export class MonitorError extends Error implements TechnicalError {
  status?: number;
  code: MonitorErrorCode;
  hint?: string;
  cause?: unknown;

  constructor(input: TechnicalError) {
    super(input.message);
    this.name = "MonitorError";
    this.status = input.status;
    this.code = input.code;
    this.hint = input.hint;
    this.cause = input.cause;
  }
}

const KIND_BY_CODE: Record<MonitorErrorCode, ErrorKind> = {
  "auth.invalid_credentials": "auth",
  "auth.protocol_mismatch": "malformed_data",
  "auth.transport": "connection",
  "client.authentication_failed": "auth",
  "client.section_unavailable": "connection",
  "client.malformed_response": "malformed_data",
  "discovery.no_slots_found": "connection",
  "orchestrator.partial_failure": "connection",
  "orchestrator.total_failure": "connection",
  "orchestrator.cancelled": "cancelled",
  "orchestrator.pool_failure": "internal",
  "http.timeout": "timeout",
  "http.network_error": "connection",
  "monitor.not_connected": "connection",
  "monitor.unexpected_error": "internal",
  "monitor.unknown_error": "internal",
  "settings.invalid_number": "internal",
  "settings.invalid_host": "internal",
  "settings.unsupported_version": "internal"
};

// Wrappers whose kind is the kind of the error they carry as cause.
const KIND_FROM_CAUSE = new Set<MonitorErrorCode>(["auth.transport", "orchestrator.total_failure"]);

export function errorKindOf(error: TechnicalError): ErrorKind {
  if (KIND_FROM_CAUSE.has(error.code) && error.cause instanceof MonitorError) {
    return errorKindOf(error.cause);
  }
  return KIND_BY_CODE[error.code];
}

export function asTechnicalError(error: unknown): TechnicalError {
  if (error instanceof MonitorError) {
    return {
      status: error.status,
      code: error.code,
      message: error.message,
      hint: error.hint,
      cause: error.cause
    };
  }

  if (error instanceof Error) {
    return {
      code: "monitor.unexpected_error",
      message: error.message,
      cause: error
    };
  }

  return {
    code: "monitor.unknown_error",
    message: String(error)
  };
}
