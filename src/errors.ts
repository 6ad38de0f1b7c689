export type ErrorKind =
  | "ConfigNotFound"
  | "ConfigMalformed"
  | "InvalidInput"
  | "RoomNotFound"
  | "NoSensorsConfigured"
  | "QueryExecutionError"
  | "DependencyUnavailable";

export type QueryStage = "topology" | "timeseries";
export type QueryFailureReason = "unreachable" | "rejected" | "timeout" | "cancelled";

export interface ToolError {
  kind: ErrorKind;
  message: string;
  stage?: QueryStage;
  reason?: QueryFailureReason;
  details?: Record<string, unknown>;
}

export type ToolResult<T> = { ok: true; data: T } | { ok: false; error: ToolError };

export abstract class ToolkitError extends Error {
  abstract readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }

  toJSON(): ToolError {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.details ? { details: this.details } : {})
    };
  }
}

export class ConfigNotFoundError extends ToolkitError {
  readonly kind = "ConfigNotFound";

  constructor(readonly candidates: string[]) {
    super(`No readable sensor config found (tried: ${candidates.join(", ")})`, { candidates });
  }
}

export class ConfigMalformedError extends ToolkitError {
  readonly kind = "ConfigMalformed";

  constructor(sourcePath: string, problem: string) {
    super(`Sensor config at ${sourcePath} is malformed: ${problem}`, { sourcePath });
  }
}

export class InvalidInputError extends ToolkitError {
  readonly kind = "InvalidInput";

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}

export class RoomNotFoundError extends ToolkitError {
  readonly kind = "RoomNotFound";

  constructor(roomName: string) {
    super(`No room matching '${roomName}' exists in the building topology`, { roomName });
  }
}

export class NoSensorsConfiguredError extends ToolkitError {
  readonly kind = "NoSensorsConfigured";

  constructor(scope: string, details?: Record<string, unknown>) {
    super(`No sensors configured for ${scope}`, details);
  }
}

export class QueryExecutionError extends ToolkitError {
  readonly kind = "QueryExecutionError";

  constructor(
    readonly stage: QueryStage,
    readonly reason: QueryFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${stage} query failed (${reason}): ${message}`, undefined, options);
  }

  override toJSON(): ToolError {
    return { ...super.toJSON(), stage: this.stage, reason: this.reason };
  }
}

export class DependencyUnavailableError extends ToolkitError {
  readonly kind = "DependencyUnavailable";

  constructor(readonly dependency: QueryStage, reason: string) {
    super(`${dependency} store unavailable: ${reason}`, { dependency });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Converts any failure into the public error envelope. Failures that are not
 * toolkit errors were not attributed to a stage by the code that raised them.
 */
export function toToolError(err: unknown): ToolError {
  if (err instanceof ToolkitError) return err.toJSON();
  return { kind: "QueryExecutionError", message: errorMessage(err), reason: "rejected" };
}
