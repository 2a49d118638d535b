export type NodeErrorCode =
  | "DESERIALIZATION_ERROR"
  | "PROTOCOL_VIOLATION"
  | "WRITE_ERROR";

export class NodeError extends Error {
  readonly code: NodeErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: NodeErrorCode,
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "NodeError";
    this.code = code;
    this.context = context;
  }

  withContext(extra: Record<string, unknown>): NodeError {
    return new NodeError(
      this.code,
      this.message,
      { ...this.context, ...extra },
      this.cause,
    );
  }
}
