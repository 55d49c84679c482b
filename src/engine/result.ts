export type Metadata = Record<string, unknown>;

export interface Success {
  readonly status: "success";
  readonly message: string;
  readonly metadata: Readonly<Metadata>;
}

/** The step deliberately did nothing. `message` carries the reason. */
export interface Skip {
  readonly status: "skip";
  readonly message: string;
}

export interface Failure {
  readonly status: "error";
  readonly message: string;
  /** Underlying fault, for diagnostics only. */
  readonly cause?: unknown;
}

export type Result = Success | Skip | Failure;

export function success(message: string, metadata: Metadata = {}): Success {
  const result: Success = { status: "success", message, metadata: Object.freeze({ ...metadata }) };
  return Object.freeze(result);
}

export function skip(reason: string): Skip {
  const result: Skip = { status: "skip", message: reason };
  return Object.freeze(result);
}

export function fail(message: string, cause?: unknown): Failure {
  const result: Failure = cause === undefined ? { status: "error", message } : { status: "error", message, cause };
  return Object.freeze(result);
}

export function isSuccess(result: Result): result is Success {
  return result.status === "success";
}

export function isSkip(result: Result): result is Skip {
  return result.status === "skip";
}

export function isError(result: Result): result is Failure {
  return result.status === "error";
}

export function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  if (typeof cause === "string") return cause;
  try {
    return JSON.stringify(cause);
  } catch {
    return String(cause);
  }
}
