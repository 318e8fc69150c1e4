export type RosterErrorCode =
  | "INDEX_OUT_OF_RANGE"
  | "NOT_FOUND"
  | "CORRUPT_DATA"
  | "IO_ERROR"
  | "INVALID_RECORD";

export class RosterError extends Error {
  readonly code: RosterErrorCode;

  constructor(code: RosterErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class IndexOutOfRangeError extends RosterError {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number) {
    super(
      "INDEX_OUT_OF_RANGE",
      `Index ${index} out of range. The store has ${size} record(s).`,
    );
    this.index = index;
    this.size = size;
  }
}

export class NotFoundError extends RosterError {
  readonly identifier: string;

  constructor(identifier: string, message?: string) {
    super(
      "NOT_FOUND",
      message ?? `Student "${identifier}" not found. Run \`roster list\` to see positions and IDs.`,
    );
    this.identifier = identifier;
  }
}

export class CorruptDataError extends RosterError {
  readonly path: string;

  constructor(path: string, detail: string, options?: ErrorOptions) {
    super("CORRUPT_DATA", `Data file ${path} is corrupt: ${detail}`, options);
    this.path = path;
  }
}

export class StorageIOError extends RosterError {
  readonly path: string;

  constructor(path: string, action: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("IO_ERROR", `Failed to ${action} ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

export class InvalidRecordError extends RosterError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super("INVALID_RECORD", `Invalid student record: ${problems.join("; ")}`);
    this.problems = problems;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
