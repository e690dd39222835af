/** @description input file missing or unreadable */
export class InputError extends Error {
  name = 'InputError'
  constructor(
    public path: string,
    cause?: unknown,
  ) {
    super(`cannot read input file: ${path}` + causeMessage(cause))
  }
}

/** @description output file cannot be written */
export class OutputError extends Error {
  name = 'OutputError'
  constructor(
    public path: string,
    cause?: unknown,
  ) {
    super(`cannot write output file: ${path}` + causeMessage(cause))
  }
}

/** @description invalid command line arguments */
export class UsageError extends Error {
  name = 'UsageError'
}

/** @description malformed corpus record, the line is skipped */
export class RecordParseError extends Error {
  name = 'RecordParseError'
  constructor(
    public line_number: number,
    public line: string,
    public reason: string,
  ) {
    super(`line ${line_number}: ${reason}: ${JSON.stringify(line)}`)
  }
}

/**
 * @description invalid UTF-8 byte sequence, the line is skipped.
 * `bytes` is a copy of the line, not a view into the input.
 */
export class DecodeError extends Error {
  name = 'DecodeError'
  constructor(
    public line_number: number,
    public bytes: Uint8Array,
  ) {
    super(`line ${line_number}: invalid UTF-8 sequence`)
  }
}

export type SkipError = RecordParseError | DecodeError

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) return ` (${cause.message})`
  if (cause === undefined) return ''
  return ` (${String(cause)})`
}
