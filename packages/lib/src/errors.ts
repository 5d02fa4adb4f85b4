export type StrataErrorCode =
  | typeof StrataError.Config
  | typeof StrataError.InvalidTask
  | typeof StrataError.Dependency
  | typeof StrataError.TaskNotFound
  | typeof StrataError.File
  | typeof StrataError.CommandIo
  | typeof StrataError.CommandTimeout
  | typeof StrataError.TaskFailed

export class StrataError extends Error {
  readonly code: StrataErrorCode
  readonly taskId?: string
  constructor(
    message: string,
    code: StrataErrorCode,
    taskId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = "StrataError"
    this.code = code
    this.taskId = taskId
  }

  static Config = "config" as const
  static InvalidTask = "invalid-task" as const
  static Dependency = "dependency" as const
  static TaskNotFound = "task-not-found" as const
  static File = "file" as const
  static CommandIo = "command-io" as const
  static CommandTimeout = "command-timeout" as const
  static TaskFailed = "task-failed" as const
}

export function isStrataError(value: unknown): value is StrataError {
  return value instanceof StrataError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
