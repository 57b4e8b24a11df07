/**
 * Error types for the task system
 *
 * Construction errors are thrown and leave no usable system behind.
 * Execution errors are returned inside an `err(...)` result and only abort
 * the run that produced them.
 */

/**
 * String codes carried by every {@link TaskSystemError}.
 */
export const TaskSystemErrorCodes = {
  /** A task declaration, precedence map or option failed validation */
  INVALID_DECLARATION: 'INVALID_DECLARATION',
  /** Two tasks share a name */
  DUPLICATE_TASK_NAME: 'DUPLICATE_TASK_NAME',
  /** A precedence names a task that was never declared */
  UNKNOWN_TASK_REFERENCE: 'UNKNOWN_TASK_REFERENCE',
  /** The explicit precedences alone contain a cycle */
  CYCLE_DETECTED: 'CYCLE_DETECTED',
  /** A task's run operation threw or rejected */
  TASK_EXECUTION_FAILED: 'TASK_EXECUTION_FAILED',
  /** A task touched a variable outside its declared access sets */
  UNDECLARED_ACCESS: 'UNDECLARED_ACCESS',
} as const;

export type TaskSystemErrorCode = (typeof TaskSystemErrorCodes)[keyof typeof TaskSystemErrorCodes];

export class TaskSystemError extends Error {
  public readonly code: TaskSystemErrorCode;

  constructor(message: string, code: TaskSystemErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TaskSystemError';
    this.code = code;
  }
}

export class InvalidDeclarationError extends TaskSystemError {
  /** One entry per failed check, `path: message` */
  public readonly issues: readonly string[];

  constructor(subject: string, issues: readonly string[]) {
    super(`Invalid ${subject}: ${issues.join('; ')}`, TaskSystemErrorCodes.INVALID_DECLARATION);
    this.name = 'InvalidDeclarationError';
    this.issues = issues;
  }
}

export class DuplicateTaskNameError extends TaskSystemError {
  public readonly taskName: string;

  constructor(taskName: string) {
    super(`Duplicate task name "${taskName}"`, TaskSystemErrorCodes.DUPLICATE_TASK_NAME);
    this.name = 'DuplicateTaskNameError';
    this.taskName = taskName;
  }
}

export class UnknownTaskReferenceError extends TaskSystemError {
  public readonly taskName: string;
  /** Task whose precedence entry holds the reference, if the reference is a prerequisite */
  public readonly referencedBy?: string;

  constructor(taskName: string, referencedBy?: string) {
    super(
      referencedBy === undefined
        ? `Precedences reference unknown task "${taskName}"`
        : `Task "${referencedBy}" depends on unknown task "${taskName}"`,
      TaskSystemErrorCodes.UNKNOWN_TASK_REFERENCE
    );
    this.name = 'UnknownTaskReferenceError';
    this.taskName = taskName;
    this.referencedBy = referencedBy;
  }
}

export class CycleDetectedError extends TaskSystemError {
  /** First edge of the cycle: `taskA` must precede `taskB` */
  public readonly taskA: string;
  public readonly taskB: string;
  /** Task names along the cycle, each preceding the next and the last preceding the first */
  public readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    const [first = '', second = first] = cycle;
    super(
      `Cyclic precedences: ${[...cycle, first].join(' -> ')}`,
      TaskSystemErrorCodes.CYCLE_DETECTED
    );
    this.name = 'CycleDetectedError';
    this.taskA = first;
    this.taskB = second;
    this.cycle = cycle;
  }
}

export class TaskExecutionError extends TaskSystemError {
  public readonly taskName: string;

  constructor(taskName: string, cause: unknown) {
    super(`Task "${taskName}" failed: ${toErrorMessage(cause)}`, TaskSystemErrorCodes.TASK_EXECUTION_FAILED, {
      cause,
    });
    this.name = 'TaskExecutionError';
    this.taskName = taskName;
  }
}

export type AccessKind = 'read' | 'write';

export class UndeclaredAccessError extends TaskSystemError {
  public readonly taskName: string;
  public readonly variable: string;
  public readonly access: AccessKind;

  constructor(taskName: string, variable: string, access: AccessKind) {
    super(
      `Task "${taskName}" performed an undeclared ${access} of "${variable}"`,
      TaskSystemErrorCodes.UNDECLARED_ACCESS
    );
    this.name = 'UndeclaredAccessError';
    this.taskName = taskName;
    this.variable = variable;
    this.access = access;
  }
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
