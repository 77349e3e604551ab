export class BerthError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'BerthError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Definition errors -------------------------------------------------------

export class DefinitionError extends BerthError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DefinitionError'
  }
}

export class ValidationError extends DefinitionError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class DuplicateContainerNameError extends DefinitionError {
  constructor(readonly container: string, options?: {cause?: unknown}) {
    super('DUPLICATE_CONTAINER_NAME', `Container "${container}" is defined more than once`, options)
    this.name = 'DuplicateContainerNameError'
  }
}

export class NameTooLongError extends DefinitionError {
  constructor(
    readonly container: string,
    readonly ifName: string,
    readonly limit: number,
    options?: {cause?: unknown}
  ) {
    super('NAME_TOO_LONG', `Container "${container}": interface name "${ifName}" exceeds ${limit} characters`, options)
    this.name = 'NameTooLongError'
  }
}

export class ConflictingSourceSpecificationError extends DefinitionError {
  constructor(readonly container: string, detail: string, options?: {cause?: unknown}) {
    super('CONFLICTING_SOURCE', `Container "${container}": ${detail}`, options)
    this.name = 'ConflictingSourceSpecificationError'
  }
}

export class InvalidBindSpecError extends DefinitionError {
  constructor(
    readonly container: string,
    readonly containerPath: string,
    detail: string,
    options?: {cause?: unknown}
  ) {
    super('INVALID_BIND_SPEC', `Container "${container}": bind "${containerPath}" ${detail}`, options)
    this.name = 'InvalidBindSpecError'
  }
}

// -- Merge errors ------------------------------------------------------------

export class MergeConflictError extends BerthError {
  constructor(readonly field: string, options?: {cause?: unknown}) {
    super('MERGE_CONFLICT', `Conflicting forced values for "${field}"`, options)
    this.name = 'MergeConflictError'
  }
}

// -- Evaluation errors -------------------------------------------------------

export class EvaluationError extends BerthError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'EvaluationError'
  }
}

export class InlineEvaluationError extends EvaluationError {
  constructor(readonly container: string, options?: {cause?: unknown}) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super('INLINE_EVALUATION_FAILED', `Container "${container}": inline evaluation failed${reason}`, options)
    this.name = 'InlineEvaluationError'
  }
}

export class EvaluatorNotAvailableError extends EvaluationError {
  constructor(command: string, options?: {cause?: unknown}) {
    super('EVALUATOR_NOT_AVAILABLE', `Evaluator command "${command}" could not be started`, options)
    this.name = 'EvaluatorNotAvailableError'
  }

  override get transient(): boolean {
    return true
  }
}
