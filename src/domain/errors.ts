// ─────────────────────────────────────────────────────────────────────────────
// Errors raised across the analysis pipeline
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A parameter is outside its valid domain (non-positive window size or step,
 * unknown input type, out-of-range track index).
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

/** A source file was readable but its content does not match a supported layout. */
export class SequenceFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SequenceFormatError'
  }
}

export class SequenceFileNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`File not found: ${path}`)
    this.name = 'SequenceFileNotFoundError'
  }
}
