/**
 * @fileoverview Engine error hierarchy
 *
 * Errors in this package are data first: parsers and resolvers return them
 * inside results attached to the offending Reference or Statement, and only
 * the boundary validators and the config loader throw them.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  timestamp: number;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class ArchitectureEngineError extends Error {
  abstract readonly code: string;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// SYNTAX ERRORS
// ============================================================================

export class TagExpressionSyntaxError extends ArchitectureEngineError {
  readonly code = 'TAG_EXPRESSION_SYNTAX';

  constructor(
    readonly expression: string,
    /** Character offset of the offending token (expression length at end of input) */
    readonly position: number,
    readonly token: string | null,
    reason: string,
  ) {
    super(`Tag expression error at position ${position}${token === null ? '' : ` near '${token}'`}: ${reason}`);
    this.name = 'TagExpressionSyntaxError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        expression: this.expression,
        position: this.position,
        token: this.token,
      },
    };
  }
}

export class StatementSyntaxError extends ArchitectureEngineError {
  readonly code = 'STATEMENT_SYNTAX';

  constructor(
    readonly text: string,
    readonly position: number,
    reason: string,
  ) {
    super(`Statement error at position ${position}: ${reason}`);
    this.name = 'StatementSyntaxError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        text: this.text,
        position: this.position,
      },
    };
  }
}

export class ReferenceDefinitionSyntaxError extends ArchitectureEngineError {
  readonly code = 'REFERENCE_DEFINITION_SYNTAX';

  constructor(
    readonly text: string,
    readonly position: number,
    reason: string,
  ) {
    super(`Reference definition error at position ${position}: ${reason}`);
    this.name = 'ReferenceDefinitionSyntaxError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        text: this.text,
        position: this.position,
      },
    };
  }
}

// ============================================================================
// REFERENCE ERRORS
// ============================================================================

export class UnresolvedReferenceError extends ArchitectureEngineError {
  readonly code = 'UNRESOLVED_REFERENCE';

  constructor(readonly names: readonly string[]) {
    super(`Unknown reference${names.length === 1 ? '' : 's'}: ${names.join(', ')}`);
    this.name = 'UnresolvedReferenceError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { names: [...this.names] },
    };
  }
}

export class ReferenceTypeError extends ArchitectureEngineError {
  readonly code = 'REFERENCE_TYPE';

  constructor(
    readonly referenceName: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Reference ${referenceName} must be ${expected}-backed, got ${received}`);
    this.name = 'ReferenceTypeError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        referenceName: this.referenceName,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// INPUT ERRORS
// ============================================================================

export interface InputIssue {
  path: string;
  message: string;
}

export class SnapshotValidationError extends ArchitectureEngineError {
  readonly code = 'SNAPSHOT_VALIDATION';

  constructor(
    readonly subject: string,
    readonly issues: readonly InputIssue[],
  ) {
    super(`Invalid ${subject}: ${issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ')}`);
    this.name = 'SnapshotValidationError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { subject: this.subject, issues: [...this.issues] },
    };
  }
}

export class ConfigurationError extends ArchitectureEngineError {
  readonly code = 'CONFIGURATION';

  constructor(
    readonly source: string,
    readonly issues: readonly InputIssue[],
    override readonly cause?: Error,
  ) {
    super(`Invalid engine configuration from ${source}: ${issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ')}`);
    this.name = 'ConfigurationError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        source: this.source,
        issues: [...this.issues],
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isArchitectureEngineError(error: unknown): error is ArchitectureEngineError {
  return error instanceof ArchitectureEngineError;
}

/**
 * Extract error message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
