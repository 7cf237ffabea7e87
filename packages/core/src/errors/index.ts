export class SQLWeaveError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'SQLWeaveError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class UnknownOperatorError extends SQLWeaveError {
  constructor(public operator: string) {
    super(`Found unknown operator in condition: ${operator}`, 'UNKNOWN_OPERATOR');
    this.name = 'UnknownOperatorError';
  }
}

export class OperandCountError extends SQLWeaveError {
  constructor(public operator: string, public expected: number) {
    super(
      `Operator '${operator}' requires ${expected === 3 ? 'three' : 'two'} operands.`,
      'OPERAND_COUNT',
    );
    this.name = 'OperandCountError';
  }
}

export class MalformedJoinError extends SQLWeaveError {
  constructor(public index: number) {
    super(
      `Join at position ${index} must be specified as an array of join type, join table, and optionally join condition.`,
      'MALFORMED_JOIN',
    );
    this.name = 'MalformedJoinError';
  }
}

export class UnsupportedByDialectError extends SQLWeaveError {
  constructor(public dialect: string, public feature: string) {
    super(`${dialect} does not support ${feature}.`, 'UNSUPPORTED_BY_DIALECT');
    this.name = 'UnsupportedByDialectError';
  }
}

export class DialectNotFoundError extends SQLWeaveError {
  constructor(public dialect: string) {
    super(
      `No dialect registered for: ${dialect}. Make sure you've imported the dialect package's register entry.`,
      'DIALECT_NOT_FOUND',
    );
    this.name = 'DialectNotFoundError';
  }
}

export class ValidationError extends SQLWeaveError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}
