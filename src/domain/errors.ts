export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class InvalidIdError extends DomainError {
  constructor(
    public readonly id: string,
    reason?: string,
  ) {
    super(reason ? `Invalid ID format: ${id} (${reason})` : `Invalid ID format: ${id}`);
  }
}

export class DocumentNotFoundError extends DomainError {
  constructor(public readonly filePath: string) {
    super(`Document not found: ${filePath}`);
  }
}

export class InvalidPositionError extends DomainError {
  constructor(
    public readonly documentId: string,
    public readonly position: number | string,
  ) {
    super(`Position ${position} is outside of ${documentId}`);
  }
}

/** An internal contract was broken upstream; the request is aborted. */
export class InvariantViolationError extends DomainError {}

export class OperationCanceledError extends DomainError {
  constructor() {
    super('Operation was canceled');
  }
}
