import { CancellationToken } from 'vscode-languageserver-protocol';
import { OperationCanceledError } from './errors';

export function throwIfCancellationRequested(token: CancellationToken): void {
  if (token.isCancellationRequested) {
    throw new OperationCanceledError();
  }
}

export function isCancellationError(error: unknown): error is OperationCanceledError {
  return error instanceof OperationCanceledError;
}
