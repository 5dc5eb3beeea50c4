import type { ValueOf } from '../types/value-of';

export const CONTENT_OPERATION = {
  READ: 'read',
  APPEND: 'append',
  WRITE: 'write',
} as const;

export type ContentOperation = ValueOf<typeof CONTENT_OPERATION>;

const OPERATION_MESSAGES: Record<ContentOperation, string> = {
  [CONTENT_OPERATION.READ]: "Can't read the content.",
  [CONTENT_OPERATION.APPEND]: "Can't append the given content.",
  [CONTENT_OPERATION.WRITE]: "Can't write the given content.",
};

/**
 * Raised by the content operations of a path entry. The message only names the
 * operation; the filesystem error that caused it is kept as `cause`.
 */
export class OperationError extends Error {
  public readonly operation: ContentOperation;

  public constructor(operation: ContentOperation, cause?: unknown) {
    super(OPERATION_MESSAGES[operation], { cause });
    this.name = 'OperationError';
    this.operation = operation;
  }
}
