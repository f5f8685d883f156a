/**
 * Tutor Errors
 * 호출 측(라우트 레이어)에서 복구 가능한 오류 분류
 */

export type TutorErrorCode = 'DUPLICATE_KEY' | 'NOT_FOUND' | 'PERSISTENCE' | 'VALIDATION';

export interface TutorErrorObject {
  code: TutorErrorCode;
  message: string;
  data: Record<string, unknown>;
}

export abstract class TutorError extends Error {
  abstract readonly code: TutorErrorCode;

  protected constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * 응답 본문 등에 그대로 실을 수 있는 형태
   */
  toObject(): TutorErrorObject {
    return { code: this.code, message: this.message, data: this.details() };
  }

  protected details(): Record<string, unknown> {
    return {};
  }

  static is(error: unknown): error is TutorError {
    return error instanceof TutorError;
  }
}

export class DuplicateKeyError extends TutorError {
  readonly code = 'DUPLICATE_KEY';

  constructor(readonly key: string) {
    super(`Phrase already saved: ${key}`);
  }

  protected details(): Record<string, unknown> {
    return { key: this.key };
  }

  static is(error: unknown): error is DuplicateKeyError {
    return error instanceof DuplicateKeyError;
  }
}

export class NotFoundError extends TutorError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly entity: 'phrase' | 'session',
    readonly key: string
  ) {
    super(`${entity === 'phrase' ? 'Phrase' : 'Session'} not found: ${key}`);
  }

  protected details(): Record<string, unknown> {
    return { entity: this.entity, key: this.key };
  }

  static is(error: unknown): error is NotFoundError {
    return error instanceof NotFoundError;
  }
}

export class PersistenceError extends TutorError {
  readonly code = 'PERSISTENCE';

  constructor(
    message: string,
    readonly path: string | null,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
  }

  protected details(): Record<string, unknown> {
    return { path: this.path };
  }

  static is(error: unknown): error is PersistenceError {
    return error instanceof PersistenceError;
  }
}

export class ValidationError extends TutorError {
  readonly code = 'VALIDATION';

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }

  protected details(): Record<string, unknown> {
    return { issues: this.issues };
  }

  static is(error: unknown): error is ValidationError {
    return error instanceof ValidationError;
  }
}
