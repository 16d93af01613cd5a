/**
 * Domain errors raised by the repositories and the dispatch engine.
 *
 * Each carries the HTTP status the API answers with and a stable `code`
 * that clients can branch on.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }

  toResponse() {
    return {
      error: {
        code: this.code,
        message: this.message
      }
    };
  }
}

export type NotFoundCode = 'PromptNotFound' | 'ModelNotFound' | 'ResultNotFound';

export class NotFoundError extends AppError {
  constructor(code: NotFoundCode, message: string) {
    super(404, code, message);
    this.name = 'NotFoundError';
  }
}

export class ProviderInUseError extends AppError {
  constructor(
    public readonly modelId: number,
    public readonly resultCount: number
  ) {
    super(
      409,
      'ProviderInUse',
      `Model ${modelId} is referenced by ${resultCount} stored result(s). Deactivate it instead of deleting it.`
    );
    this.name = 'ProviderInUseError';
  }
}

export class ModelNameTakenError extends AppError {
  constructor(public readonly modelName: string) {
    super(409, 'ModelNameTaken', `A model named "${modelName}" already exists`);
    this.name = 'ModelNameTakenError';
  }
}

export class MissingCredentialError extends AppError {
  constructor(public readonly credentialKey: string) {
    super(422, 'MissingCredential', `No credential found for key ${credentialKey}`);
    this.name = 'MissingCredentialError';
  }
}

export class InvalidSettingError extends AppError {
  constructor(
    public readonly key: string,
    public readonly value: string,
    reason: string
  ) {
    super(400, 'InvalidSetting', `Setting ${key}="${value}" is invalid: ${reason}`);
    this.name = 'InvalidSettingError';
  }
}

export type PromptImproverUnavailableCode = 'PromptImproverDisabled' | 'PromptImproverModelNotSet';

export class PromptImproverUnavailableError extends AppError {
  constructor(code: PromptImproverUnavailableCode, message: string) {
    super(409, code, message);
    this.name = 'PromptImproverUnavailableError';
  }
}

export class ProviderCallError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(502, 'ProviderCallFailed', message, options);
    this.name = 'ProviderCallError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'ValidationError', message);
    this.name = 'ValidationError';
  }
}

export function promptNotFound(promptId: number): NotFoundError {
  return new NotFoundError('PromptNotFound', `Prompt ${promptId} not found`);
}

export function modelNotFound(modelId: number): NotFoundError {
  return new NotFoundError('ModelNotFound', `Model ${modelId} not found`);
}

export function resultNotFound(resultId: number): NotFoundError {
  return new NotFoundError('ResultNotFound', `Result ${resultId} not found`);
}

function errorCode(error: unknown): unknown {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return error.code;
  }
  return undefined;
}

/** Postgres reports 23503, better-sqlite3 SQLITE_CONSTRAINT_FOREIGNKEY. */
export function isForeignKeyViolation(error: unknown): boolean {
  const code = errorCode(error);
  return code === '23503' || code === 'SQLITE_CONSTRAINT_FOREIGNKEY';
}

export function isUniqueViolation(error: unknown): boolean {
  const code = errorCode(error);
  return code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE';
}
