export type ErrorClassification = 'precondition' | 'recoverable' | 'programming';

/** 所有 notelink domain 錯誤的基底類別 */
export abstract class NoteLinkError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Precondition：阻止操作開始，尚未寫入任何檔案 ---

export class NotFoundError extends NoteLinkError {
  readonly classification = 'precondition' as const;
  readonly code = 'NOT_FOUND';

  constructor(
    public readonly notePath: string,
    options?: ErrorOptions,
  ) {
    super(`Note not found: ${notePath}`, options);
  }
}

export class DestinationExistsError extends NoteLinkError {
  readonly classification = 'precondition' as const;
  readonly code = 'DESTINATION_EXISTS';

  constructor(
    public readonly destinationPath: string,
    options?: ErrorOptions,
  ) {
    super(`Destination already exists: ${destinationPath}`, options);
  }
}

export class InvalidRenameError extends NoteLinkError {
  readonly classification = 'precondition' as const;
  readonly code = 'INVALID_RENAME';
}

export class ConfigError extends NoteLinkError {
  readonly classification = 'precondition' as const;
  readonly code = 'CONFIG_INVALID';
}

export class InvalidQueryError extends NoteLinkError {
  readonly classification = 'precondition' as const;
  readonly code = 'INVALID_QUERY';
}

// --- Recoverable：吸收於局部並彙總為計數 ---

export class StaleLineError extends NoteLinkError {
  readonly classification = 'recoverable' as const;
  readonly code = 'STALE_LINE';

  constructor(
    public readonly file: string,
    public readonly lineNumber: number,
    options?: ErrorOptions,
  ) {
    super(`Line ${lineNumber} of ${file} changed on disk since the changeset was computed`, options);
  }
}

export class PartialApplyError extends NoteLinkError {
  readonly classification = 'recoverable' as const;
  readonly code = 'PARTIAL_APPLY';

  constructor(
    public readonly fromPath: string,
    public readonly toPath: string,
    public readonly filesRewritten: number,
    options?: ErrorOptions,
  ) {
    super(
      `Link text was rewritten in ${filesRewritten} file(s) but renaming ${fromPath} → ${toPath} failed; fix the filename manually`,
      options,
    );
  }
}

// --- Programming：違反呼叫契約 ---

export class InvalidTransitionError extends NoteLinkError {
  readonly classification = 'programming' as const;
  readonly code = 'INVALID_TRANSITION';

  constructor(
    public readonly from: string,
    public readonly to: string,
    options?: ErrorOptions,
  ) {
    super(`Rename transaction cannot move from "${from}" to "${to}"`, options);
  }
}

/** 將未知的 catch 值轉為訊息字串 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
