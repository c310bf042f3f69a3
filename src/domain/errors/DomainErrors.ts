export type ErrorClassification = 'degradable' | 'fatal';

/** 所有 postindex domain 錯誤的基底類別 */
export abstract class PostIndexError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Degradable：該文件被排除，其餘照常建置 ---

export class MalformedDocumentError extends PostIndexError {
  readonly classification = 'degradable' as const;
  readonly code = 'MALFORMED_DOCUMENT';

  constructor(
    public readonly documentPath: string,
    public readonly problems: string[],
    options?: ErrorOptions,
  ) {
    super(`Malformed document "${documentPath}": ${problems.join('; ')}`, options);
  }
}

export class DuplicatePathError extends PostIndexError {
  readonly classification = 'degradable' as const;
  readonly code = 'DUPLICATE_PATH';

  constructor(
    public readonly documentPath: string,
    public readonly sourceFile: string,
    public readonly claimedBy: string,
    options?: ErrorOptions,
  ) {
    super(
      `Duplicate path "${documentPath}": ${sourceFile} collides with ${claimedBy}`,
      options,
    );
  }
}

export class DocumentUnreadableError extends PostIndexError {
  readonly classification = 'degradable' as const;
  readonly code = 'DOCUMENT_UNREADABLE';

  constructor(
    public readonly documentPath: string,
    public readonly sourceFile: string,
    options?: ErrorOptions,
  ) {
    super(
      `Cannot read "${sourceFile}"${options?.cause instanceof Error ? `: ${options.cause.message}` : ''}`,
      options,
    );
  }
}

export class FrontmatterSyntaxError extends PostIndexError {
  readonly classification = 'degradable' as const;
  readonly code = 'FRONTMATTER_SYNTAX';
}

// --- Fatal ---

export class ContentRootNotFoundError extends PostIndexError {
  readonly classification = 'fatal' as const;
  readonly code = 'CONTENT_ROOT_NOT_FOUND';

  constructor(
    public readonly contentRoot: string,
    options?: ErrorOptions,
  ) {
    super(`Content root "${contentRoot}" does not exist or is not a directory`, options);
  }
}
