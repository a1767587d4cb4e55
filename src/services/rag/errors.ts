/** Base class for failures the HTTP layer can map to a status code. */
export class RagError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class EmptyDocumentError extends RagError {
  readonly cdpId: string;
  readonly url: string;

  constructor(cdpId: string, url: string) {
    super(`Document ${url} (${cdpId}) has no extractable text`, 422);
    this.cdpId = cdpId;
    this.url = url;
  }
}

export class IndexNotBuiltError extends RagError {
  constructor() {
    super('Documentation index has not been built yet', 503);
  }
}

export class VectorizationError extends RagError {
  constructor(reason: string) {
    super(`Cannot vectorize input: ${reason}`, 400);
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}
