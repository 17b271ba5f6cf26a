/**
 * Raised inside the bulk-import path. Never escapes the model: the import
 * boundary turns it into a failed ImportResult.
 */
export class BulkImportError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    /** 1-based data row the failure was found on, when it relates to one. */
    public readonly row?: number,
  ) {
    super(message);
    this.name = 'BulkImportError';
  }
}
