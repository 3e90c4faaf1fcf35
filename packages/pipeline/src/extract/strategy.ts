export interface StrategyOutput {
  text: string;
  pageCount: number;
  title?: string;
}

/** One way of pulling a text layer out of PDF bytes. */
export interface ExtractionStrategy {
  readonly name: string;
  extract(bytes: Uint8Array): Promise<StrategyOutput>;
}

/** Thrown by a strategy that could open the file but not decrypt it. */
export class EncryptedDocumentError extends Error {
  constructor(public readonly strategy: string) {
    super(`${strategy}: document is password-protected`);
    this.name = 'EncryptedDocumentError';
    Object.setPrototypeOf(this, EncryptedDocumentError.prototype);
  }
}

export function looksLikePasswordError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === 'PasswordException' || /password|encrypt/i.test(error.message);
}
