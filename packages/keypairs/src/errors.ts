/**
 * Failure inside a key-pair store: I/O, constraint violation, or an
 * update that matched no row. The service translates it into the
 * encryption error family.
 */
export class KeyPairStoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KeyPairStoreError';
  }
}
