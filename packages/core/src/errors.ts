/** Discriminator carried by every error of the encryption family */
export type EncryptionErrorKind =
  | 'KEY_GENERATION'
  | 'KEY_NOT_FOUND'
  | 'KEY_ALREADY_USED'
  | 'DECRYPTION'
  | 'ENCRYPT'
  | 'DECRYPT'
  | 'AUTHENTICATION_FAILED'
  | 'INVALID_KEY_CONFIGURATION';

/**
 * Base of the encryption error family.
 * Narrow on `kind` (or `instanceof`) to tell the variants apart.
 */
export abstract class EncryptionError extends Error {
  abstract readonly kind: EncryptionErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** RSA generation or key-pair persistence failed */
export class KeyGenerationError extends EncryptionError {
  readonly kind = 'KEY_GENERATION' as const;
}

/** Key pair missing, expired or inactive */
export class KeyNotFoundError extends EncryptionError {
  readonly kind = 'KEY_NOT_FOUND' as const;
}

/** Key pair was already consumed by an earlier request */
export class KeyAlreadyUsedError extends EncryptionError {
  readonly kind = 'KEY_ALREADY_USED' as const;
}

/** RSA field decryption failed, or the plumbing around it did */
export class DecryptionError extends EncryptionError {
  readonly kind = 'DECRYPTION' as const;

  constructor(
    message: string,
    readonly fieldName?: string,
    options?: ErrorOptions,
  ) {
    super(fieldName === undefined ? message : `${message} (field: '${fieldName}')`, options);
  }
}

/** Symmetric encryption failure (encoding or cipher) */
export class EncryptError extends EncryptionError {
  readonly kind = 'ENCRYPT' as const;
}

/** Symmetric decryption failure (malformed, too short, tag mismatch) */
export class DecryptError extends EncryptionError {
  readonly kind = 'DECRYPT' as const;
}

/** Deterministic cipher tag mismatch: the envelope was tampered with */
export class AuthenticationFailedError extends EncryptionError {
  readonly kind = 'AUTHENTICATION_FAILED' as const;
}

/**
 * Key material is missing or malformed.
 * Thrown at construction time so a misconfigured process never starts.
 */
export class InvalidKeyConfigurationError extends EncryptionError {
  readonly kind = 'INVALID_KEY_CONFIGURATION' as const;
}
