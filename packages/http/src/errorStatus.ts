import type { EncryptionError } from '@fieldseal/core';
import type { ErrorBody } from './types.js';

/** HTTP status for an encryption error */
export function statusForError(error: EncryptionError): number {
  switch (error.kind) {
    case 'KEY_NOT_FOUND':
      return 404;
    case 'KEY_ALREADY_USED':
      return 409;
    case 'AUTHENTICATION_FAILED':
      return 401;
    case 'DECRYPTION':
    case 'DECRYPT':
    case 'ENCRYPT':
      return 422;
    case 'KEY_GENERATION':
    case 'INVALID_KEY_CONFIGURATION':
      return 500;
  }
}

/** Response body for an encryption error. Server-side failures keep their details private. */
export function errorBody(error: EncryptionError): ErrorBody {
  if (statusForError(error) >= 500) {
    return { error: 'Internal server error', kind: error.kind };
  }
  return { error: error.message, kind: error.kind };
}
