import type { Request, Response, NextFunction } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import type { SymmetricCipher } from '@fieldseal/core';
import type { EncryptedFieldSchema, KeyPairService } from '@fieldseal/keypairs';

/** Authentication middleware type */
export type AuthMiddleware = (req: Request, res: Response, next: NextFunction) => void;

/** Configuration for {@link createEncryptionRouter} */
export interface EncryptionRouterConfig {
  /** Key pair service backing /key-pairs */
  keyPairs: KeyPairService;
  /** Cipher backing /encrypt and /decrypt */
  cipher: SymmetricCipher;
  /**
   * Guards DELETE /key-pairs/:id. The route is only mounted when set.
   * Put the admin's id in `res.locals.adminId` for the audit trail.
   */
  adminAuth?: AuthMiddleware;
}

/** Configuration for {@link decryptBody} */
export interface DecryptBodyConfig<S extends object, T> {
  keyPairs: KeyPairService;
  /** Which fields of the body arrive RSA-encrypted */
  schema: EncryptedFieldSchema<S>;
  /** Shape of the body as it arrives, encrypted fields still ciphertext */
  sealed: ZodType<S, ZodTypeDef, unknown>;
  /** Validates the decrypted body; its output becomes `req.body` */
  body: ZodType<T, ZodTypeDef, unknown>;
}

/** Error payload of every failed response */
export interface ErrorBody {
  error: string;
  kind?: string;
}
