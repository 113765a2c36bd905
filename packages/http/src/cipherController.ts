import type { Request, Response } from 'express';
import { z } from 'zod';
import type { ZodType } from 'zod';
import type { PasswordProtector, SymmetricCipher } from '@fieldseal/core';
import { errorBody, statusForError } from './errorStatus.js';

const encryptRequestBody = z.object({
  plaintext: z
    .string({ required_error: 'plaintext is required', invalid_type_error: 'plaintext must be a string' })
    .min(1, 'plaintext cannot be empty'),
});

const decryptRequestBody = z.object({
  ciphertext: z
    .string({ required_error: 'ciphertext is required', invalid_type_error: 'ciphertext must be a string' })
    .min(1, 'ciphertext cannot be empty'),
});

/** Validate `req.body`, answering 400 with the first issue on failure */
function parseBody<T>(schema: ZodType<T>, req: Request, res: Response): T | null {
  const parsed = schema.safeParse(req.body ?? {});
  if (!parsed.success) {
    res.status(400).json({ error: parsed.error.issues[0]?.message ?? 'Invalid request body' });
    return null;
  }
  return parsed.data;
}

/**
 * Create symmetric encryption endpoint handlers.
 */
export function createCipherController(cipher: SymmetricCipher, protector: PasswordProtector) {
  return {
    /**
     * POST /encrypt
     * Body: { plaintext: string }, non-empty. Responds { ciphertext }.
     */
    encrypt(req: Request, res: Response): void {
      const body = parseBody(encryptRequestBody, req, res);
      if (!body) return;

      const result = protector.protect(body.plaintext);
      if (!result.ok) {
        res.status(statusForError(result.error)).json(errorBody(result.error));
        return;
      }
      res.json({ ciphertext: result.value });
    },

    /**
     * POST /decrypt
     * Body: { ciphertext: string } (base64 envelope). Responds { plaintext }.
     */
    decrypt(req: Request, res: Response): void {
      const body = parseBody(decryptRequestBody, req, res);
      if (!body) return;

      const result = cipher.decrypt(body.ciphertext);
      if (!result.ok) {
        res.status(statusForError(result.error)).json(errorBody(result.error));
        return;
      }
      res.json({ plaintext: result.value });
    },
  };
}
