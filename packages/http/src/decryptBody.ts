import type { Request, Response, NextFunction } from 'express';
import type { ZodError } from 'zod';
import { clientContext } from './context.js';
import { errorBody, statusForError } from './errorStatus.js';
import type { DecryptBodyConfig } from './types.js';

export const KEY_PAIR_HEADER = 'x-key-pair-id';

const firstIssue = (error: ZodError) => error.issues[0]?.message ?? 'Invalid request body';

/**
 * Express middleware that decrypts the marked fields of a JSON body with
 * the single-use key pair named in the `x-key-pair-id` header. The body is
 * checked against `sealed` as it arrives and against `body` once decrypted;
 * `req.body` is then replaced by the validated copy. On failure the request
 * is answered with the mapped status and never reaches the next handler.
 *
 * @example
 * ```typescript
 * const sealedPayment = z.object({ cardNumber: z.string(), amount: z.number() });
 * const payment = sealedPayment.extend({ cardNumber: z.string().regex(/^\d{12,19}$/) });
 * const paymentFields = defineEncryptedFields<z.infer<typeof sealedPayment>>()('cardNumber');
 *
 * app.post(
 *   '/payments',
 *   express.json(),
 *   decryptBody({ keyPairs, schema: paymentFields, sealed: sealedPayment, body: payment }),
 *   (req, res) => { ... },
 * );
 * ```
 */
export function decryptBody<S extends object, T>(config: DecryptBodyConfig<S, T>) {
  const { keyPairs, schema, sealed, body } = config;

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const keyPairId = req.get(KEY_PAIR_HEADER);
      if (!keyPairId) {
        res.status(400).json({ error: `${KEY_PAIR_HEADER} header is required` });
        return;
      }

      const received = sealed.safeParse(req.body);
      if (!received.success) {
        res.status(400).json({ error: firstIssue(received.error) });
        return;
      }

      const result = await keyPairs.decryptRequest(keyPairId, received.data, schema, clientContext(req));
      if (!result.ok) {
        res.status(statusForError(result.error)).json(errorBody(result.error));
        return;
      }

      // The pair is spent by now; a decrypted value that fails validation does not get it back.
      const decrypted = body.safeParse(result.value);
      if (!decrypted.success) {
        res.status(400).json({ error: firstIssue(decrypted.error) });
        return;
      }

      req.body = decrypted.data;
      next();
    } catch (err) {
      next(err);
    }
  };
}
