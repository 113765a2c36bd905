import type { Request, Response } from 'express';
import type { KeyPairService } from '@fieldseal/keypairs';
import { adminContext, clientContext } from './context.js';
import { errorBody, statusForError } from './errorStatus.js';

function internalError(res: Response, err: unknown): void {
  console.error('[http] Unhandled key pair error:', err);
  res.status(500).json({ error: 'Internal server error' });
}

/**
 * Create key pair endpoint handlers.
 */
export function createKeyPairController(keyPairs: KeyPairService) {
  return {
    /**
     * POST /key-pairs
     * Issue a single-use key pair. Responds 201 with { keyPairId, publicKey }.
     */
    async issue(req: Request, res: Response): Promise<void> {
      try {
        const result = await keyPairs.generateNewKeyPair(clientContext(req));
        if (!result.ok) {
          res.status(statusForError(result.error)).json(errorBody(result.error));
          return;
        }
        res.status(201).json(result.value);
      } catch (err) {
        internalError(res, err);
      }
    },

    /**
     * DELETE /key-pairs/:id
     * Revoke an unused key pair. Responds 204.
     */
    async revoke(req: Request, res: Response): Promise<void> {
      try {
        const keyPairId = req.params['id'];
        if (!keyPairId) {
          res.status(400).json({ error: 'Key pair id is required' });
          return;
        }

        const result = await keyPairs.revokeKeyPair(keyPairId, adminContext(req, res));
        if (!result.ok) {
          res.status(statusForError(result.error)).json(errorBody(result.error));
          return;
        }
        res.status(204).end();
      } catch (err) {
        internalError(res, err);
      }
    },
  };
}
