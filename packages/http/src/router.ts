import { Router, json } from 'express';
import { createPasswordProtector } from '@fieldseal/core';
import type { EncryptionRouterConfig } from './types.js';
import { createKeyPairController } from './keyPairController.js';
import { createCipherController } from './cipherController.js';

/**
 * Create an Express router exposing the key pair and cipher services.
 *
 * Routes:
 *   POST   /key-pairs      - Issue a single-use key pair
 *   DELETE /key-pairs/:id  - Revoke a key pair (adminAuth, mounted only when given)
 *   POST   /encrypt        - Seal a non-empty string with the symmetric cipher
 *   POST   /decrypt        - Open an envelope produced by /encrypt
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { createEncryptionRouter } from '@fieldseal/http';
 *
 * const app = express();
 * app.use('/api/encryption', createEncryptionRouter({
 *   keyPairs,
 *   cipher,
 *   adminAuth: adminAuthMiddleware,
 * }));
 * ```
 */
export function createEncryptionRouter(config: EncryptionRouterConfig): Router {
  const router = Router();
  const keyPairController = createKeyPairController(config.keyPairs);
  const cipherController = createCipherController(config.cipher, createPasswordProtector(config.cipher));

  router.use(json());

  // ── Key pairs ───────────────────────────────────────────────
  router.post('/key-pairs', (req, res) => {
    void keyPairController.issue(req, res);
  });
  if (config.adminAuth) {
    router.delete('/key-pairs/:id', config.adminAuth, (req, res) => {
      void keyPairController.revoke(req, res);
    });
  }

  // ── Symmetric cipher ────────────────────────────────────────
  router.post('/encrypt', (req, res) => {
    cipherController.encrypt(req, res);
  });
  router.post('/decrypt', (req, res) => {
    cipherController.decrypt(req, res);
  });

  return router;
}
