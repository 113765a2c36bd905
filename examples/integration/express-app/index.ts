/**
 * Full Integration Example: Express + fieldseal
 *
 * Wires all @fieldseal packages together:
 * - Configuration from the environment (zod-validated keys)
 * - Append-only audit logging
 * - Single-use RSA key pairs stored in PostgreSQL
 * - Encryption router and a route whose body arrives field-encrypted
 *
 * Run:
 *   npx tsx index.ts
 *
 * Prerequisites:
 *   - PostgreSQL running (DATABASE_URL)
 *   - ENCRYPTION_MASTER_KEY, DETERMINISTIC_ENCRYPTION_MASTER_KEY and
 *     DETERMINISTIC_ENCRYPTION_IV_KEY set to base64 32-byte keys
 *     (e.g. `openssl rand -base64 32`)
 */
import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { Sequelize, DataTypes } from 'sequelize';
import { z } from 'zod';

import { createDeterministicCipher, createSymmetricCipher, loadEncryptionConfig } from '@fieldseal/core';
import { createAuditLogger, auditMigrations } from '@fieldseal/audit';
import {
  createKeyPairServiceFromDatabase,
  defineEncryptedFields,
  keyPairMigrations,
} from '@fieldseal/keypairs';
import { createEncryptionRouter, decryptBody } from '@fieldseal/http';

// ── Configuration ──────────────────────────────────────────────

const PORT = Number(process.env['PORT']) || 3000;
const DB_URL = process.env['DATABASE_URL'] || 'postgres://localhost:5432/fieldseal_dev';
const ADMIN_TOKEN = process.env['ADMIN_TOKEN'] || '';

// ── Database ───────────────────────────────────────────────────

const sequelize = new Sequelize(DB_URL, {
  logging: false,
  dialect: 'postgres',
});

// ── Request shapes ─────────────────────────────────────────────

// As received: taxId and bankAccount still hold ciphertext
const sealedRegistration = z.object({
  companyName: z.string().min(1),
  taxId: z.string(),
  bankAccount: z.string().nullable().optional(),
});

const registrationBody = sealedRegistration.extend({
  taxId: z.string().regex(/^\d{2}-\d{7}$/, 'taxId must look like 12-3456789'),
});

const registrationFields = defineEncryptedFields<z.infer<typeof sealedRegistration>>()('taxId', 'bankAccount');

function adminAuth(req: Request, res: Response, next: NextFunction): void {
  // Example only: use real admin sessions or JWTs in production
  if (!ADMIN_TOKEN || req.get('authorization') !== `Bearer ${ADMIN_TOKEN}`) {
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }
  res.locals['adminId'] = 'example-admin';
  next();
}

async function bootstrap() {
  // Throws InvalidKeyConfigurationError naming the bad variable
  const config = loadEncryptionConfig();

  // 1. Run migrations
  await sequelize.authenticate();
  console.log('Database connected');

  const qi = sequelize.getQueryInterface();
  await keyPairMigrations.up(qi, DataTypes);
  await auditMigrations.up(qi, DataTypes);
  console.log('Migrations applied');

  // 2. Services
  const audit = createAuditLogger({ database: sequelize });
  const cipher = createSymmetricCipher(config.symmetric);
  const lookupCipher = createDeterministicCipher(config.deterministic);
  const keyPairs = createKeyPairServiceFromDatabase({
    database: sequelize,
    privateKeyCipher: cipher,
    ttlMinutes: config.keyPairTtlMinutes,
    audit,
  });

  // ── Express App ────────────────────────────────────────────────

  const app = express();

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  app.use('/api/v1/encryption', createEncryptionRouter({ keyPairs, cipher, adminAuth }));

  // taxId and bankAccount arrive RSA-encrypted with a key pair from /key-pairs
  app.post(
    '/api/v1/registrations',
    express.json(),
    decryptBody({ keyPairs, schema: registrationFields, sealed: sealedRegistration, body: registrationBody }),
    (req, res) => {
      const registration: z.infer<typeof registrationBody> = req.body;

      // Equal tax ids seal to equal strings, so the column stays searchable
      const taxIdLookup = lookupCipher.encrypt(registration.taxId);
      if (!taxIdLookup.ok) {
        res.status(422).json({ error: taxIdLookup.error.message });
        return;
      }

      res.status(201).json({
        companyName: registration.companyName,
        taxIdLookup: taxIdLookup.value,
        hasBankAccount: Boolean(registration.bankAccount),
      });
    },
  );

  const server = app.listen(PORT, () => {
    console.log(`fieldseal example running on port ${PORT}`);
    console.log('');
    console.log('Endpoints:');
    console.log(`  GET    http://localhost:${PORT}/health`);
    console.log(`  POST   http://localhost:${PORT}/api/v1/encryption/key-pairs`);
    console.log(`  DELETE http://localhost:${PORT}/api/v1/encryption/key-pairs/:id`);
    console.log(`  POST   http://localhost:${PORT}/api/v1/encryption/encrypt`);
    console.log(`  POST   http://localhost:${PORT}/api/v1/encryption/decrypt`);
    console.log(`  POST   http://localhost:${PORT}/api/v1/registrations`);
  });

  process.on('SIGTERM', () => {
    lookupCipher.dispose();
    server.close();
    sequelize.close().catch((err: unknown) => {
      console.error('Failed to close database:', err);
    });
  });
}

bootstrap().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
