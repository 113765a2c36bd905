// Router
export { createEncryptionRouter } from './router.js';

// Middleware
export { decryptBody, KEY_PAIR_HEADER } from './decryptBody.js';

// Error mapping
export { statusForError, errorBody } from './errorStatus.js';

// Request context
export { clientContext, adminContext, CLIENT_ID_HEADER } from './context.js';

// Types
export type { AuthMiddleware, EncryptionRouterConfig, DecryptBodyConfig, ErrorBody } from './types.js';
