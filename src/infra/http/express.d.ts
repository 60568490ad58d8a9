import type { Principal } from '../../application/auth/guards.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by the authenticate middleware once the access token checks out. */
      principal?: Principal;
    }
  }
}

export {};
