import type { UserRole } from '../models/User';

export interface AuthContext {
  userId: string;
  role: UserRole;
}

declare global {
  namespace Express {
    interface Request {
      /** Unparsed request body, kept for webhook signature checks. */
      rawBody?: Buffer;
      auth?: AuthContext;
    }
  }
}
