import type { UserRole } from '../models/user';

/** Authenticated caller, taken from the verified access token. */
export interface Principal {
  userId: string;
  role: UserRole;
  email: string;
  phone: string | null;
  name: string;
}
