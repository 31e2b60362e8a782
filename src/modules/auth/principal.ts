import type { UserRole } from '../../database/schema/index.js';

/** The acting user, as asserted by the identity provider's token. */
export type Principal =
  | { role: 'patient'; id: string }
  | { role: 'doctor'; id: string }
  | { role: 'admin'; id: string };

export function isUserRole(value: unknown): value is UserRole {
  return value === 'patient' || value === 'doctor' || value === 'admin';
}

export function toPrincipal(id: string, role: UserRole): Principal {
  switch (role) {
    case 'patient':
      return { role: 'patient', id };
    case 'doctor':
      return { role: 'doctor', id };
    case 'admin':
      return { role: 'admin', id };
  }
}
