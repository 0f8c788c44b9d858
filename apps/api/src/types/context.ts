import type { Capability, Role } from '@payflow/auth';
import type { ApiConfig } from '../config.js';
import type { Services } from '../services/index.js';

/**
 * Authenticated caller, resolved from the bearer token and the user row
 */
export type AuthContext = {
  userId: string;
  email: string;
  role: Role;
  capabilities: readonly Capability[];
  jti: string;
};

/**
 * Shared Hono context variables for API requests.
 */
export type ContextVariables = {
  requestId: string;
  services: Services;
  config: ApiConfig;
  userId: string;
  auth: AuthContext | null;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
