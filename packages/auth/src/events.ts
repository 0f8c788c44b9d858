/**
 * Authentication event emitter for audit logging and notifications
 * Events are fire-and-forget to avoid blocking the authentication flow
 */
import { logger } from '@payflow/observability';

export type AuthEventType =
  | 'user.registered'
  | 'user.login.success'
  | 'user.login.failed'
  | 'user.password_changed'
  | 'user.status_changed'
  | 'token.auth_failed'
  | 'token.capability_denied';

/**
 * Base authentication event structure
 */
export interface AuthEvent {
  type: AuthEventType;
  userId?: string;
  email?: string;
  ip?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

/**
 * Emitted when an admin changes another account's status or role
 */
export interface UserStatusChangedEvent extends Omit<AuthEvent, 'type'> {
  type: 'user.status_changed';
  userId: string;
  metadata: {
    actorId: string;
    status?: string;
    role?: string;
  };
}

/**
 * Emitted when a request is denied because the caller's role lacks a capability
 */
export interface TokenCapabilityDeniedEvent extends Omit<AuthEvent, 'type'> {
  type: 'token.capability_denied';
  userId: string;
  metadata: {
    endpoint: string;
    method: string;
    requiredCapabilities: string[];
    role: string;
  };
}

export type AuthEventHandler = (event: AuthEvent) => void | Promise<void>;

export class AuthEventEmitter {
  private handlers: AuthEventHandler[] = [];

  on(handler: AuthEventHandler) {
    this.handlers.push(handler);
  }

  async emit(event: Omit<AuthEvent, 'timestamp'>) {
    const fullEvent: AuthEvent = {
      ...event,
      timestamp: new Date(),
    };

    // Fire and forget - don't block auth flow. Wrapping each call keeps a
    // synchronous throw from skipping the remaining handlers.
    Promise.all(
      this.handlers.map(async (handler) => handler(fullEvent))
    ).catch((err: unknown) => {
      logger.error({ err, eventType: fullEvent.type }, 'Auth event handler error');
    });
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers() {
    this.handlers = [];
  }
}

export const authEvents = new AuthEventEmitter();
