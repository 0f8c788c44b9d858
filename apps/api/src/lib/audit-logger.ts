import type { AuthEvent } from '@payflow/auth';
import type { DomainEvent } from '@payflow/core';
import { logger } from '@payflow/observability';

interface EventSource<TEvent> {
  on(handler: (event: TEvent) => void | Promise<void>): void;
}

export interface AuditSources {
  authEvents: EventSource<AuthEvent>;
  domainEvents: EventSource<DomainEvent>;
}

/**
 * Initialize audit logging for authentication and ledger events
 * Sensitive values are redacted by the logger itself
 */
export function initializeAuditLogging(sources: AuditSources) {
  sources.authEvents.on(handleAuthEvent);
  sources.domainEvents.on(handleDomainEvent);
  logger.info('Audit logging initialized for auth and domain events');
}

export function handleAuthEvent(event: AuthEvent) {
  const { type, userId, email, ip, timestamp, metadata } = event;
  const requestId = typeof metadata?.requestId === 'string' ? metadata.requestId : undefined;

  const logEntry = {
    event: type,
    userId: userId || 'unknown',
    email: email || 'unknown',
    ip: ip || 'unknown',
    timestamp: timestamp.toISOString(),
    success: type === 'user.login.success' || type === 'user.registered',
    ...(requestId && { requestId }),
    ...(metadata && { metadata }),
  };

  switch (type) {
    case 'user.registered':
      logger.info(logEntry, 'User registered successfully');
      break;

    case 'user.login.success':
      logger.info(logEntry, 'User login successful');
      break;

    case 'user.login.failed':
      logger.warn(logEntry, 'User login failed');
      break;

    case 'user.password_changed':
      logger.info(logEntry, 'User password changed');
      break;

    case 'user.status_changed':
      logger.info(logEntry, 'User account status changed');
      break;

    case 'token.auth_failed':
      logger.warn(logEntry, 'Bearer token rejected');
      break;

    case 'token.capability_denied':
      logger.warn(logEntry, 'Capability check failed');
      break;
  }
}

export function handleDomainEvent(event: DomainEvent) {
  const timestamp = event.timestamp.toISOString();

  switch (event.type) {
    case 'transfer.completed':
      logger.info(
        {
          event: event.type,
          reference: event.reference,
          senderId: event.senderId,
          receiverId: event.receiverId,
          amountMinor: event.amountMinor,
          feeMinor: event.feeMinor,
          timestamp,
        },
        'Transfer completed'
      );
      break;

    case 'wallet.funded':
      logger.info(
        {
          event: event.type,
          reference: event.reference,
          userId: event.userId,
          amountMinor: event.amountMinor,
          timestamp,
        },
        'Wallet funded'
      );
      break;

    case 'beneficiary.added':
    case 'beneficiary.updated':
    case 'beneficiary.removed':
      logger.info(
        {
          event: event.type,
          userId: event.userId,
          beneficiaryId: event.beneficiaryId,
          timestamp,
        },
        'Beneficiary changed'
      );
      break;
  }
}
