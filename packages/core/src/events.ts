/**
 * Domain event emitter
 *
 * Services publish what happened to money and saved recipients; audit logging
 * and notifications subscribe. Handlers are fire-and-forget so a slow or
 * failing subscriber never affects a committed transfer.
 */
import { logger } from '@payflow/observability';

export type TransferCompletedPayload = {
  type: 'transfer.completed';
  transactionId: string;
  reference: string;
  senderId: string;
  receiverId: string;
  amountMinor: number;
  feeMinor: number;
  totalMinor: number;
  senderBalanceMinor: number;
  receiverBalanceMinor: number;
  note: string | null;
};

export type WalletFundedPayload = {
  type: 'wallet.funded';
  userId: string;
  walletId: string;
  reference: string;
  amountMinor: number;
  balanceMinor: number;
};

export type BeneficiaryChangedPayload = {
  type: 'beneficiary.added' | 'beneficiary.updated' | 'beneficiary.removed';
  userId: string;
  beneficiaryId: string;
  name: string;
};

export type DomainEventPayload =
  | TransferCompletedPayload
  | WalletFundedPayload
  | BeneficiaryChangedPayload;

export type DomainEvent = DomainEventPayload & { timestamp: Date };
export type DomainEventType = DomainEventPayload['type'];

export type DomainEventHandler = (event: DomainEvent) => void | Promise<void>;

/**
 * What services depend on; tests pass `{ emit: vi.fn() }`.
 */
export interface DomainEventPublisher {
  emit(event: DomainEventPayload): void | Promise<void>;
}

export class DomainEventEmitter implements DomainEventPublisher {
  private handlers: DomainEventHandler[] = [];

  on(handler: DomainEventHandler) {
    this.handlers.push(handler);
  }

  async emit(event: DomainEventPayload) {
    const fullEvent: DomainEvent = {
      ...event,
      timestamp: new Date(),
    };

    Promise.all(this.handlers.map(async (handler) => handler(fullEvent))).catch(
      (err: unknown) => {
        logger.error({ err, eventType: fullEvent.type }, 'Domain event handler error');
      }
    );
  }
}

export const domainEvents = new DomainEventEmitter();
