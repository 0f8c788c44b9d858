/**
 * Notification Dispatcher
 *
 * Turns domain and auth events into in-app notifications. Runs as an event
 * subscriber, after the originating operation has committed.
 */

import type { AuthEvent } from '@payflow/auth';
import type { DomainEvent, DomainEventHandler } from '../events.js';
import { formatMoney } from '../ledger/money.js';
import type { UserRepository } from '../users/user-repository.js';
import type { NotificationService } from './notification-service.js';

export const LOW_BALANCE_THRESHOLD_MINOR = 1_000; // $10.00

export interface NotificationDispatcherDeps {
  notifications: Pick<NotificationService, 'notify'>;
  users: Pick<UserRepository, 'findById'>;
  lowBalanceThresholdMinor?: number;
}

interface EventSource<TEvent> {
  on(handler: (event: TEvent) => void | Promise<void>): void;
}

export class NotificationDispatcher {
  private lowBalanceThresholdMinor: number;

  constructor(private deps: NotificationDispatcherDeps) {
    this.lowBalanceThresholdMinor = deps.lowBalanceThresholdMinor ?? LOW_BALANCE_THRESHOLD_MINOR;
  }

  /**
   * Subscribe to both emitters
   */
  register(sources: { domainEvents: EventSource<DomainEvent>; authEvents: EventSource<AuthEvent> }) {
    sources.domainEvents.on(this.handleDomainEvent);
    sources.authEvents.on(this.handleAuthEvent);
  }

  handleDomainEvent: DomainEventHandler = async (event) => {
    switch (event.type) {
      case 'transfer.completed': {
        const [sender, receiver] = await Promise.all([
          this.deps.users.findById(event.senderId),
          this.deps.users.findById(event.receiverId),
        ]);
        const senderName = sender ? `${sender.firstName} ${sender.lastName}` : 'another user';
        const receiverName = receiver ? `${receiver.firstName} ${receiver.lastName}` : 'another user';
        const metadata = {
          reference: event.reference,
          amountMinor: event.amountMinor,
          feeMinor: event.feeMinor,
        };
        const link = `/transactions/${event.reference}`;

        await this.deps.notifications.notify({
          userId: event.senderId,
          title: 'Money sent',
          message: `You sent ${formatMoney(event.amountMinor)} to ${receiverName}. Fee: ${formatMoney(event.feeMinor)}.`,
          type: 'transaction',
          link,
          metadata,
        });
        await this.deps.notifications.notify({
          userId: event.receiverId,
          title: 'Money received',
          message: `You received ${formatMoney(event.amountMinor)} from ${senderName}.`,
          type: 'transaction',
          link,
          metadata,
        });

        if (event.senderBalanceMinor <= this.lowBalanceThresholdMinor) {
          await this.deps.notifications.notify({
            userId: event.senderId,
            title: 'Low balance',
            message: `Your wallet balance is ${formatMoney(event.senderBalanceMinor)}.`,
            type: 'warning',
            link: '/wallet',
            metadata: { balanceMinor: event.senderBalanceMinor },
          });
        }
        return;
      }

      case 'wallet.funded':
        await this.deps.notifications.notify({
          userId: event.userId,
          title: 'Funds added',
          message: `${formatMoney(event.amountMinor)} was added to your wallet. New balance: ${formatMoney(event.balanceMinor)}.`,
          type: 'success',
          link: '/wallet',
          metadata: { reference: event.reference, amountMinor: event.amountMinor },
        });
        return;

      case 'beneficiary.added':
      case 'beneficiary.updated':
      case 'beneficiary.removed': {
        const verb = {
          'beneficiary.added': 'added to',
          'beneficiary.updated': 'updated in',
          'beneficiary.removed': 'removed from',
        }[event.type];
        await this.deps.notifications.notify({
          userId: event.userId,
          title: 'Beneficiaries updated',
          message: `${event.name} was ${verb} your beneficiaries.`,
          type: 'info',
          link: '/beneficiaries',
          metadata: { beneficiaryId: event.beneficiaryId },
        });
        return;
      }
    }
  };

  handleAuthEvent = async (event: AuthEvent): Promise<void> => {
    if (event.type === 'user.password_changed' && event.userId) {
      await this.deps.notifications.notify({
        userId: event.userId,
        title: 'Password changed',
        message: "Your password was changed. If this wasn't you, contact support.",
        type: 'warning',
        link: '/profile',
      });
    }
  };
}
