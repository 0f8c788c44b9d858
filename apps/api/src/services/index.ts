/**
 * Composition root
 *
 * Repositories are built once per database handle; services receive their
 * repositories and event publishers through constructors so tests can swap
 * in the in-memory implementations from `@payflow/core/testing`.
 */

import {
  AdminService,
  BeneficiaryService,
  DrizzleAdminRepository,
  DrizzleBeneficiaryRepository,
  DrizzleLedgerStore,
  DrizzleNotificationRepository,
  DrizzleProfileRepository,
  DrizzleTransactionRepository,
  DrizzleUserRepository,
  DrizzleWalletRepository,
  NotificationDispatcher,
  NotificationService,
  ProfileService,
  TransactionService,
  TransferService,
  UserService,
  WalletService,
  type AdminRepository,
  type AuthEventPublisher,
  type BeneficiaryRepository,
  type DomainEventPublisher,
  type LedgerStore,
  type NotificationRepository,
  type ProfileRepository,
  type TransactionRepository,
  type UserRepository,
  type WalletRepository,
} from '@payflow/core';
import type { Database } from '@payflow/database';

export interface Repositories {
  users: UserRepository;
  profiles: ProfileRepository;
  wallets: WalletRepository;
  transactions: TransactionRepository;
  beneficiaries: BeneficiaryRepository;
  notifications: NotificationRepository;
  admin: AdminRepository;
  ledger: LedgerStore;
}

export interface EventPublishers {
  authEvents: AuthEventPublisher;
  domainEvents: DomainEventPublisher;
}

export interface Services {
  users: UserService;
  profiles: ProfileService;
  wallets: WalletService;
  transfers: TransferService;
  transactions: TransactionService;
  beneficiaries: BeneficiaryService;
  notifications: NotificationService;
  admin: AdminService;
  dispatcher: NotificationDispatcher;
  authEvents: AuthEventPublisher;
}

export function createDrizzleRepositories(db: Database): Repositories {
  return {
    users: new DrizzleUserRepository(db),
    profiles: new DrizzleProfileRepository(db),
    wallets: new DrizzleWalletRepository(db),
    transactions: new DrizzleTransactionRepository(db),
    beneficiaries: new DrizzleBeneficiaryRepository(db),
    notifications: new DrizzleNotificationRepository(db),
    admin: new DrizzleAdminRepository(db),
    ledger: new DrizzleLedgerStore(db),
  };
}

export function createServices(repos: Repositories, events: EventPublishers): Services {
  const notifications = new NotificationService(repos.notifications);

  return {
    users: new UserService(repos.users, events.authEvents),
    profiles: new ProfileService(repos.profiles, repos.users, repos.wallets),
    wallets: new WalletService(repos.wallets, repos.ledger, events.domainEvents),
    transfers: new TransferService(repos.ledger, events.domainEvents),
    transactions: new TransactionService(repos.transactions),
    beneficiaries: new BeneficiaryService(repos.beneficiaries, repos.wallets, events.domainEvents),
    notifications,
    admin: new AdminService(repos.admin, repos.users, repos.transactions, events.authEvents),
    dispatcher: new NotificationDispatcher({ notifications, users: repos.users }),
    authEvents: events.authEvents,
  };
}
