/**
 * User Service
 *
 * Business logic layer for user operations.
 * Registration (user + wallet), credential checks and password rotation.
 */

import { hashPassword, verifyPassword } from '@payflow/auth';
import type { User } from '@payflow/database';
import { presentWallet } from '../wallets/wallet-presenter.js';
import {
  DuplicateEmailError,
  InactiveAccountError,
  IncorrectPasswordError,
  InvalidCredentialsError,
  InvalidEmailError,
  UserNotFoundError,
  WeakPasswordError,
} from './user-errors.js';
import { presentUser } from './user-presenter.js';
import { normalizeEmail, type UserRepository } from './user-repository.js';
import type {
  AuthEventPublisher,
  AuthenticateParams,
  ChangePasswordParams,
  CreateUserData,
  RecipientView,
  RegisterUserParams,
  RegisterUserResult,
  UserView,
} from './user-types.js';

export class UserService {
  constructor(
    private userRepo: UserRepository,
    private authEvents: AuthEventPublisher
  ) {}

  /**
   * Register a new user with a wallet
   *
   * Business rules:
   * - Email must be valid format
   * - Email must be unique (case-insensitive)
   * - Password must meet minimum requirements
   * - Role is always `user`; wallet starts at zero balance
   * - Emits user.registered event for audit logging
   */
  async registerUser(params: RegisterUserParams): Promise<RegisterUserResult> {
    const email = normalizeEmail(params.email);
    this.validateEmail(email);
    this.validatePassword(params.password);

    const existing = await this.userRepo.findByEmail(email);
    if (existing) {
      throw new DuplicateEmailError(email);
    }

    const userData: CreateUserData = {
      firstName: params.firstName.trim(),
      lastName: params.lastName.trim(),
      email,
      passwordHash: await hashPassword(params.password),
      phone: params.phone ?? null,
      country: params.country ?? null,
      address: params.address ?? null,
      role: 'user',
    };

    const { user, wallet } = await this.userRepo.createWithWallet(userData);

    await this.authEvents.emit({
      type: 'user.registered',
      userId: user.id,
      email: user.email,
      ...(params.ip && { ip: params.ip }),
    });

    return { user: presentUser(user), wallet: presentWallet(wallet) };
  }

  /**
   * Check credentials for login
   *
   * Unknown email and wrong password fail identically; suspended accounts
   * are only reported once the password has been verified.
   */
  async authenticate(params: AuthenticateParams): Promise<UserView> {
    const email = normalizeEmail(params.email);
    const user = await this.userRepo.findByEmail(email);
    const valid = user ? await verifyPassword(params.password, user.passwordHash) : false;

    if (!user || !valid) {
      await this.authEvents.emit({
        type: 'user.login.failed',
        email,
        ...(user && { userId: user.id }),
        ...(params.ip && { ip: params.ip }),
        metadata: { reason: 'invalid_credentials' },
      });
      throw new InvalidCredentialsError();
    }

    if (user.status !== 'active') {
      await this.authEvents.emit({
        type: 'user.login.failed',
        userId: user.id,
        email,
        ...(params.ip && { ip: params.ip }),
        metadata: { reason: 'account_suspended' },
      });
      throw new InactiveAccountError();
    }

    await this.authEvents.emit({
      type: 'user.login.success',
      userId: user.id,
      email,
      ...(params.ip && { ip: params.ip }),
    });

    return presentUser(user);
  }

  /**
   * Load the raw user record for request authentication
   */
  async findById(userId: string): Promise<User | null> {
    return this.userRepo.findById(userId);
  }

  async getUser(userId: string): Promise<UserView> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }
    return presentUser(user);
  }

  /**
   * Rotate a password after re-checking the current one
   */
  async changePassword(params: ChangePasswordParams): Promise<void> {
    const user = await this.userRepo.findById(params.userId);
    if (!user) {
      throw new UserNotFoundError(params.userId);
    }

    const valid = await verifyPassword(params.currentPassword, user.passwordHash);
    if (!valid) {
      throw new IncorrectPasswordError();
    }

    this.validatePassword(params.newPassword);
    if (params.newPassword === params.currentPassword) {
      throw new WeakPasswordError('must differ from the current password');
    }

    await this.userRepo.updatePasswordHash(user.id, await hashPassword(params.newPassword));

    await this.authEvents.emit({
      type: 'user.password_changed',
      userId: user.id,
      email: user.email,
      ...(params.ip && { ip: params.ip }),
    });
  }

  /**
   * Other active users that can receive transfers
   */
  async listRecipients(userId: string): Promise<RecipientView[]> {
    const recipients = await this.userRepo.listRecipients(userId);
    return recipients.map((recipient) => ({
      id: recipient.id,
      name: `${recipient.firstName} ${recipient.lastName}`.trim(),
      email: recipient.email,
      walletNumber: recipient.walletNumber,
    }));
  }

  /**
   * Validate email format
   * Basic validation - checks for @ symbol and domain
   */
  private validateEmail(email: string): void {
    const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
    if (!emailRegex.test(email)) {
      throw new InvalidEmailError(email);
    }
  }

  /**
   * Validate password meets minimum requirements
   * - At least 8 characters
   * - Contains at least one letter and one number
   */
  private validatePassword(password: string): void {
    if (password.length < 8) {
      throw new WeakPasswordError('must be at least 8 characters');
    }

    const hasLetter = /[a-zA-Z]/.test(password);
    const hasNumber = /[0-9]/.test(password);

    if (!hasLetter || !hasNumber) {
      throw new WeakPasswordError('must contain at least one letter and one number');
    }
  }
}
