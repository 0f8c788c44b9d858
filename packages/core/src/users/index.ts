/**
 * Users Domain
 *
 * Exports for user management functionality
 */

export { DrizzleUserRepository, isValidUuid, normalizeEmail } from './user-repository.js';
export type { RecipientRecord, UserRepository } from './user-repository.js';

export { UserService } from './user-service.js';
export { presentUser } from './user-presenter.js';
export type {
  AuthEventPublisher,
  AuthenticateParams,
  ChangePasswordParams,
  CreateUserData,
  RecipientView,
  RegisterUserParams,
  RegisterUserResult,
  UpdateUserAccessData,
  UserView,
} from './user-types.js';

export {
  DuplicateEmailError,
  InactiveAccountError,
  IncorrectPasswordError,
  InvalidCredentialsError,
  InvalidEmailError,
  UserNotFoundError,
  WeakPasswordError,
} from './user-errors.js';
