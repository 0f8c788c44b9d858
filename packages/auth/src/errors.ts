export class AuthError extends Error {
  readonly code: 'unauthorized' | 'forbidden';

  constructor(code: 'unauthorized' | 'forbidden', message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnauthorizedError extends AuthError {
  constructor(message = 'Unauthorized', options?: ErrorOptions) {
    super('unauthorized', message, options);
  }
}

export class AuthorizationError extends AuthError {
  constructor(message = 'Forbidden', options?: ErrorOptions) {
    super('forbidden', message, options);
  }
}

export class InactiveUserError extends AuthorizationError {
  constructor(message = 'Account is suspended', options?: ErrorOptions) {
    super(message, options);
  }
}
