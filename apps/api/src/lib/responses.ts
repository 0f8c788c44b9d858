/**
 * Response envelope shared by every endpoint
 */

export type ValidationIssue = {
  path: string;
  message: string;
};

export type ApiSuccess<T> = {
  success: true;
  data: T;
};

export type ApiFailure = {
  success: false;
  error: {
    code: string;
    message: string;
    issues?: ValidationIssue[];
  };
};

export function success<T>(data: T): ApiSuccess<T> {
  return { success: true, data };
}

export function failure(code: string, message: string, issues?: ValidationIssue[]): ApiFailure {
  return {
    success: false,
    error: {
      code,
      message,
      ...(issues && issues.length > 0 && { issues }),
    },
  };
}
