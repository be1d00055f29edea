export type AuthFailureReason = 'missing-secret' | 'invalid-key';

// Raised by the API-key guard; a server without a configured secret is a 500, not a 401
export class AuthError extends Error {
  constructor(
    public readonly reason: AuthFailureReason,
    message?: string
  ) {
    super(message ?? (reason === 'missing-secret' ? 'Server missing API_KEY.' : 'Invalid API key.'));
    this.name = 'AuthError';
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class SchemaMismatchError extends Error {
  constructor(
    public readonly missing: string[],
    public readonly expected: string[],
    public readonly misplaced: string[] = []
  ) {
    super(
      missing.length
        ? `Sheet header must include: ${expected.join(', ')}. Missing: ${missing.join(', ')}.`
        : `Sheet header must list, in order: ${expected.join(', ')}. Out of place: ${misplaced.join(', ')}.`
    );
    this.name = 'SchemaMismatchError';
  }
}

export class RowNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RowNotFoundError';
  }
}

export class BackendUnavailableError extends Error {
  constructor(
    message: string,
    public readonly original?: unknown
  ) {
    super(message);
    this.name = 'BackendUnavailableError';
  }
}
