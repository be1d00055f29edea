import type { Response } from 'express';
import {
  AuthError,
  BackendUnavailableError,
  RowNotFoundError,
  SchemaMismatchError,
  ValidationError
} from './errors.js';

export const respondWithError = (error: unknown, res: Response, context = 'process request') => {
  if (error instanceof AuthError) {
    if (error.reason === 'missing-secret') {
      res.status(500).json({ code: 'server-misconfigured', message: error.message });
      return;
    }
    res.status(401).json({ code: 'unauthorized', message: error.message });
    return;
  }
  if (error instanceof ValidationError) {
    res.status(422).json({ code: 'invalid-input', message: error.message });
    return;
  }
  if (error instanceof RowNotFoundError) {
    res.status(404).json({ code: 'not-found', message: error.message });
    return;
  }
  if (error instanceof SchemaMismatchError) {
    console.error(`Failed to ${context}:`, error.message);
    res.status(500).json({ code: 'schema-mismatch', message: error.message });
    return;
  }
  if (error instanceof BackendUnavailableError) {
    console.error(`Failed to ${context}:`, error.original ?? error);
    res.status(502).json({ code: 'backend-unavailable', message: error.message });
    return;
  }
  console.error(`Failed to ${context}:`, error);
  const message = error instanceof Error && error.message ? error.message : 'Unexpected error.';
  res.status(500).json({ code: 'unknown', message });
};
