import { timingSafeEqual } from 'crypto';
import type { RequestHandler } from 'express';
import { AuthError } from './errors.js';
import { respondWithError } from './httpErrors.js';

export const API_KEY_HEADER = 'x-api-key';

const sameSecret = (expected: string, provided: string) => {
  const left = Buffer.from(expected);
  const right = Buffer.from(provided);
  return left.length === right.length && timingSafeEqual(left, right);
};

export const verifyApiKey = (expected: string | null, provided: string | undefined): void => {
  if (!expected) {
    throw new AuthError('missing-secret');
  }
  if (!provided || !sameSecret(expected, provided)) {
    throw new AuthError('invalid-key');
  }
};

export const requireApiKey =
  (expected: string | null): RequestHandler =>
  (req, res, next) => {
    try {
      verifyApiKey(expected, req.header(API_KEY_HEADER));
      next();
    } catch (error) {
      respondWithError(error, res, 'authenticate request');
    }
  };
