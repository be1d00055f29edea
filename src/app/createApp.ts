import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import { respondWithError } from '../shared/httpErrors.js';
import { registerAppRoutes, type AppDependencies } from './setupRoutes.js';

const BODY_LIMIT = '1mb';

const isBodyParserError = (error: unknown, type: string) =>
  typeof error === 'object' && error !== null && 'type' in error && error.type === type;

// express.json rejects malformed or oversized bodies before any route runs
const handleUncaught: ErrorRequestHandler = (error, _req, res, _next) => {
  if (isBodyParserError(error, 'entity.too.large')) {
    res.status(413).json({ code: 'payload-too-large', message: `Request body exceeds ${BODY_LIMIT}.` });
    return;
  }
  if (error instanceof SyntaxError) {
    res.status(400).json({ code: 'invalid-json', message: 'Request body is not valid JSON.' });
    return;
  }
  respondWithError(error, res, 'handle request');
};

export const createApp = (dependencies: AppDependencies) => {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: BODY_LIMIT }));

  registerAppRoutes(app, dependencies);

  app.use((req, res) => {
    res.status(404).json({ code: 'not-found', message: `Route ${req.method} ${req.path} not found.` });
  });
  app.use(handleUncaught);

  return app;
};
