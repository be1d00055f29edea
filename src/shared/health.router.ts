import { Router } from 'express';

export interface HealthInfo {
  timezone: string;
  dateFormat: string;
  columns: string[];
}

export const createHealthRouter = ({ timezone, dateFormat, columns }: HealthInfo) => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      ok: true,
      timezone,
      date_format: dateFormat,
      columns
    });
  });

  return router;
};
