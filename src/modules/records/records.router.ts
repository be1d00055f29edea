import { Router, type Request, type RequestHandler, type Response } from 'express';
import { respondWithError } from '../../shared/httpErrors.js';
import { toResponseRow } from './records.codec.js';
import type { RecordsService } from './records.service.js';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readBody = (req: Request): Record<string, unknown> => {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
};

export const createRecordsRouter = (service: RecordsService, guard: RequestHandler) => {
  const router = Router();

  const handleLastItem = async (req: Request, res: Response) => {
    try {
      const { row, lastItem } = await service.lastItem(req.query.location);
      res.json({
        location: row.location,
        timestamp: row.timestamp,
        items: row.itemTokens,
        products: row.itemTokens,
        last_item: lastItem,
        last_product: lastItem,
        note: row.note,
        revenue: row.revenue,
        revenue_value: row.revenueValue,
        row_number: row.rowNumber
      });
    } catch (error) {
      respondWithError(error, res, 'load the latest record');
    }
  };

  router.post('/append', guard, async (req, res) => {
    try {
      const { values, rowNumber } = await service.appendRecord(readBody(req));
      res.json({ ok: true, row: toResponseRow(values, service.layout, rowNumber) });
    } catch (error) {
      respondWithError(error, res, 'append a record');
    }
  });

  router.get('/last-product', guard, handleLastItem);
  router.get('/last-item', guard, handleLastItem);

  router.post('/search', guard, async (req, res) => {
    try {
      const rows = await service.search(readBody(req));
      res.json({ rows: rows.map((row) => toResponseRow(row, service.layout, row.rowNumber)) });
    } catch (error) {
      respondWithError(error, res, 'search records');
    }
  });

  router.post('/update-row', guard, async (req, res) => {
    try {
      const row = await service.updateRow(readBody(req));
      res.json({ ok: true, row: toResponseRow(row, service.layout, row.rowNumber) });
    } catch (error) {
      respondWithError(error, res, 'update a row');
    }
  });

  router.post('/delete-row', guard, async (req, res) => {
    try {
      const removed = await service.deleteRow(readBody(req));
      res.json({ ok: true, deleted: toResponseRow(removed, service.layout, removed.rowNumber) });
    } catch (error) {
      respondWithError(error, res, 'delete a row');
    }
  });

  router.get('/sum-revenue', guard, async (req, res) => {
    try {
      const summary = await service.sumRevenue({
        location: req.query.location,
        since_ts: req.query.since_ts,
        until_ts: req.query.until_ts
      });
      res.json({ total_revenue: summary.total, rows: summary.rows });
    } catch (error) {
      respondWithError(error, res, 'sum revenue');
    }
  });

  return router;
};
