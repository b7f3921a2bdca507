// ──────────────────────────────────────────
// Analytics: Report routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { ReportService } from './report.service';

export function createReportRoutes(reportService: ReportService): Router {
  const router = Router();

  // GET /monthly-revenue: revenue trend by year-month
  router.get('/monthly-revenue', async (_req: Request, res: Response) => {
    try {
      res.json({ data: await reportService.getMonthlyRevenue() });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  // GET /category-revenue: revenue by category and year
  router.get('/category-revenue', async (_req: Request, res: Response) => {
    try {
      res.json({ data: await reportService.getCategoryRevenue() });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  // GET /customer-segments: New vs Repeat
  router.get('/customer-segments', async (_req: Request, res: Response) => {
    try {
      res.json({ data: await reportService.getCustomerSegments() });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  // GET /top-products?limit=5: ranked products per store
  router.get('/top-products', async (req: Request, res: Response) => {
    try {
      let limit: number | undefined;
      if (req.query.limit !== undefined) {
        limit = Number(req.query.limit);
        if (!Number.isInteger(limit) || limit < 1 || limit > 50) {
          res.status(400).json({ error: 'limit must be a whole number between 1 and 50' });
          return;
        }
      }
      res.json({ data: await reportService.getTopProducts(limit) });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  // GET /customer-lifetime-value: customers above the average transaction value
  router.get('/customer-lifetime-value', async (_req: Request, res: Response) => {
    try {
      res.json({ data: await reportService.getCustomerLifetimeValue() });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  // GET /date-quality: conversion summary and unparseable raw values
  router.get('/date-quality', async (_req: Request, res: Response) => {
    try {
      res.json({ data: await reportService.getDateQuality() });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  return router;
}
