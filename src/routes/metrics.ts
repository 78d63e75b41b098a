/**
 * Metrics Route
 *
 * Prometheus scrape endpoint. Serialisation failures answer 500 and are
 * logged; they never take the process down.
 */

import type { Request, Response } from 'express';
import { CONTENT_TYPE, renderExposition } from '../infrastructure/exposition';
import type { MetricsRegistry } from '../infrastructure/metrics';
import { createLogger, errorFields } from '../utils/logger';

const logger = createLogger('metricsRoute');

export function createMetricsHandler(registry: MetricsRegistry) {
  return (_req: Request, res: Response): void => {
    let body: string;
    try {
      body = renderExposition(registry.snapshot());
    } catch (error) {
      logger.error(errorFields(error), 'Failed to render metrics');
      res.status(500).type('text/plain').send('Internal server error');
      return;
    }
    res.status(200);
    res.setHeader('Content-Type', CONTENT_TYPE);
    res.end(body);
  };
}
