// controllers/statusController.ts
import type { Response } from 'express';
import ms from 'ms';
import type { RequestWithLogger } from '../types/index.ts';

/** Health check response */
type StatusResponse = {
  readonly status: 'ok';
  readonly uptime: {
    readonly seconds: number;
    readonly formatted: string;
  };
  readonly timestamp: string;
};

/**
 * Controller class for service health
 *
 * All methods are static and follow Express route handler pattern (req, res).
 * Request-scoped logging is available via req.log.
 */
export class StatusController {
  /**
   * Liveness probe with process uptime
   */
  static async getStatus(req: RequestWithLogger, res: Response): Promise<void> {
    const uptimeMs = Math.floor(process.uptime() * 1000);
    const seconds = Math.floor(uptimeMs / 1000);

    let formatted = `${seconds} seconds`;
    try {
      if (uptimeMs > 0) {
        formatted = ms(uptimeMs, { long: true });
      }
    } catch (msError) {
      req.log.warn(
        { action: 'getStatus', err: msError },
        'Failed to format uptime',
      );
    }

    const status: StatusResponse = {
      status: 'ok',
      uptime: { seconds, formatted },
      timestamp: new Date().toISOString(),
    };

    req.log.debug({ action: 'getStatus', uptimeSeconds: seconds }, 'Status retrieved');
    res.json(status);
  }
}
