import { describe, it, expect, vi } from 'vitest';
import {
  asRequest,
  asResponse,
  createMockRequest,
  createMockResponse,
} from '../utils/testHelpers.ts';

const { StatusController } = await import('../../src/controllers/statusController.ts');

describe('StatusController', () => {
  describe('getStatus', () => {
    it('should report uptime in seconds and in words', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-03-02T08:15:00.000Z'));
      vi.spyOn(process, 'uptime').mockReturnValue(3725.4);
      const req = createMockRequest();
      const res = createMockResponse();

      await StatusController.getStatus(asRequest(req), asResponse(res));

      expect(res.json).toHaveBeenCalledWith({
        status: 'ok',
        uptime: { seconds: 3725, formatted: '1 hour' },
        timestamp: '2026-03-02T08:15:00.000Z',
      });
    });

    it('should fall back to seconds when the process just started', async () => {
      vi.spyOn(process, 'uptime').mockReturnValue(0);
      const req = createMockRequest();
      const res = createMockResponse();

      await StatusController.getStatus(asRequest(req), asResponse(res));

      expect(res.json).toHaveBeenCalledWith(
        expect.objectContaining({
          uptime: { seconds: 0, formatted: '0 seconds' },
        }),
      );
    });

    it('should log at debug level', async () => {
      vi.spyOn(process, 'uptime').mockReturnValue(12);
      const req = createMockRequest();
      const res = createMockResponse();

      await StatusController.getStatus(asRequest(req), asResponse(res));

      expect(req.log.debug).toHaveBeenCalledWith(
        { action: 'getStatus', uptimeSeconds: 12 },
        'Status retrieved',
      );
    });
  });
});
