import { describe, it, expect, vi, type Mock } from 'vitest';
import {
  TEST_AUTH_USER,
  asMocked,
  asRequest,
  asResponse,
  createMockRequest,
  createMockResponse,
} from '../utils/testHelpers.ts';

vi.mock('../../src/services/teamService.ts', () => ({
  teamService: {
    listTeams: vi.fn(),
  },
}));

const { teamService } = asMocked<{ teamService: { listTeams: Mock } }>(
  await import('../../src/services/teamService.ts'),
);
const { UserController } = await import('../../src/controllers/userController.ts');

describe('UserController', () => {
  describe('getCurrentUser', () => {
    it('should return the public fields of the authenticated user', async () => {
      const req = createMockRequest({
        user: { ...TEST_AUTH_USER, nickname: 'ally', anonymous: true },
      });
      const res = createMockResponse();

      await UserController.getCurrentUser(asRequest(req), asResponse(res));

      expect(res.json).toHaveBeenCalledWith({
        id: 'user-1',
        name: 'Alice',
        email: 'alice@example.com',
        nickname: 'ally',
        anonymous: true,
      });
    });
  });

  describe('getTeams', () => {
    it('should return the bare team list', async () => {
      const teams = [{ id: 'team-1', name: 'Operations', isAdmin: true }];
      teamService.listTeams.mockResolvedValue(teams);
      const req = createMockRequest({ user: TEST_AUTH_USER });
      const res = createMockResponse();

      await UserController.getTeams(asRequest(req), asResponse(res));

      expect(teamService.listTeams).toHaveBeenCalledWith('user-1', req.log);
      expect(res.json).toHaveBeenCalledWith(teams);
    });
  });
});
