import { Router } from 'express';
import type { ApiTeamController } from '../controllers/ApiTeamController';

export function createTeamRouter(controller: ApiTeamController): Router {
  const router = Router();

  router.get('/', controller.listMyTeams());
  router.get('/:team_id/users', controller.listUsers());
  router.get('/:team_id/available-admins', controller.listAvailableAdmins());
  router.get('/:team_id/available-users', controller.listAvailableUsers());
  router.get('/:team_id/users/:user_id', controller.getUser());
  router.put('/:team_id/availability', controller.updateAvailability());
  router.post('/:team_id/members/:user_id', controller.addMember());
  router.delete('/:team_id/members/:user_id', controller.removeMember());

  return router;
}
