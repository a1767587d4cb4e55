import { Router } from 'express';
import type { AssistantController } from '../controllers/assistantController';

export function createAssistantRouter(controller: AssistantController): Router {
  const assistantRouter = Router();

  assistantRouter.post('/ask', controller.ask);
  assistantRouter.post('/ask/detailed', controller.askDetailed);
  assistantRouter.post('/compare', controller.compare);
  assistantRouter.get('/status', controller.status);
  assistantRouter.post('/reindex', (req, res, next) => {
    controller.reindex(req, res).catch(next);
  });

  return assistantRouter;
}
