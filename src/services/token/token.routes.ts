import { Router, Request, Response, NextFunction } from 'express';
import { TokenController } from './token.controller';
import { generateValidation, operationValidation, tokenParamValidation } from './token.validation';
import { validateRequest } from '../../middlewares/validateRequest';

export const createTokenRoutes = (controller: TokenController): Router => {
  const router = Router();

  // POST /tokens - Capture payment and mint a token
  router.post('/', generateValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.generate(req, res, next));

  // POST /tokens/:token/validate - Check a token without consuming it
  router.post('/:token/validate', tokenParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.validate(req, res, next));

  // POST /tokens/:token/use - Consume a token
  router.post('/:token/use', tokenParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.use(req, res, next));

  return router;
};

export const createOperationRoutes = (controller: TokenController): Router => {
  const router = Router();

  // POST /operations - Run generate, validate, use or info by name
  router.post('/', operationValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.dispatch(req, res, next));

  return router;
};
