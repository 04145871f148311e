import { Router, Request, Response, NextFunction } from 'express';
import { LedgerController } from './ledger.controller';
import { accountParamValidation, createAccountValidation } from './ledger.validation';
import { validateRequest } from '../../middlewares/validateRequest';

export const createLedgerRoutes = (controller: LedgerController): Router => {
  const router = Router();

  // POST /accounts - Open an account
  router.post('/', createAccountValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.createAccount(req, res, next));

  // GET /accounts/:accountNumber - Balance and token history
  router.get('/:accountNumber', accountParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getAccount(req, res, next));

  // GET /accounts/:accountNumber/payments - Payment history
  router.get('/:accountNumber/payments', accountParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getPayments(req, res, next));

  return router;
};
