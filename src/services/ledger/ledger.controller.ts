import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../../middlewares/errorHandler';
import { TokenLifecycleService } from '../token/token.service';

export class LedgerController {
  constructor(private readonly lifecycle: TokenLifecycleService) {}

  /**
   * Open an account
   * POST /accounts
   */
  async createAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const accountNumber: string = req.body.accountNumber;
      const initialBalance: number = req.body.initialBalance ?? 0;

      const account = await this.lifecycle.openAccount(accountNumber, initialBalance);

      res.status(201).json({
        success: true,
        data: { account },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Balance and token history
   * GET /accounts/:accountNumber
   */
  async getAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const info = await this.lifecycle.info(req.params.accountNumber);
      if (!info.found) {
        throw ApiError.accountNotFound(info.accountNumber);
      }

      res.status(200).json({
        success: true,
        data: {
          accountNumber: info.accountNumber,
          balance: info.balance,
          tokens: info.tokens,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Payment history, newest first
   * GET /accounts/:accountNumber/payments
   */
  async getPayments(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const payments = await this.lifecycle.getPaymentHistory(req.params.accountNumber);

      res.status(200).json({
        success: true,
        data: { payments },
      });
    } catch (error) {
      next(error);
    }
  }
}
