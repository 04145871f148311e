import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../../middlewares/errorHandler';
import { TokenStatus } from '../../types/tokens';
import { dispatchOperation, toOperationRequest } from './token.dispatch';
import { tokenStatusToErrorCode } from './token.rules';
import { TokenLifecycleService } from './token.service';

export class TokenController {
  constructor(private readonly lifecycle: TokenLifecycleService) {}

  /**
   * Pay and receive a token
   * POST /tokens
   */
  async generate(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const accountNumber: string = req.body.accountNumber;
      const amount: number = req.body.amount;

      const result = await this.lifecycle.generate(accountNumber, amount);
      if (result.status === 'failed') {
        throw new ApiError(result.reason, result.message);
      }

      res.status(201).json({
        success: true,
        data: {
          token: result.token,
          accountNumber: result.accountNumber,
          amount: result.amount,
          newBalance: result.newBalance,
          paymentId: result.paymentId,
          expiresAt: result.expiresAt,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Read-only validity check
   * POST /tokens/:token/validate
   */
  async validate(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const accountNumber: string = req.body.accountNumber;
      const result = await this.lifecycle.validate(accountNumber, req.params.token);

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Consume a token
   * POST /tokens/:token/use
   */
  async use(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const accountNumber: string = req.body.accountNumber;
      const result = await this.lifecycle.use(accountNumber, req.params.token);

      if (result.reason !== TokenStatus.VALID) {
        throw new ApiError(tokenStatusToErrorCode[result.reason], result.message);
      }

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Operation selector: structured result for any of the four operations
   * POST /operations
   */
  async dispatch(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const request = toOperationRequest({
        operation: req.body.operation,
        accountNumber: req.body.accountNumber,
        amount: req.body.amount,
        token: req.body.token,
      });
      const result = await dispatchOperation(this.lifecycle, request);

      res.status(200).json({
        success: true,
        data: { operation: request.operation, result },
      });
    } catch (error) {
      next(error);
    }
  }
}
