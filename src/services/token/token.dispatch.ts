import { OperationRequest, OperationResult } from '../../types/tokens';
import { TokenLifecycleService } from './token.service';

/**
 * Route an operation request to the matching lifecycle call
 */
export const dispatchOperation = async (
  lifecycle: TokenLifecycleService,
  request: OperationRequest
): Promise<OperationResult> => {
  switch (request.operation) {
    case 'generate':
      return lifecycle.generate(request.accountNumber, request.amount);
    case 'validate':
      return lifecycle.validate(request.accountNumber, request.token);
    case 'use':
      return lifecycle.use(request.accountNumber, request.token);
    case 'info':
      return lifecycle.info(request.accountNumber);
  }
};

/**
 * Build a typed request from an already validated body
 */
export const toOperationRequest = (input: {
  operation: OperationRequest['operation'];
  accountNumber: string;
  amount?: number;
  token?: string;
}): OperationRequest => {
  switch (input.operation) {
    case 'generate':
      return { operation: 'generate', accountNumber: input.accountNumber, amount: input.amount ?? NaN };
    case 'validate':
      return { operation: 'validate', accountNumber: input.accountNumber, token: input.token ?? '' };
    case 'use':
      return { operation: 'use', accountNumber: input.accountNumber, token: input.token ?? '' };
    case 'info':
      return { operation: 'info', accountNumber: input.accountNumber };
  }
};
