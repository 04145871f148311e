/**
 * Payment authorization boundary
 *
 * Generate asks an authorizer before moving any money. There is no real
 * gateway behind it: the default implementation approves every positive amount.
 */

export interface PaymentAuthorizationRequest {
  accountNumber: string;
  amount: number;
}

export interface PaymentAuthorizationResult {
  approved: boolean;
  reason?: string;
}

export interface PaymentAuthorizer {
  authorize(request: PaymentAuthorizationRequest): Promise<PaymentAuthorizationResult>;
}

export class SimulatedPaymentAuthorizer implements PaymentAuthorizer {
  async authorize({ amount }: PaymentAuthorizationRequest): Promise<PaymentAuthorizationResult> {
    if (amount > 0) {
      return { approved: true };
    }
    return { approved: false, reason: 'Amount must be greater than zero' };
  }
}

export const simulatedPaymentAuthorizer = new SimulatedPaymentAuthorizer();
