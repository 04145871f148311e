export {
  PaymentAuthorizer,
  PaymentAuthorizationRequest,
  PaymentAuthorizationResult,
  SimulatedPaymentAuthorizer,
  simulatedPaymentAuthorizer,
} from './payment.authorizer';
