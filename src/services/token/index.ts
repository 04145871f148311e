export { TokenLifecycleService, TokenLifecycleOptions } from './token.service';
export { MongoTokenRegistry, TokenCollisionError, TokenRegistryOptions } from './token.registry';
export { randomTokenGenerator, TokenGenerator } from './token.generator';
export { evaluateToken, tokenExpiry, tokenMessages } from './token.rules';
export { dispatchOperation, toOperationRequest } from './token.dispatch';
export { TokenController } from './token.controller';
export { createTokenRoutes, createOperationRoutes } from './token.routes';
