export * from './errors/brokerConnectionError';
export * from './errors/mailRequestValidationError';
export * from './errors/mailTransportError';
export * from './errors/templateNotFoundError';
export * from './errors/topologyDeclarationError';
export * from './ports/logger';
export * from './ports/mailer';
export * from './ports/messageBroker';
export * from './ports/templateStore';
export * from './queue/connectWithRetry';
export * from './queue/deadLetterNames';
export * from './queue/mailQueueConsumer';
export * from './services/mail/decodeMailRequest';
export * from './services/mail/emailFingerprint';
export * from './services/mail/mailDispatchService';
export * from './templates/renderTemplate';
export * from './templates/variableResolver';
