export * from './enums/auth.enum';
export * from './enums/consignment.enum';
export * from './enums/auctions.enum';
export * from './enums/payments.enum';
export * from './enums/notifications.enum';
export * from './errors/domain-errors';
export * from './auth/roles';
export * from './observability/request-context';
export * from './observability/json-logger.service';
export * from './observability/correlation.middleware';
