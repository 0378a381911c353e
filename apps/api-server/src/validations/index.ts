export * from './schemas/extraction';
export * from './helpers/error-response';
export * from './helpers/validate';
