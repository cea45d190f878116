export * from './activity';
export * from './api';
