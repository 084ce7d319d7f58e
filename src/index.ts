export * from './types';
export * from './app';
export * from './events';
export * from './db';
export * from './db/transactions';
export * from './db/queue';
export * from './dedup/duplicate-detector';
export * from './parsers/financial-context';
export * from './parsers/amount';
export * from './parsers/transaction-type';
export * from './parsers/account';
export * from './parsers/datetime';
export * from './parsers/assembler';
export * from './validation/validator';
export * from './remote/client';
export * from './sync/connectivity';
export * from './sync/retry';
export * from './sync/sync-manager';
export * from './pipeline';
export * from './utils/errors';
export { KeyedMutex } from './utils/mutex';
export {
  loadConfig,
  createConfigTemplate,
  DEFAULT_CONFIG,
  CONFIG_FILE,
  type AppConfig,
} from './config';
