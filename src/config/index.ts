export { getConfig, validateEnv, resetConfig, getModeName } from './env';
export { loadAccounts, createAccountDirectory, parseAccounts } from './accounts';
export type { AccountDirectory, TrackedAccount } from './accounts';
