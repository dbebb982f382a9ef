export * from './utils';
export * from './crypto';
export * from './bech32';
export * from './base58check';
export * from './eip55';
export * from './ss58';
