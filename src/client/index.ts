// Barrel-файл клиента.
export { Client } from './client.js';
export type { ClientOptions, PageQuery } from './client.js';
export { signTenantToken, findDefaultSearchKey, assertTokenRestrictions } from './tenant-token.js';
export type { TenantTokenPayload, SearchRules } from './tenant-token.js';
