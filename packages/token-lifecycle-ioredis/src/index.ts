// ===================== REDIS STORE EXPORTS =====================

export { IoredisTokenStore, DEFAULT_PREFIX } from "./ioredis.adapter";
export type { IoredisStoreOptions } from "./ioredis.adapter";
export { createTokenStore } from "./store.factory";
