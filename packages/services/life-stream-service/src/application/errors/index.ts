export { LifeStreamError, LifeStreamErrorCode, type LifeStreamErrorCodeType } from './errors';
export { guardStore } from './store-guard';
