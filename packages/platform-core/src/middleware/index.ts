export {
  createValidation,
  initValidation,
  getValidation,
  validatedQuery,
  validatedParams,
  VALIDATED_QUERY,
  VALIDATED_PARAMS,
} from './validation';
export type { ValidationMiddleware } from './validation';
