export {
  registerCors,
  makeOriginPolicy,
  getAllowedOriginsSet,
  isLocalhostOrigin,
  CORS_METHODS,
} from './cors.js';
export { registerSecurityHeaders } from './security-headers.js';
