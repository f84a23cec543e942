export { registerCors, isOriginAllowed, isLocalhostOrigin, parseAllowedOrigins } from './cors.js';
export { registerSecurityHeaders } from './security-headers.js';
