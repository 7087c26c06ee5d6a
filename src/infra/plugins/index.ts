export { registerCors, getAllowedOrigins, isLocalhostOrigin } from './cors.js';
