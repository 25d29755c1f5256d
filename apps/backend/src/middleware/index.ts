export { requestIdMiddleware } from './request-id.js';
