export * from './ratio-query.dto.js';
export * from './ratio-response.dto.js';
