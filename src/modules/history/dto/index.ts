export * from './history-query.dto.js';
export * from './history-response.dto.js';
