export * from './logger.js';
export * from './serviceController.js';
