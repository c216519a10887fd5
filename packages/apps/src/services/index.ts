export * from './appConfig.js';
export * from './serviceController.js';
export * from './application.js';
export * from './fleetManager.js';
