export * from './controllers/actionDispatcher';
export * from './controllers/closeConfirmationController';
export * from './controllers/tab';
export * from './controllers/tabCollection';
export type * from './controllers/terminalEngine';
export type * from './controllers/toolkit';
export * from './controllers/windowController';
export * from './controllers/windowEventBus';
export * from './controllers/windowManager';
export * from './controllers/windowRegistry';
export * from './utils/logger';
export * from './utils/windowChrome';
export * from './utils/windowConfigLoader';
