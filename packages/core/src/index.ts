export * from './models';
export * from './config/schema';
export * from './config/validate';
export * from './config/loadConfig';
export * from './graph/levelGraph';
export * from './engine';
export * from './hints/hintLedger';
export * from './flags/flagValidator';
export * from './format/duration';
export * from './storage/fsStore';
export * from './storage/sessionReport';
export * from './sample';
