export * from './classify';
export * from './root';
export * from './explode';
export * from './aggregate';
export * from './trace';
export * from './reconcile';
export * from './orchestrator';
