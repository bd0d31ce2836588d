export * from './bom';
export * from './comparison';
export * from './api';
