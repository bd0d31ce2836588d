export * from './bom';
