export * from './base';
export * from './api-source';
export * from './web-source';
export * from './mock-source';
export * from './registry';
