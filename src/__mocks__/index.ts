export * from './provider.mock.js';
