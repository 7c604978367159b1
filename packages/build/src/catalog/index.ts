export * from './feature-catalog';
