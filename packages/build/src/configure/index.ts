export * from './configure-step';
