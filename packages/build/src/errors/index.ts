export * from './codes';
export * from './forge-error';
