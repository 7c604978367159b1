export * from './command-runner';
export * from './path-lookup';
export * from './prober';
