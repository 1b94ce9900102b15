export * from './app-settings';
export * from './core.module';
export * from './env.schema';
export * from './errors';
export * from './logging';
