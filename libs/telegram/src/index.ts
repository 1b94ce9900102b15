export * from './telegram.formatter';
export * from './telegram.service';
