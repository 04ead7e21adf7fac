export * from './enums';
export * from './match';
