export * from './types';
export * from './time';
export * from './ingestion';
export * from './classifier';
export * from './csv';
