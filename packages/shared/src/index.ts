export * from './errors';
export * from './logger';
export * from './protocol';
export * from './transport';
export * from './channel';
export * from './dispatcher';
export * from './memoryTransport';
