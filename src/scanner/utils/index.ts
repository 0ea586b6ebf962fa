export * from './decimal';
export * from './evaluate';
export * from './normalize';
export * from './profit';
