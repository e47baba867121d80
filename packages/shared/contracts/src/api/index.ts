export * from './songs';
