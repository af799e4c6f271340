export * from './pipeline.exception';
