export * from './text.normalizer';
export * from './number.normalizer';
export * from './rating.normalizer';
export * from './price.normalizer';
export * from './date.normalizer';
export * from './genre.normalizer';
export * from './platform.normalizer';
