export * from './scorers/completeness.scorer';
export * from './rules/default-missing-prices.rule';
export * from './rules/mark-unrated.rule';
export * from './rules/require-provenance.rule';
