export * from './base.mapper';
export * from './steam.mapper';
export * from './gog.mapper';
export * from './instant-gaming.mapper';
export * from './rawg.mapper';
export * from './metacritic.mapper';
export * from './humble.mapper';
export * from './epic.mapper';
